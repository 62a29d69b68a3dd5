/**
 * Base provider exports
 */
export {
  needsUpdate,
  selectHostnamesToUpdate,
  type IpAddressDiscoveryService,
  type Updater,
} from './Updater.js';
