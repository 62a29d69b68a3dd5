/**
 * Providers module exports
 */
export { needsUpdate, selectHostnamesToUpdate, type IpAddressDiscoveryService, type Updater } from './base/index.js';
export {
  NoIpDiscoveryService,
  NoIpUpdater,
  NOIP_DISCOVERY_URL,
  NOIP_UPDATE_URL,
  describeEntry,
  parseResponse,
  parseResponseLine,
  SERVER_ERRORS,
  USER_ERRORS,
  type NoIpDiscoveryOptions,
  type NoIpUpdaterOptions,
} from './noip/index.js';
