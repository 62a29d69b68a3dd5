/**
 * No-IP integration exports
 */
export { NoIpDiscoveryService, NOIP_DISCOVERY_URL, type NoIpDiscoveryOptions } from './NoIpDiscoveryService.js';
export { NoIpUpdater, NOIP_UPDATE_URL, describeEntry, type NoIpUpdaterOptions } from './NoIpUpdater.js';
export { parseResponse, parseResponseLine, SERVER_ERRORS, USER_ERRORS } from './responseParser.js';
