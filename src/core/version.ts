export const APP_NAME = 'ddns-sync';
export const APP_VERSION = '1.0.0';
