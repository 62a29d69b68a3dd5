/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, symbols, type LogLevel } from './Logger.js';
export { EventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export { ConfigurationError, HttpRequestError, formatZodError, errorMessage } from './errors.js';
export { Application, createApplication, type ApplicationOptions } from './Application.js';
export { APP_NAME, APP_VERSION } from './version.js';
