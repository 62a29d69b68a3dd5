/**
 * Typed Event Bus for application-wide event handling
 * Implements a pub/sub pattern with full TypeScript support
 */
import { EventEmitter } from 'events';
import { logger } from './Logger.js';
import type { EntryStatus, Hostname, IpAddress } from '../types/index.js';

/**
 * Event type constants
 */
export const EventTypes = {
  // IP discovery events
  IP_UPDATED: 'ip:updated',
  IP_DISCOVERY_FAILED: 'ip:discovery:failed',

  // Reconciliation events
  DDNS_PASS_STARTED: 'ddns:pass:started',
  DDNS_PASS_COMPLETED: 'ddns:pass:completed',
  DDNS_HOSTNAME_CONFIRMED: 'ddns:hostname:confirmed',
  DDNS_USER_ERROR: 'ddns:user-error',

  // Status events
  ERROR_OCCURRED: 'error:occurred',

  // System events
  SYSTEM_STARTED: 'system:started',
  SYSTEM_SHUTDOWN: 'system:shutdown',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Event payload type mapping
 */
export interface EventPayloadMap {
  [EventTypes.IP_UPDATED]: { provider: string; address: IpAddress; previous: IpAddress | null };
  [EventTypes.IP_DISCOVERY_FAILED]: { provider: string; reason: string };
  [EventTypes.DDNS_PASS_STARTED]: { passId: string; updater: string };
  [EventTypes.DDNS_PASS_COMPLETED]: {
    passId: string;
    updater: string;
    entries: number;
    hostnamesConfirmed: number;
    failures: Array<{ username: string; status: EntryStatus }>;
    durationMs: number;
  };
  [EventTypes.DDNS_HOSTNAME_CONFIRMED]: {
    passId: string;
    hostname: Hostname;
    address: IpAddress;
    status: 'update' | 'no-change';
  };
  [EventTypes.DDNS_USER_ERROR]: { passId: string; username: string; hostnames: Hostname[]; codes: string[] };
  [EventTypes.ERROR_OCCURRED]: { source: string; error: string; stack?: string };
  [EventTypes.SYSTEM_STARTED]: { version: string; updaters: string[] };
  [EventTypes.SYSTEM_SHUTDOWN]: { reason: string };
}

type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void | Promise<void>;

/**
 * Typed Event Bus implementation
 *
 * Handlers run synchronously in subscription order. A handler that throws or
 * rejects is logged and never affects the publisher or the other handlers.
 */
export class EventBus {
  private emitter: EventEmitter;
  private debugLogging: boolean = false;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
  }

  /**
   * Trace every event that goes through the bus
   */
  enableDebugLogging(): void {
    if (this.debugLogging) return;
    this.debugLogging = true;

    for (const eventType of Object.values(EventTypes)) {
      this.emitter.on(eventType, (data: unknown) => {
        logger.trace({ event: eventType, data }, `Event: ${eventType}`);
      });
    }
  }

  /**
   * Subscribe to an event; returns the matching unsubscribe function
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    const listener = (data: EventPayloadMap[T]): void => {
      try {
        const result = handler(data);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(eventType, error));
        }
      } catch (error) {
        this.reportHandlerError(eventType, error);
      }
    };

    this.emitter.on(eventType, listener);
    return (): void => {
      this.emitter.off(eventType, listener);
    };
  }

  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    this.emitter.emit(eventType, data);
  }

  /**
   * Remove every subscriber, including the debug tracer
   */
  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.debugLogging = false;
  }

  private reportHandlerError(eventType: EventType, error: unknown): void {
    logger.error({ eventType, error }, 'Event handler failed');
  }
}
