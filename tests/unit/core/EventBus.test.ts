/**
 * EventBus unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventBus, EventTypes, type EventPayloadMap } from '../../../src/core/EventBus.js';
import { logger } from '../../../src/core/Logger.js';

type UserErrorPayload = EventPayloadMap[typeof EventTypes.DDNS_USER_ERROR];

const userError: UserErrorPayload = {
  passId: 'pass-1',
  username: 'user',
  hostnames: ['a.example.com'],
  codes: ['badauth'],
};

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deliver the payload to every subscriber of the event', () => {
    const received: string[] = [];
    eventBus.subscribe(EventTypes.DDNS_USER_ERROR, ({ username }) => {
      received.push(`first:${username}`);
    });
    eventBus.subscribe(EventTypes.DDNS_USER_ERROR, ({ codes }) => {
      received.push(`second:${codes.join(',')}`);
    });

    eventBus.publish(EventTypes.DDNS_USER_ERROR, userError);

    expect(received).toEqual(['first:user', 'second:badauth']);
  });

  it('should not deliver other events', () => {
    const handler = vi.fn();
    eventBus.subscribe(EventTypes.DDNS_USER_ERROR, handler);

    eventBus.publish(EventTypes.IP_DISCOVERY_FAILED, { provider: 'noip', reason: 'status 503' });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const handler = vi.fn();
    const unsubscribe = eventBus.subscribe(EventTypes.SYSTEM_SHUTDOWN, handler);

    eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: 'first' });
    unsubscribe();
    eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: 'second' });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ reason: 'first' });
  });

  it('should log a throwing handler and keep notifying the others', () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const handler = vi.fn();
    const failure = new Error('handler failed');
    eventBus.subscribe(EventTypes.IP_DISCOVERY_FAILED, () => {
      throw failure;
    });
    eventBus.subscribe(EventTypes.IP_DISCOVERY_FAILED, handler);

    expect(() => eventBus.publish(EventTypes.IP_DISCOVERY_FAILED, { provider: 'noip', reason: 'status 503' })).not.toThrow();

    expect(handler).toHaveBeenCalledWith({ provider: 'noip', reason: 'status 503' });
    expect(errorSpy).toHaveBeenCalledWith({ eventType: 'ip:discovery:failed', error: failure }, 'Event handler failed');
  });

  it('should log a rejecting async handler', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const failure = new Error('async handler failed');
    eventBus.subscribe(EventTypes.DDNS_PASS_COMPLETED, async () => {
      throw failure;
    });

    eventBus.publish(EventTypes.DDNS_PASS_COMPLETED, {
      passId: 'pass-1',
      updater: 'noip.com DNS service',
      entries: 1,
      hostnamesConfirmed: 0,
      failures: [{ username: 'user', status: 'user-error' }],
      durationMs: 5,
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(errorSpy).toHaveBeenCalledWith({ eventType: 'ddns:pass:completed', error: failure }, 'Event handler failed');
  });

  it('should trace every event once debug logging is enabled', () => {
    const traceSpy = vi.spyOn(logger, 'trace');
    eventBus.enableDebugLogging();
    eventBus.enableDebugLogging();

    eventBus.publish(EventTypes.IP_UPDATED, { provider: 'noip', address: '9.9.9.9', previous: null });

    expect(traceSpy).toHaveBeenCalledTimes(1);
    expect(traceSpy).toHaveBeenCalledWith(
      { event: 'ip:updated', data: { provider: 'noip', address: '9.9.9.9', previous: null } },
      'Event: ip:updated'
    );
  });

  it('should drop every subscriber and the tracer on removeAllListeners', () => {
    const traceSpy = vi.spyOn(logger, 'trace');
    const handler = vi.fn();
    eventBus.enableDebugLogging();
    eventBus.subscribe(EventTypes.DDNS_USER_ERROR, handler);

    eventBus.removeAllListeners();
    eventBus.publish(EventTypes.DDNS_USER_ERROR, userError);

    expect(handler).not.toHaveBeenCalled();
    expect(traceSpy).not.toHaveBeenCalled();
  });
});
