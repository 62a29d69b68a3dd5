/**
 * No-IP public address discovery
 *
 * Serves the cached address while it is fresh, otherwise asks the provider's
 * "my IP" endpoint and caches the answer.
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import { EventTypes, type EventBus } from '../../core/EventBus.js';
import { errorMessage } from '../../core/errors.js';
import type { HttpClient } from '../../http/HttpClient.js';
import type { KeyValueStore } from '../../storage/StorageContainer.js';
import type { CachedIpSnapshot, IpAddressInfo } from '../../types/index.js';
import type { IpAddressDiscoveryService } from '../base/index.js';

export const NOIP_DISCOVERY_URL = 'http://ip1.dynupdate.no-ip.com/';

function noAddress(): IpAddressInfo {
  return { address: null, lastChecked: new Date(0), source: 'none' };
}

export interface NoIpDiscoveryOptions {
  httpClient: HttpClient;
  store: KeyValueStore<CachedIpSnapshot>;
  endpoint?: string;
  maxAgeMs?: number;
  eventBus?: EventBus;
  now?: () => Date;
}

export class NoIpDiscoveryService implements IpAddressDiscoveryService {
  private logger: Logger;
  private readonly httpClient: HttpClient;
  private readonly store: KeyValueStore<CachedIpSnapshot>;
  private readonly endpoint: string;
  private readonly maxAgeMs: number;
  private readonly eventBus?: EventBus;
  private readonly now: () => Date;

  constructor(options: NoIpDiscoveryOptions) {
    this.logger = createChildLogger({ service: 'IpDiscovery', provider: 'noip' });
    this.httpClient = options.httpClient;
    this.store = options.store;
    this.endpoint = options.endpoint ?? NOIP_DISCOVERY_URL;
    this.maxAgeMs = options.maxAgeMs ?? 60 * 60 * 1000;
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => new Date());
  }

  async getIpAddress(): Promise<IpAddressInfo> {
    const cached = await this.getIpAddressFromStorage();
    const staleBefore = this.now().getTime() - this.maxAgeMs;

    if (cached.source !== 'none' && cached.lastChecked.getTime() > staleBefore) {
      this.logger.debug({ address: cached.address, source: 'cache' }, 'Using cached IP address');
      return cached;
    }

    const discovered = await this.getIpAddressFromService();

    if (discovered.address !== null) {
      await this.store.set({ ipAddress: discovered.address, lastTimeChecked: discovered.lastChecked });

      if (discovered.address !== cached.address) {
        this.logger.info({ address: discovered.address, previous: cached.address }, 'Public IP address changed');
        this.eventBus?.publish(EventTypes.IP_UPDATED, {
          provider: 'noip',
          address: discovered.address,
          previous: cached.address,
        });
      }
    }

    return discovered;
  }

  private async getIpAddressFromStorage(): Promise<IpAddressInfo> {
    const snapshot = await this.store.get();

    if (!snapshot) {
      return noAddress();
    }

    return { address: snapshot.ipAddress, lastChecked: snapshot.lastTimeChecked, source: 'cache' };
  }

  private async getIpAddressFromService(): Promise<IpAddressInfo> {
    let status: number;
    let body: string;

    try {
      const response = await this.httpClient.get(this.endpoint);
      status = response.status;
      body = await response.text();

      if (!response.ok) {
        return this.fail(`status ${status}`, { status, body });
      }
    } catch (error) {
      return this.fail(errorMessage(error), { error });
    }

    const address = body.trim();
    if (address.length === 0) {
      return this.fail('empty response body', { status });
    }

    return { address, lastChecked: this.now(), source: 'network' };
  }

  private fail(reason: string, context: Record<string, unknown>): IpAddressInfo {
    this.logger.warn(context, `Failed to fetch IP address: ${reason}`);
    this.eventBus?.publish(EventTypes.IP_DISCOVERY_FAILED, { provider: 'noip', reason });
    return noAddress();
  }
}
