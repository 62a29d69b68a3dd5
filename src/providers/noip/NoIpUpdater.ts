/**
 * No-IP dynamic DNS updater
 *
 * One pass: discover the public address once, then for each configured account
 * submit the hostnames whose recorded address is out of date and commit the
 * hostnames the provider confirms.
 */
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../../core/Logger.js';
import { EventTypes, type EventBus } from '../../core/EventBus.js';
import { errorMessage } from '../../core/errors.js';
import { basicAuthorization, type HttpClient } from '../../http/HttpClient.js';
import type { KeyValueStore } from '../../storage/StorageContainer.js';
import {
  isValidIpAddressInfo,
  type EntryResult,
  type EntryStatus,
  type Hostname,
  type HostnameIpMap,
  type IpAddressInfo,
  type ProviderConfigEntry,
  type ServerResponseLine,
  type UpdatePassResult,
} from '../../types/index.js';
import { selectHostnamesToUpdate, type IpAddressDiscoveryService, type Updater } from '../base/index.js';
import { parseResponse } from './responseParser.js';

export const NOIP_UPDATE_URL = 'https://dynupdate.no-ip.com/nic/update';

export interface NoIpUpdaterOptions {
  httpClient: HttpClient;
  discovery: IpAddressDiscoveryService;
  store: KeyValueStore<HostnameIpMap>;
  entries: readonly ProviderConfigEntry[];
  updateUrl?: string;
  eventBus?: EventBus;
}

/**
 * Render an entry for logs with the password masked
 */
export function describeEntry(entry: ProviderConfigEntry): string {
  const ipAddress = entry.desiredIpAddress !== null ? `'${entry.desiredIpAddress}'` : 'null';
  return `username: '${entry.username}' password: *${entry.password.length}* hostnames: '${entry.hostnames.join(',')}' ipAddress: ${ipAddress}`;
}

export class NoIpUpdater implements Updater {
  readonly name = 'noip.com DNS service';

  private logger: Logger;
  private readonly httpClient: HttpClient;
  private readonly discovery: IpAddressDiscoveryService;
  private readonly store: KeyValueStore<HostnameIpMap>;
  private readonly entries: readonly ProviderConfigEntry[];
  private readonly updateUrl: string;
  private readonly eventBus?: EventBus;

  constructor(options: NoIpUpdaterOptions) {
    this.logger = createChildLogger({ service: 'NoIpUpdater', provider: 'noip' });
    this.httpClient = options.httpClient;
    this.discovery = options.discovery;
    this.store = options.store;
    this.entries = options.entries;
    this.updateUrl = options.updateUrl ?? NOIP_UPDATE_URL;
    this.eventBus = options.eventBus;
  }

  async update(): Promise<UpdatePassResult> {
    const passId = uuidv4();
    const startedAt = new Date();
    const logger = this.logger.child({ passId });

    this.eventBus?.publish(EventTypes.DDNS_PASS_STARTED, { passId, updater: this.name });

    const detected = await this.discovery.getIpAddress();
    if (!isValidIpAddressInfo(detected)) {
      logger.warn('No public IP address available, letting the provider detect it');
    }

    const db: HostnameIpMap = { ...(await this.store.get()) };
    const entries: EntryResult[] = [];

    for (const entry of this.entries) {
      let result: EntryResult;
      try {
        result = await this.updateEntry(entry, detected, db, passId, logger);
      } catch (error) {
        logger.error({ username: entry.username, error }, `Unexpected failure while updating entry: ${errorMessage(error)}`);
        this.eventBus?.publish(EventTypes.ERROR_OCCURRED, {
          source: 'NoIpUpdater.update',
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        result = { username: entry.username, status: 'transport-error', submitted: [], confirmed: [] };
      }

      if (result.confirmed.length > 0) {
        await this.store.set(db);
      }

      entries.push(result);
    }

    const durationMs = Date.now() - startedAt.getTime();
    const hostnamesConfirmed = entries.reduce((sum, entry) => sum + entry.confirmed.length, 0);
    const failures = entries
      .filter((entry) => !['up-to-date', 'updated'].includes(entry.status))
      .map((entry) => ({ username: entry.username, status: entry.status }));

    if (failures.length > 0) {
      logger.warn({ failures: failures.length, durationMs }, `DNS update pass finished with errors`);
    } else if (hostnamesConfirmed > 0) {
      logger.info({ count: hostnamesConfirmed, durationMs }, `${symbols.success} DNS update pass complete`);
    } else {
      logger.debug({ durationMs }, 'All hostnames up to date');
    }

    this.eventBus?.publish(EventTypes.DDNS_PASS_COMPLETED, {
      passId,
      updater: this.name,
      entries: entries.length,
      hostnamesConfirmed,
      failures,
      durationMs,
    });

    return { passId, updater: this.name, detected, entries, startedAt, durationMs };
  }

  private async updateEntry(
    entry: ProviderConfigEntry,
    detected: IpAddressInfo,
    db: HostnameIpMap,
    passId: string,
    passLogger: Logger
  ): Promise<EntryResult> {
    const logger = passLogger.child({ username: entry.username });
    const submitted = selectHostnamesToUpdate(entry.hostnames, detected.address, db, entry.desiredIpAddress);
    const result = (status: EntryStatus, confirmed: Hostname[] = []): EntryResult => ({
      username: entry.username,
      status,
      submitted,
      confirmed,
    });

    if (submitted.length === 0) {
      logger.debug({ hostnames: entry.hostnames }, 'No hostname needs an update');
      return result('up-to-date');
    }

    logger.info({ hostnames: submitted }, `${symbols.dns} Submitting DNS update`);
    logger.debug(describeEntry(entry));

    let response: Response;
    let body: string;
    try {
      response = await this.httpClient.get(this.buildUpdateUrl(submitted, entry), {
        headers: { Authorization: basicAuthorization(entry.username, entry.password) },
      });
      body = await response.text();
    } catch (error) {
      logger.error({ error }, `DNS update request failed: ${errorMessage(error)}`);
      return result('transport-error');
    }

    logger.info({ status: response.status, body }, 'DNS update response');
    if (!response.ok) {
      logger.warn({ status: response.status }, 'DNS update returned a non-success status');
      if (response.status >= 500) {
        logger.warn('Provider failure, retry no sooner than 30 minutes');
      }
    }

    const lines = parseResponse(body, logger);

    if (lines.length !== submitted.length) {
      logger.error(
        { submitted: submitted.length, received: lines.length },
        `Provided ${submitted.length} hostnames to server and server responded with ${lines.length} results`
      );
      return result('protocol-error');
    }

    const confirmed = this.commitConfirmed(submitted, lines, detected, db, passId, logger);
    return result(this.entryStatus(lines, confirmed, entry, passId, submitted), confirmed);
  }

  private buildUpdateUrl(hostnames: Hostname[], entry: ProviderConfigEntry): URL {
    const url = new URL(this.updateUrl);
    url.searchParams.set('hostname', hostnames.join(','));
    if (entry.desiredIpAddress !== null) {
      url.searchParams.set('myip', entry.desiredIpAddress);
    }
    return url;
  }

  /**
   * Record the address of every hostname the provider confirmed
   */
  private commitConfirmed(
    submitted: Hostname[],
    lines: ServerResponseLine[],
    detected: IpAddressInfo,
    db: HostnameIpMap,
    passId: string,
    logger: Logger
  ): Hostname[] {
    const confirmed: Hostname[] = [];

    submitted.forEach((hostname, index) => {
      const line = lines[index];
      if (!line || (line.status !== 'update' && line.status !== 'no-change')) {
        return;
      }

      const address = detected.address ?? line.address;
      if (!address) {
        logger.warn({ hostname }, 'Provider confirmed hostname without an address, not recording it');
        return;
      }

      Object.defineProperty(db, hostname, { value: address, enumerable: true, writable: true, configurable: true });
      confirmed.push(hostname);
      this.eventBus?.publish(EventTypes.DDNS_HOSTNAME_CONFIRMED, { passId, hostname, address, status: line.status });
    });

    if (confirmed.length > 0) {
      logger.info({ hostnames: confirmed }, `${symbols.success} Hostnames confirmed`);
    }

    return confirmed;
  }

  private entryStatus(
    lines: ServerResponseLine[],
    confirmed: Hostname[],
    entry: ProviderConfigEntry,
    passId: string,
    submitted: Hostname[]
  ): EntryStatus {
    const userErrors = lines.filter((line) => line.status === 'user-error');
    if (userErrors.length > 0) {
      this.eventBus?.publish(EventTypes.DDNS_USER_ERROR, {
        passId,
        username: entry.username,
        hostnames: submitted,
        codes: [...new Set(userErrors.map((line) => line.raw))],
      });
      return 'user-error';
    }

    if (lines.some((line) => line.status === 'server-error')) {
      return 'server-error';
    }

    return confirmed.length > 0 ? 'updated' : 'protocol-error';
  }
}
