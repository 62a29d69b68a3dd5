/**
 * Core type definitions for ddns-sync
 */
import type { ProviderConfigEntry, HostnameIpMap, CachedIpSnapshot } from '../config/schema.js';

export type { ProviderConfigEntry, HostnameIpMap, CachedIpSnapshot };

// Plain aliases; addresses are passed through as the provider reports them
export type Hostname = string;
export type IpAddress = string;

// Where a discovered address came from
export type DataSource = 'none' | 'cache' | 'network';

export interface IpAddressInfo {
  readonly address: IpAddress | null;
  readonly lastChecked: Date;
  readonly source: DataSource;
}

export interface ValidIpAddressInfo extends IpAddressInfo {
  readonly address: IpAddress;
  readonly source: 'cache' | 'network';
}

export function isValidIpAddressInfo(info: IpAddressInfo): info is ValidIpAddressInfo {
  return info.address !== null && info.source !== 'none';
}

// Classification of one line of a dynamic DNS update response
export type ServerResponseStatus = 'update' | 'no-change' | 'server-error' | 'user-error' | 'unsupported';

export interface ServerResponseLine {
  status: ServerResponseStatus;
  raw: string;
  // Address echoed back by `good <ip>` and `nochg <ip>` lines
  address?: IpAddress;
}

export type EntryStatus =
  | 'up-to-date'
  | 'updated'
  | 'transport-error'
  | 'protocol-error'
  | 'server-error'
  | 'user-error';

export interface EntryResult {
  username: string;
  status: EntryStatus;
  submitted: Hostname[];
  confirmed: Hostname[];
}

export interface UpdatePassResult {
  passId: string;
  updater: string;
  detected: IpAddressInfo;
  entries: EntryResult[];
  startedAt: Date;
  durationMs: number;
}
