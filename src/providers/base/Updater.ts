/**
 * Contracts shared by dynamic DNS integrations
 */
import type { Hostname, IpAddress, IpAddressInfo, UpdatePassResult } from '../../types/index.js';

/**
 * Resolves the current public IP address. Never rejects: failures are
 * reported as an info value with `source: 'none'`.
 */
export interface IpAddressDiscoveryService {
  getIpAddress(): Promise<IpAddressInfo>;
}

/**
 * One dynamic DNS integration driven by the scheduler.
 * `update()` performs a full reconciliation pass and never rejects.
 */
export interface Updater {
  readonly name: string;
  update(): Promise<UpdatePassResult>;
}

/**
 * Decide whether a hostname must be submitted to the provider.
 *
 * @param detected - address found by discovery for this pass
 * @param stored - address last confirmed by the provider for this hostname
 * @param desired - configured override to push instead of the detected address
 */
export function needsUpdate(detected: IpAddress | null, stored: IpAddress | null, desired: IpAddress | null): boolean {
  if (detected === null || stored === null) {
    return true;
  }

  if (desired === null) {
    return detected !== stored;
  }

  // With an override, what matters is whether the override differs from what the host really has
  return desired !== detected;
}

/**
 * Ordered subset of `hostnames` that need an update
 */
export function selectHostnamesToUpdate(
  hostnames: readonly Hostname[],
  detected: IpAddress | null,
  stored: Readonly<Record<Hostname, IpAddress>>,
  desired: IpAddress | null
): Hostname[] {
  return hostnames.filter((hostname) =>
    needsUpdate(detected, Object.hasOwn(stored, hostname) ? stored[hostname] ?? null : null, desired)
  );
}
