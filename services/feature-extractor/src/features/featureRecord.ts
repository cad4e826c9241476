import type { DeviceRecord } from '@wids/kismet-client';
import { ssidEntropy } from './entropy';
import type { FieldAdapter, SkipReason } from './fieldAdapter';
import { hasEpoch, normalizeEpoch } from './timestamps';

export interface SensorIdentity {
  id: string;
  site: string;
}

export interface FeatureRecord {
  readonly timestamp: string;
  readonly sensor_id: string;
  readonly sensor_site: string;
  readonly bssid: string;
  readonly ssid?: string;
  readonly ssid_entropy: number;
  readonly manufacturer?: unknown;
  readonly channel?: unknown;
  readonly phy_type?: unknown;
  readonly first_seen?: string;
  readonly last_seen?: string;
  readonly rssi_last?: number;
  readonly rssi_min?: number;
  readonly rssi_max?: number;
  readonly rssi_mean?: number;
  readonly client_count: number;
  // Reserved for delta tracking across cycles; never populated yet.
  readonly deauth_count_approx?: never;
  readonly probe_req_count_approx?: never;
}

export interface FeatureBuildContext {
  adapter: FieldAdapter;
  sensor: SensorIdentity;
  /** Cycle start as ISO-8601; stands in for missing or malformed device times. */
  cycleTimestamp: string;
}

export type FeatureBuildResult =
  | { kind: 'record'; record: FeatureRecord }
  | { kind: 'skip'; reason: SkipReason };

export function buildFeatureRecord(
  device: DeviceRecord,
  context: FeatureBuildContext
): FeatureBuildResult {
  const resolution = context.adapter.resolveDevice(device);
  if (resolution.kind === 'skip') {
    return resolution;
  }

  const { attributes } = resolution;
  const { cycleTimestamp } = context;
  const lastSeen = hasEpoch(attributes.lastSeen)
    ? normalizeEpoch(attributes.lastSeen, cycleTimestamp)
    : undefined;
  const firstSeen = hasEpoch(attributes.firstSeen)
    ? normalizeEpoch(attributes.firstSeen, cycleTimestamp)
    : undefined;

  const { displayName } = attributes;
  // Absent attributes are left out of the record rather than set to undefined.
  const record: FeatureRecord = {
    timestamp: lastSeen ?? cycleTimestamp,
    sensor_id: context.sensor.id,
    sensor_site: context.sensor.site,
    bssid: attributes.hardwareAddress,
    ...(displayName !== undefined ? { ssid: displayName } : {}),
    ssid_entropy: displayName ? ssidEntropy(displayName) : 0,
    ...(attributes.manufacturer !== undefined ? { manufacturer: attributes.manufacturer } : {}),
    ...(attributes.channel !== undefined ? { channel: attributes.channel } : {}),
    ...(attributes.phyType !== undefined ? { phy_type: attributes.phyType } : {}),
    ...(firstSeen !== undefined ? { first_seen: firstSeen } : {}),
    ...(lastSeen !== undefined ? { last_seen: lastSeen } : {}),
    ...(attributes.rssiLast !== undefined ? { rssi_last: attributes.rssiLast } : {}),
    ...(attributes.rssiMin !== undefined ? { rssi_min: attributes.rssiMin } : {}),
    ...(attributes.rssiMax !== undefined ? { rssi_max: attributes.rssiMax } : {}),
    ...(attributes.rssiMean !== undefined ? { rssi_mean: attributes.rssiMean } : {}),
    client_count: attributes.clientCount ?? 0
  };

  return { kind: 'record', record: Object.freeze(record) };
}
