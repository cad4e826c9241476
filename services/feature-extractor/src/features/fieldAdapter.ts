import type { DeviceRecord } from '@wids/kismet-client';
import type { FieldLayout } from '../config/serviceConfig';

export type ResolvedFieldLayout = Exclude<FieldLayout, 'auto'>;

export type AttributeName =
  | 'hardwareAddress'
  | 'displayName'
  | 'manufacturer'
  | 'channel'
  | 'phyType'
  | 'firstSeen'
  | 'lastSeen'
  | 'rssiLast'
  | 'rssiMin'
  | 'rssiMax'
  | 'rssiMean'
  | 'clientCount';

/**
 * Where one source field lives under each layout. `nested` walks namespace
 * objects key by key; `flat` is the single key Kismet emits when field
 * simplification is requested.
 */
export interface FieldCandidate {
  nested: readonly string[];
  flat: string;
}

export interface DeviceAttributes {
  hardwareAddress: string;
  displayName?: string;
  // Descriptive values are forwarded exactly as Kismet reported them.
  manufacturer?: unknown;
  channel?: unknown;
  phyType?: unknown;
  firstSeen?: unknown;
  lastSeen?: unknown;
  rssiLast?: number;
  rssiMin?: number;
  rssiMax?: number;
  rssiMean?: number;
  clientCount?: number;
}

export type SkipReason = 'missing_hardware_address';

export type DeviceResolution =
  | { kind: 'device'; attributes: DeviceAttributes }
  | { kind: 'skip'; reason: SkipReason };

const BASE_NAMESPACE = 'kismet.device.base';
const DOT11_NAMESPACE = 'dot11.device';

function baseField(key: string): FieldCandidate {
  return { nested: [BASE_NAMESPACE, key], flat: `${BASE_NAMESPACE}.${key}` };
}

function signalField(stat: string): FieldCandidate {
  const key = `kismet.common.signal.${stat}`;
  return { nested: [BASE_NAMESPACE, 'signal', key], flat: key };
}

// Candidates are tried in order; the first present value wins.
export const ATTRIBUTE_CANDIDATES: Readonly<Record<AttributeName, readonly FieldCandidate[]>> = {
  hardwareAddress: [baseField('macaddr')],
  displayName: [baseField('name'), baseField('commonname')],
  manufacturer: [baseField('manuf')],
  channel: [baseField('channel')],
  phyType: [baseField('phyname')],
  firstSeen: [baseField('first_time')],
  lastSeen: [baseField('last_time')],
  rssiLast: [signalField('last_signal'), signalField('last')],
  rssiMin: [signalField('min_signal'), signalField('min')],
  rssiMax: [signalField('max_signal'), signalField('max')],
  rssiMean: [signalField('avg')],
  clientCount: [
    baseField('num_clients'),
    {
      nested: [DOT11_NAMESPACE, `${DOT11_NAMESPACE}.num_associated_clients`],
      flat: `${DOT11_NAMESPACE}.num_associated_clients`
    }
  ]
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asCount(value: unknown): number | undefined {
  const numeric = asFiniteNumber(value);
  if (numeric === undefined || numeric < 0) {
    return undefined;
  }
  return Math.trunc(numeric);
}

export abstract class FieldAdapter {
  abstract readonly layout: ResolvedFieldLayout;

  protected abstract lookup(device: DeviceRecord, candidate: FieldCandidate): unknown;

  /**
   * Raw value of a logical attribute, or `undefined` when no candidate key is
   * present. Only `null` and the empty string count as absent, so that a
   * later candidate can supply the value.
   */
  resolve(device: DeviceRecord, attribute: AttributeName): unknown {
    for (const candidate of ATTRIBUTE_CANDIDATES[attribute]) {
      const value = this.lookup(device, candidate);
      if (isPresent(value)) {
        return value;
      }
    }
    return undefined;
  }

  resolveDevice(device: DeviceRecord): DeviceResolution {
    const hardwareAddress = asString(this.resolve(device, 'hardwareAddress'));
    if (!hardwareAddress) {
      return { kind: 'skip', reason: 'missing_hardware_address' };
    }

    return {
      kind: 'device',
      attributes: {
        hardwareAddress,
        displayName: asString(this.resolve(device, 'displayName')),
        manufacturer: this.resolve(device, 'manufacturer'),
        channel: this.resolve(device, 'channel'),
        phyType: this.resolve(device, 'phyType'),
        firstSeen: this.resolve(device, 'firstSeen'),
        lastSeen: this.resolve(device, 'lastSeen'),
        rssiLast: asFiniteNumber(this.resolve(device, 'rssiLast')),
        rssiMin: asFiniteNumber(this.resolve(device, 'rssiMin')),
        rssiMax: asFiniteNumber(this.resolve(device, 'rssiMax')),
        rssiMean: asFiniteNumber(this.resolve(device, 'rssiMean')),
        clientCount: asCount(this.resolve(device, 'clientCount'))
      }
    };
  }
}

export class NestedFieldAdapter extends FieldAdapter {
  readonly layout = 'nested' as const;

  protected lookup(device: DeviceRecord, candidate: FieldCandidate): unknown {
    let current: unknown = device;
    for (const segment of candidate.nested) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }
}

export class FlattenedFieldAdapter extends FieldAdapter {
  readonly layout = 'flattened' as const;

  protected lookup(device: DeviceRecord, candidate: FieldCandidate): unknown {
    return device[candidate.flat];
  }
}

const nestedAdapter = new NestedFieldAdapter();
const flattenedAdapter = new FlattenedFieldAdapter();

export function createFieldAdapter(layout: ResolvedFieldLayout): FieldAdapter {
  return layout === 'nested' ? nestedAdapter : flattenedAdapter;
}

/**
 * Infers the layout from the first device that carries a recognizable base
 * namespace. Defaults to nested when nothing in the batch says otherwise.
 */
export function probeFieldLayout(devices: readonly DeviceRecord[]): ResolvedFieldLayout {
  for (const device of devices) {
    if (isRecord(device[BASE_NAMESPACE])) {
      return 'nested';
    }
    if (Object.keys(device).some((key) => key.startsWith(`${BASE_NAMESPACE}.`))) {
      return 'flattened';
    }
  }
  return 'nested';
}

export function selectFieldAdapter(
  layout: FieldLayout,
  devices: readonly DeviceRecord[]
): FieldAdapter {
  if (layout === 'auto') {
    return createFieldAdapter(probeFieldLayout(devices));
  }
  return createFieldAdapter(layout);
}
