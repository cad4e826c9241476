import type { DeviceRecord, RecentDevicesInput } from '@wids/kismet-client';
import type { ServiceConfig } from '../config/serviceConfig';
import { BulkDeliveryError, type DeliveryReport } from '../elasticsearch/bulkSink';
import { buildFeatureRecord, type FeatureRecord } from '../features/featureRecord';
import { selectFieldAdapter } from '../features/fieldAdapter';
import type { Logger } from '../observability/logger';

export interface DeviceSource {
  getRecentDevices(input: RecentDevicesInput): Promise<DeviceRecord[]>;
}

export interface FeatureSink {
  deliver(records: readonly FeatureRecord[]): Promise<DeliveryReport>;
}

export interface CollectionCycleDependencies {
  config: Readonly<ServiceConfig>;
  source: DeviceSource;
  sink: FeatureSink;
  logger: Logger;
  now?: () => Date;
  /** Cancels an in-flight fetch when the service shuts down. */
  signal?: AbortSignal;
}

interface CycleTiming {
  startedAt: string;
  durationMs: number;
}

interface CycleCounts {
  fetched: number;
  skipped: number;
}

export type CycleOutcome =
  | (CycleTiming & CycleCounts & { status: 'indexed'; indexed: number })
  | (CycleTiming & CycleCounts & { status: 'empty' })
  | (CycleTiming & { status: 'fetch_failed'; error: unknown })
  | (CycleTiming & CycleCounts & { status: 'delivery_partial'; attempted: number; failed: number; error: BulkDeliveryError })
  | (CycleTiming & CycleCounts & { status: 'delivery_failed'; attempted: number; error: unknown });

export type CycleStatus = CycleOutcome['status'];

/**
 * Fetch, transform and deliver once. Every failure is folded into the
 * returned outcome; this function does not throw for upstream or sink errors.
 */
export async function runCollectionCycle(deps: CollectionCycleDependencies): Promise<CycleOutcome> {
  const { config, source, sink } = deps;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger.child({ component: 'collector' });
  const started = now();
  const startedAt = started.toISOString();
  const elapsed = () => Math.max(0, now().getTime() - started.getTime());

  logger.debug({ startedAt }, 'Starting collection cycle');

  let devices: DeviceRecord[];
  try {
    devices = await source.getRecentDevices({
      windowSeconds: config.kismet.windowSeconds,
      ...(deps.signal ? { signal: deps.signal } : {})
    });
  } catch (error) {
    if (deps.signal?.aborted) {
      logger.info({ startedAt }, 'Kismet fetch cancelled by shutdown');
      return { status: 'fetch_failed', startedAt, durationMs: elapsed(), error };
    }
    logger.error({ err: error, startedAt }, 'Failed to fetch devices from Kismet');
    return { status: 'fetch_failed', startedAt, durationMs: elapsed(), error };
  }

  const adapter = selectFieldAdapter(config.kismet.fieldLayout, devices);
  const records: FeatureRecord[] = [];
  let skipped = 0;
  for (const device of devices) {
    const result = buildFeatureRecord(device, {
      adapter,
      sensor: config.sensor,
      cycleTimestamp: startedAt
    });
    if (result.kind === 'record') {
      records.push(result.record);
    } else {
      skipped += 1;
    }
  }

  const counts: CycleCounts = { fetched: devices.length, skipped };
  if (skipped > 0) {
    logger.debug({ ...counts, layout: adapter.layout }, 'Skipped devices without a hardware address');
  }

  if (records.length === 0) {
    logger.debug(counts, 'No devices to index this cycle');
    return { status: 'empty', startedAt, durationMs: elapsed(), ...counts };
  }

  try {
    const report = await sink.deliver(records);
    return { status: 'indexed', startedAt, durationMs: elapsed(), ...counts, indexed: report.indexed };
  } catch (error) {
    if (error instanceof BulkDeliveryError && error.partial) {
      logger.warn(
        { ...counts, attempted: error.total, failed: error.failed, reasons: error.reasons },
        'Bulk write partially failed'
      );
      return {
        status: 'delivery_partial',
        startedAt,
        durationMs: elapsed(),
        ...counts,
        attempted: error.total,
        failed: error.failed,
        error
      };
    }
    logger.error({ err: error, ...counts, attempted: records.length }, 'Failed to deliver feature documents');
    return {
      status: 'delivery_failed',
      startedAt,
      durationMs: elapsed(),
      ...counts,
      attempted: records.length,
      error
    };
  }
}
