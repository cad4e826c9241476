import type { estypes } from '@elastic/elasticsearch';
import type { DeviceRecord, RecentDevicesInput } from '@wids/kismet-client';
import { loadServiceConfig, type ServiceConfig } from '../src/config/serviceConfig';
import type { BulkIndexClient } from '../src/elasticsearch/client';
import type { FeatureDocument } from '../src/elasticsearch/document';
import type { DeliveryReport } from '../src/elasticsearch/bulkSink';
import type { FeatureRecord } from '../src/features/featureRecord';
import { createLogger, type Logger } from '../src/observability/logger';

export interface CapturedLogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function isLogLine(value: unknown): value is CapturedLogLine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

export function createSilentLogger(): Logger {
  return createLogger('silent');
}

export function createCapturingLogger(): { logger: Logger; lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  const logger = createLogger('debug', {
    write(chunk: string) {
      const parsed: unknown = JSON.parse(chunk);
      if (isLogLine(parsed)) {
        lines.push(parsed);
      }
    }
  });
  return { logger, lines };
}

export function createTestConfig(overrides: Record<string, string> = {}): Readonly<ServiceConfig> {
  return loadServiceConfig({
    SENSOR_ID: 'sensor-01',
    SENSOR_SITE: 'lab',
    KISMET_URL: 'http://kismet.test:2501',
    ES_URL: 'http://elasticsearch.test:9200',
    ...overrides
  });
}

type SourceStep = DeviceRecord[] | Error;

export class ScriptedDeviceSource {
  readonly requests: RecentDevicesInput[] = [];
  private readonly steps: SourceStep[];

  constructor(steps: SourceStep[]) {
    this.steps = [...steps];
  }

  async getRecentDevices(input: RecentDevicesInput): Promise<DeviceRecord[]> {
    this.requests.push(input);
    const step = this.steps.shift();
    if (step === undefined) {
      return [];
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export class RecordingSink {
  readonly batches: FeatureRecord[][] = [];
  failWith: Error | null = null;

  async deliver(records: readonly FeatureRecord[]): Promise<DeliveryReport> {
    this.batches.push([...records]);
    if (this.failWith) {
      throw this.failWith;
    }
    return { index: 'wids-wireless-features', indexed: records.length, tookMs: 3 };
  }
}

export class FakeBulkClient implements BulkIndexClient {
  readonly requests: estypes.BulkRequest<FeatureDocument>[] = [];
  nextResponse: ((request: estypes.BulkRequest<FeatureDocument>) => estypes.BulkResponse) | null = null;
  closed = false;

  async bulk(request: estypes.BulkRequest<FeatureDocument>): Promise<estypes.BulkResponse> {
    this.requests.push(request);
    if (this.nextResponse) {
      return this.nextResponse(request);
    }
    const documents = (request.operations ?? []).length / 2;
    return {
      errors: false,
      took: 7,
      items: Array.from({ length: documents }, () => ({
        index: { _index: 'wids-wireless-features', status: 201 }
      }))
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}
