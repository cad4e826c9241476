import type { estypes } from '@elastic/elasticsearch';
import type { Logger } from '../observability/logger';
import type { FeatureRecord } from '../features/featureRecord';
import type { BulkIndexClient } from './client';
import { toIndexDocument, type FeatureDocument } from './document';

const MAX_REPORTED_REASONS = 5;

export interface BulkSinkOptions {
  index: string;
  pipeline: string | null;
  logger: Logger;
}

export interface DeliveryReport {
  index: string;
  indexed: number;
  tookMs: number;
}

export class BulkDeliveryError extends Error {
  readonly total: number;
  readonly failed: number;
  readonly reasons: string[];

  constructor(message: string, options: { total: number; failed: number; reasons: string[] }) {
    super(message);
    this.name = 'BulkDeliveryError';
    this.total = options.total;
    this.failed = options.failed;
    this.reasons = options.reasons;
  }

  get partial(): boolean {
    return this.failed > 0 && this.failed < this.total;
  }
}

function describeItemError(error: estypes.ErrorCause): string {
  return error.reason ? `${error.type}: ${error.reason}` : error.type;
}

export class ElasticsearchBulkSink {
  private readonly logger: Logger;

  constructor(
    private readonly client: BulkIndexClient,
    private readonly options: BulkSinkOptions
  ) {
    this.logger = options.logger.child({ component: 'bulk-sink', index: options.index });
  }

  buildOperations(records: readonly FeatureRecord[]): NonNullable<estypes.BulkRequest<FeatureDocument>['operations']> {
    const { index, pipeline } = this.options;
    const operations: NonNullable<estypes.BulkRequest<FeatureDocument>['operations']> = [];
    for (const record of records) {
      operations.push({ index: pipeline ? { _index: index, pipeline } : { _index: index } });
      operations.push(toIndexDocument(record));
    }
    return operations;
  }

  /**
   * Writes the batch with a single bulk request. Any rejected item fails the
   * whole call with a {@link BulkDeliveryError}.
   */
  async deliver(records: readonly FeatureRecord[]): Promise<DeliveryReport> {
    const { index } = this.options;
    if (records.length === 0) {
      return { index, indexed: 0, tookMs: 0 };
    }

    const response = await this.client.bulk({ operations: this.buildOperations(records) });

    if (response.errors) {
      const reasons: string[] = [];
      let failed = 0;
      for (const item of response.items) {
        const error = item.index?.error;
        if (!error) {
          continue;
        }
        failed += 1;
        if (reasons.length < MAX_REPORTED_REASONS) {
          reasons.push(describeItemError(error));
        }
      }
      throw new BulkDeliveryError(`Bulk write rejected ${failed} of ${records.length} documents`, {
        total: records.length,
        failed,
        reasons
      });
    }

    this.logger.info({ count: records.length, tookMs: response.took }, `Indexed ${records.length} documents into ${index}`);
    return { index, indexed: records.length, tookMs: response.took };
  }
}
