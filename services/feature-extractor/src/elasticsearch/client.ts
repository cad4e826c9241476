import { Client } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import type { ServiceConfig } from '../config/serviceConfig';
import type { FeatureDocument } from './document';

type ElasticsearchSettings = ServiceConfig['elasticsearch'];

/**
 * The one call the sink makes. Tests substitute an in-process fake; the
 * process wires it to the official client.
 */
export interface BulkIndexClient {
  bulk(request: estypes.BulkRequest<FeatureDocument>): Promise<estypes.BulkResponse>;
  close(): Promise<void>;
}

export function createElasticsearchClient(settings: ElasticsearchSettings): BulkIndexClient {
  const client = new Client({
    node: settings.node,
    requestTimeout: settings.requestTimeoutMs,
    ...(settings.credentials
      ? { auth: { username: settings.credentials.username, password: settings.credentials.password } }
      : {}),
    tls: { rejectUnauthorized: settings.verifyCertificates }
  });

  return {
    bulk: (request) => client.bulk(request),
    close: () => client.close()
  };
}
