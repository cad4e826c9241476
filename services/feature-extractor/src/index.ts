import { KismetClient } from '@wids/kismet-client';
import { runCollectionCycle } from './collector/cycle';
import { CollectorScheduler } from './collector/scheduler';
import { installShutdownHandlers } from './collector/shutdown';
import { loadServiceConfig } from './config/serviceConfig';
import { ElasticsearchBulkSink } from './elasticsearch/bulkSink';
import { createElasticsearchClient } from './elasticsearch/client';
import { createLogger } from './observability/logger';

const USER_AGENT = 'wids-feature-extractor/0.1.0';

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const logger = createLogger(config.logLevel);

  const source = new KismetClient({
    baseUrl: config.kismet.baseUrl,
    timeoutMs: config.kismet.timeoutMs,
    credentials: config.kismet.credentials ?? undefined,
    userAgent: USER_AGENT
  });
  const esClient = createElasticsearchClient(config.elasticsearch);
  const sink = new ElasticsearchBulkSink(esClient, {
    index: config.elasticsearch.index,
    pipeline: config.elasticsearch.pipeline,
    logger
  });

  logger.info(
    { sensorId: config.sensor.id, sensorSite: config.sensor.site, pollIntervalMs: config.pollIntervalMs },
    'Starting WIDS feature extractor'
  );
  logger.info(
    { kismetUrl: config.kismet.baseUrl, windowSeconds: config.kismet.windowSeconds, layout: config.kismet.fieldLayout },
    'Polling Kismet for recently active devices'
  );
  logger.info(
    {
      elasticsearchUrl: config.elasticsearch.node,
      index: config.elasticsearch.index,
      pipeline: config.elasticsearch.pipeline,
      verifyCertificates: config.elasticsearch.verifyCertificates
    },
    'Indexing feature documents into Elasticsearch'
  );
  if (!config.elasticsearch.verifyCertificates) {
    logger.warn('TLS certificate verification is disabled for Elasticsearch');
  }

  const controller = new AbortController();
  const removeShutdownHandlers = installShutdownHandlers({ controller, logger });

  const scheduler = new CollectorScheduler({
    intervalMs: config.pollIntervalMs,
    logger,
    runCycle: () => runCollectionCycle({ config, source, sink, logger, signal: controller.signal })
  });

  const totals = await scheduler.run(controller.signal);
  removeShutdownHandlers();
  await esClient.close();
  logger.info({ totals }, 'WIDS feature extractor stopped');
}

main().catch((error) => {
  createLogger('fatal').fatal({ err: error }, 'WIDS feature extractor failed');
  process.exitCode = 1;
});
