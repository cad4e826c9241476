import type { FeatureRecord } from '../features/featureRecord';

export type FeatureDocument = Omit<FeatureRecord, 'timestamp' | 'sensor_id' | 'sensor_site'> & {
  '@timestamp': string;
  sensor: {
    id: string;
    site: string;
  };
};

export function toIndexDocument(record: FeatureRecord): FeatureDocument {
  const { timestamp, sensor_id: sensorId, sensor_site: sensorSite, ...features } = record;
  return {
    '@timestamp': timestamp,
    sensor: { id: sensorId, site: sensorSite },
    ...features
  };
}
