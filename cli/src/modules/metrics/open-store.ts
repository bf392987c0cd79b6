import type { Config } from '../../config.js';
import { getDb } from '../state/db.js';
import { createMetricsModel } from '../state/models/metrics.js';
import { createCsvMetricsStore } from './csv-store.js';
import type { MetricsStore } from './store.js';

export type MetricsStoreConfig = Pick<Config, 'metricsStore' | 'metricsDbPath' | 'metricsCsvPath'>;

export function openMetricsStore(config: MetricsStoreConfig): MetricsStore {
  switch (config.metricsStore) {
    case 'csv':
      return createCsvMetricsStore(config.metricsCsvPath);
    case 'sqlite':
      return createMetricsModel(getDb(config.metricsDbPath));
  }
}
