import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('loadConfig', () => {
  it('reads house style and thresholds from the environment', () => {
    vi.stubEnv('MAX_HASHTAGS', '5');
    vi.stubEnv('ALERT_HIGH_CTR', '0.2');
    vi.stubEnv('APPLY_GRAMMAR_CORRECTION', 'off');
    vi.stubEnv('METRICS_STORE', 'csv');

    const config = loadConfig();

    expect(config.maxHashtags).toBe(5);
    expect(config.alertHighCtr).toBe(0.2);
    expect(config.applyGrammarCorrection).toBe(false);
    expect(config.metricsStore).toBe('csv');
  });

  it('lets overrides win', () => {
    vi.stubEnv('MAX_WORDS', '80');
    const config = loadConfig({ maxWords: 40, dataDir: '/tmp/postmetrics-data' });

    expect(config.maxWords).toBe(40);
    expect(config.metricsDbPath).toBe('/tmp/postmetrics-data/postmetrics.db');
    expect(config.metricsCsvPath).toBe('/tmp/postmetrics-data/metrics.csv');
  });

  it('rejects an unknown store kind', () => {
    vi.stubEnv('METRICS_STORE', 'redis');
    expect(() => loadConfig()).toThrow('METRICS_STORE must be "sqlite" or "csv", got "redis"');
  });
});
