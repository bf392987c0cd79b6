import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// CLI root is always cli/ regardless of whether running from src/ or dist/
const CLI_ROOT = path.resolve(__dirname, '..');
const PROJECT_ROOT = path.resolve(CLI_ROOT, '..');

export type MetricsStoreKind = 'sqlite' | 'csv';

export interface Config {
  // Paths
  dataDir: string;
  metricsStore: MetricsStoreKind;
  metricsDbPath: string;
  metricsCsvPath: string;

  // Notifications
  slackWebhookUrl: string;

  // House style
  maxHashtags: number;
  minWords: number;
  maxWords: number;
  applyGrammarCorrection: boolean;

  // Alert thresholds
  alertHighCtr: number;
  alertHighEngagement: number;
  alertLowCtr: number;

  // Logging
  logLevel: string;
}

function loadEnvFile(): void {
  const envPaths = [
    path.resolve(CLI_ROOT, '.env'),         // cli/.env
    path.resolve(PROJECT_ROOT, '.env'),     // project root .env
  ];

  for (const envPath of envPaths) {
    if (!fs.existsSync(envPath)) continue;
    const envText = fs.readFileSync(envPath, 'utf-8');
    for (const line of envText.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const eq = trimmed.indexOf('=');
      if (eq > 0) {
        const key = trimmed.slice(0, eq).trim();
        const val = trimmed.slice(eq + 1).trim();
        if (!process.env[key]) process.env[key] = val;
      }
    }
  }
}

function loadRcFile(): Record<string, unknown> {
  const rcPath = path.resolve(CLI_ROOT, '.postmetricsrc.json');
  if (!fs.existsSync(rcPath)) return {};
  const parsed: unknown = JSON.parse(fs.readFileSync(rcPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${rcPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string' || value === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const raw = (key: string): unknown => process.env[key] ?? rc[key];

  const env = (key: string, fallback = ''): string => {
    const value = raw(key);
    return typeof value === 'string' && value !== '' ? value : fallback;
  };

  const num = (key: string, fallback: number): number => Number(raw(key)) || fallback;

  const dataDir = overrides.dataDir ?? path.resolve(env('DATA_DIR', path.resolve(CLI_ROOT, 'data')));
  const storeKind = overrides.metricsStore ?? env('METRICS_STORE', 'sqlite');
  if (storeKind !== 'sqlite' && storeKind !== 'csv') {
    throw new Error(`METRICS_STORE must be "sqlite" or "csv", got "${storeKind}"`);
  }

  return {
    dataDir,
    metricsStore: storeKind,
    metricsDbPath: overrides.metricsDbPath ?? env('METRICS_DB_PATH', path.join(dataDir, 'postmetrics.db')),
    metricsCsvPath: overrides.metricsCsvPath ?? env('METRICS_CSV_PATH', path.join(dataDir, 'metrics.csv')),

    slackWebhookUrl: overrides.slackWebhookUrl ?? env('SLACK_WEBHOOK_URL'),

    maxHashtags: overrides.maxHashtags ?? num('MAX_HASHTAGS', 3),
    minWords: overrides.minWords ?? num('MIN_WORDS', 50),
    maxWords: overrides.maxWords ?? num('MAX_WORDS', 100),
    applyGrammarCorrection: overrides.applyGrammarCorrection ?? parseFlag(raw('APPLY_GRAMMAR_CORRECTION'), true),

    alertHighCtr: overrides.alertHighCtr ?? num('ALERT_HIGH_CTR', 0.10),
    alertHighEngagement: overrides.alertHighEngagement ?? num('ALERT_HIGH_ENGAGEMENT', 0.15),
    alertLowCtr: overrides.alertLowCtr ?? num('ALERT_LOW_CTR', 0.02),

    logLevel: overrides.logLevel ?? env('LOG_LEVEL', 'info'),
  };
}
