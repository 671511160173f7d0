import { ConfigError, ValidationError } from '../../utils/errors';
import { isNonEmptyString, isValidUrl } from '../../utils/validation';

/**
 * Process-level settings, read from the environment once at start-up.
 */
export interface EngineSettings {
  port: number;
  configPath: string;
  databasePath: string;
  telemetryUrl: string | null;
  workerPoolSize: number;
  schedulerTickMs: number;
  telemetryTimeoutMs: number;
  dispatchTimeoutMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryMaxAttempts: number;
  evaluationErrorThreshold: number;
  notificationRetentionHours: number;
}

export type SettingsKey = keyof EngineSettings;

type NumericSettingsKey = {
  [K in SettingsKey]: EngineSettings[K] extends number ? K : never;
}[SettingsKey];

export const ENV_VARS: Readonly<Record<SettingsKey, string>> = {
  port: 'PORT',
  configPath: 'CONFIG_PATH',
  databasePath: 'DATABASE_PATH',
  telemetryUrl: 'TELEMETRY_URL',
  workerPoolSize: 'WORKER_POOL_SIZE',
  schedulerTickMs: 'SCHEDULER_TICK_MS',
  telemetryTimeoutMs: 'TELEMETRY_TIMEOUT_MS',
  dispatchTimeoutMs: 'DISPATCH_TIMEOUT_MS',
  retryBaseDelayMs: 'RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'RETRY_MAX_DELAY_MS',
  retryMaxAttempts: 'RETRY_MAX_ATTEMPTS',
  evaluationErrorThreshold: 'EVALUATION_ERROR_THRESHOLD',
  notificationRetentionHours: 'NOTIFICATION_RETENTION_HOURS',
};

export const DEFAULT_SETTINGS: Readonly<EngineSettings> = {
  port: 3001,
  configPath: './config/alerting.json',
  databasePath: './data/alerts.sqlite',
  telemetryUrl: null,
  workerPoolSize: 4,
  schedulerTickMs: 1000,
  telemetryTimeoutMs: 10_000,
  dispatchTimeoutMs: 15_000,
  retryBaseDelayMs: 30_000,
  retryMaxDelayMs: 3_600_000,
  retryMaxAttempts: 10,
  evaluationErrorThreshold: 3,
  notificationRetentionHours: 168, // 7 days
};

const NUMERIC_KEYS: NumericSettingsKey[] = [
  'port',
  'workerPoolSize',
  'schedulerTickMs',
  'telemetryTimeoutMs',
  'dispatchTimeoutMs',
  'retryBaseDelayMs',
  'retryMaxDelayMs',
  'retryMaxAttempts',
  'evaluationErrorThreshold',
  'notificationRetentionHours',
];

function integerBetween(key: SettingsKey, value: string, min: number, max: number): string | null {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(n) || n < min || n > max) {
    return `${ENV_VARS[key]} must be an integer between ${min} and ${max}`;
  }
  return null;
}

/**
 * Validation rules for settings values.
 * Returns an error message if invalid, or null if valid.
 */
export function validateSettingValue(key: SettingsKey, value: string): string | null {
  switch (key) {
    case 'port':
      return integerBetween(key, value, 1, 65535);
    case 'configPath':
    case 'databasePath':
      return isNonEmptyString(value) ? null : `${ENV_VARS[key]} must not be empty`;
    case 'telemetryUrl':
      return isValidUrl(value) ? null : `${ENV_VARS[key]} must be an absolute HTTP or HTTPS URL`;
    case 'workerPoolSize':
      return integerBetween(key, value, 1, 64);
    case 'schedulerTickMs':
      return integerBetween(key, value, 100, 60_000);
    case 'telemetryTimeoutMs':
    case 'dispatchTimeoutMs':
      return integerBetween(key, value, 100, 300_000);
    case 'retryBaseDelayMs':
      return integerBetween(key, value, 100, 3_600_000);
    case 'retryMaxDelayMs':
      return integerBetween(key, value, 1000, 86_400_000);
    case 'retryMaxAttempts':
      return integerBetween(key, value, 1, 50);
    case 'evaluationErrorThreshold':
      return integerBetween(key, value, 1, 100);
    case 'notificationRetentionHours':
      return integerBetween(key, value, 1, 8760);
  }
}

/**
 * Build settings from `env`, falling back to defaults for unset or empty vars.
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const settings: EngineSettings = { ...DEFAULT_SETTINGS };
  const issues: ValidationError[] = [];

  const read = (key: SettingsKey): string | null => {
    const raw = env[ENV_VARS[key]];
    if (raw === undefined || raw === '') return null;
    const error = validateSettingValue(key, raw);
    if (error) {
      issues.push(new ValidationError(error, ENV_VARS[key]));
      return null;
    }
    return raw.trim();
  };

  for (const key of NUMERIC_KEYS) {
    const value = read(key);
    if (value !== null) {
      settings[key] = Number(value);
    }
  }

  settings.configPath = read('configPath') ?? settings.configPath;
  settings.databasePath = read('databasePath') ?? settings.databasePath;
  settings.telemetryUrl = read('telemetryUrl') ?? settings.telemetryUrl;

  if (settings.retryBaseDelayMs > settings.retryMaxDelayMs) {
    issues.push(new ValidationError(
      `${ENV_VARS.retryBaseDelayMs} must not exceed ${ENV_VARS.retryMaxDelayMs}`,
      ENV_VARS.retryBaseDelayMs,
    ));
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return settings;
}
