import 'dotenv/config';

export const DEEPL_FREE_API_URL = 'https://api-free.deepl.com';
export const DEEPL_PRO_API_URL = 'https://api.deepl.com';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

/**
 * Application configuration loaded from environment variables
 */
export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;

  // DeepL
  deeplApiKey?: string;
  // Explicit endpoint; otherwise chosen per key by resolveDeeplApiUrl
  deeplApiUrl?: string;
  deeplTimeoutMs: number;

  // Translation jobs
  retry: RetryConfig;
  concurrency: number;

  // Files
  inputDir: string;
  outputDir: string;
  settingsPath: string;

  // Folder sweep
  sweepCron?: string;
  timezone: string;
}

/**
 * Read a variable, trimming whitespace and wrapping quotes left by .env editors
 */
function getEnvVar(key: string): string | undefined {
  const raw = process.env[key];
  if (raw === undefined) {
    return undefined;
  }

  let value = raw.trim();
  if (value.length >= 2 && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))) {
    value = value.substring(1, value.length - 1).trim();
  }

  return value === '' ? undefined : value;
}

function getEnvString(key: string, defaultValue: string): string {
  return getEnvVar(key) ?? defaultValue;
}

function getEnvInteger(key: string, defaultValue: number, min: number): number {
  const value = getEnvVar(key);
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Environment variable ${key} must be an integer >= ${min}, got: ${value}`);
  }
  return parsed;
}

/**
 * Free-plan DeepL keys end with ":fx" and are only accepted by the free endpoint
 */
export function resolveDeeplApiUrl(apiKey: string | undefined, override?: string): string {
  if (override) {
    return override.replace(/\/+$/, '');
  }
  return apiKey && !apiKey.endsWith(':fx') ? DEEPL_PRO_API_URL : DEEPL_FREE_API_URL;
}

export function loadConfig(): AppConfig {

  return Object.freeze({
    host: getEnvString('HOST', '127.0.0.1'),
    port: getEnvInteger('PORT', 3000, 0),
    logLevel: getEnvString('LOG_LEVEL', 'info'),

    deeplApiKey: getEnvVar('DEEPL_API_KEY'),
    deeplApiUrl: getEnvVar('DEEPL_API_URL')?.replace(/\/+$/, ''),
    deeplTimeoutMs: getEnvInteger('DEEPL_TIMEOUT_MS', 30000, 1),

    retry: Object.freeze({
      maxAttempts: getEnvInteger('TRANSLATION_MAX_ATTEMPTS', 3, 1),
      initialDelayMs: getEnvInteger('TRANSLATION_RETRY_DELAY_MS', 1000, 0),
      maxDelayMs: getEnvInteger('TRANSLATION_RETRY_MAX_DELAY_MS', 30000, 0),
    }),
    concurrency: getEnvInteger('TRANSLATION_CONCURRENCY', 1, 1),

    inputDir: getEnvString('INPUT_DIR', 'input'),
    outputDir: getEnvString('OUTPUT_DIR', 'output'),
    settingsPath: getEnvString('SETTINGS_PATH', 'settings.json'),

    sweepCron: getEnvVar('SWEEP_CRON'),
    timezone: getEnvString('TZ', 'UTC'),
  });
}
