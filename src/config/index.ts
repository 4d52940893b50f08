import { config } from 'dotenv';
import { randomInt } from 'crypto';

config();

export type WeightGranularity = 'month-hour' | 'month-only';
export type MissingHourPolicy = 'exclude' | 'zero-fill';

export interface DisaggregationConfig {
  GRANULARITY: WeightGranularity;
  BASE_SEED: number;
  BASE_SEED_SOURCE: 'explicit' | 'default' | 'random';
  FALLBACK_ENABLED: boolean;
  MIN_FINE_CANDIDATES: number;
  SUM_TOLERANCE: number;
  // Partitions whose bulk writes overlap; the disaggregation itself runs on one event loop
  WORKER_COUNT: number;
  WRITE_BATCH_SIZE: number;
  HORIZON_START: Date;
  HORIZON_END: Date;
}

export interface AggregationConfig {
  MISSING_HOUR_POLICY: MissingHourPolicy;
  MIN_OBSERVATIONS_PER_HOUR: number;
  MAX_OBSERVATION_MM: number;
}

export interface AppConfig {
  NODE_ENV: string;
  LOG_LEVEL: string;
  LOG_TO_FILE: boolean;
  MONGODB_URI: string;
  DISCORD_WEBHOOK_URL?: string;
  ENABLE_DISCORD_LOGGING: boolean;
  AGGREGATION: AggregationConfig;
  DISAGGREGATION: DisaggregationConfig;
  CRON: {
    WEIGHT_REFRESH: string;
    DISAGGREGATION: string;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_BASE_SEED = 42;

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function validateEnvironmentVariable(name: string, value: string | undefined, required: boolean = true): string {
  if (!value && required) {
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }

  if (!value && !required) {
    return '';
  }

  if (value && value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value || '';
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, defaultValue: number): number {
  const stringValue = validateEnvironmentVariable(name, value, false);

  if (!stringValue) {
    return defaultValue;
  }

  const numericValue = Number(stringValue);

  if (Number.isNaN(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${stringValue}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function validateBooleanEnvironmentVariable(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function validateDateEnvironmentVariable(name: string, value: string | undefined, defaultValue: string): Date {
  const stringValue = validateEnvironmentVariable(name, value, false) || defaultValue;
  const date = new Date(stringValue);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Environment variable ${name} must be an ISO date, got: ${stringValue}`);
  }
  return date;
}

function validateChoice<T extends string>(name: string, value: string | undefined, choices: readonly T[], defaultValue: T): T {
  const stringValue = validateEnvironmentVariable(name, value, false) || defaultValue;
  const match = choices.find(choice => choice === stringValue);
  if (!match) {
    throw new ConfigurationError(`${name} must be one of: ${choices.join(', ')}. Got: ${stringValue}`);
  }
  return match;
}

/**
 * Resolve the base seed: an explicit integer, the literal `random`, or the
 * process default when unset.
 */
export function resolveBaseSeed(value: string | undefined): Pick<DisaggregationConfig, 'BASE_SEED' | 'BASE_SEED_SOURCE'> {
  if (value === undefined || value.trim() === '') {
    return { BASE_SEED: DEFAULT_BASE_SEED, BASE_SEED_SOURCE: 'default' };
  }

  if (value.trim().toLowerCase() === 'random') {
    return { BASE_SEED: randomInt(0, 2 ** 31 - 1), BASE_SEED_SOURCE: 'random' };
  }

  const seed = Number(value);
  if (!Number.isSafeInteger(seed) || seed < 0) {
    throw new ConfigurationError(`BASE_SEED must be a non-negative integer or "random". Got: ${value}`);
  }
  return { BASE_SEED: seed, BASE_SEED_SOURCE: 'explicit' };
}

export function loadConfig(env: Env = process.env): AppConfig {
  try {
    const nodeEnv = validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, false) || 'development';

    const appConfig: AppConfig = {
      NODE_ENV: nodeEnv,
      LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, false) || 'info',
      LOG_TO_FILE: validateBooleanEnvironmentVariable(env.LOG_TO_FILE, nodeEnv !== 'test'),
      MONGODB_URI: validateEnvironmentVariable('MONGODB_URI', env.MONGODB_URI, false) || 'mongodb://localhost:27017/precip-disagg',
      DISCORD_WEBHOOK_URL: validateEnvironmentVariable('DISCORD_WEBHOOK_URL', env.DISCORD_WEBHOOK_URL, false) || undefined,
      ENABLE_DISCORD_LOGGING: env.ENABLE_DISCORD_LOGGING === 'true',
      AGGREGATION: {
        MISSING_HOUR_POLICY: validateChoice('MISSING_HOUR_POLICY', env.MISSING_HOUR_POLICY, ['exclude', 'zero-fill'] as const, 'exclude'),
        MIN_OBSERVATIONS_PER_HOUR: validateNumericEnvironmentVariable('MIN_OBSERVATIONS_PER_HOUR', env.MIN_OBSERVATIONS_PER_HOUR, 1),
        MAX_OBSERVATION_MM: validateNumericEnvironmentVariable('MAX_OBSERVATION_MM', env.MAX_OBSERVATION_MM, 500),
      },
      DISAGGREGATION: {
        GRANULARITY: validateChoice('WEIGHT_GRANULARITY', env.WEIGHT_GRANULARITY, ['month-hour', 'month-only'] as const, 'month-hour'),
        ...resolveBaseSeed(env.BASE_SEED),
        FALLBACK_ENABLED: validateBooleanEnvironmentVariable(env.FALLBACK_ENABLED, true),
        MIN_FINE_CANDIDATES: validateNumericEnvironmentVariable('MIN_FINE_CANDIDATES', env.MIN_FINE_CANDIDATES, 1),
        SUM_TOLERANCE: validateNumericEnvironmentVariable('SUM_TOLERANCE', env.SUM_TOLERANCE, 1e-9),
        WORKER_COUNT: validateNumericEnvironmentVariable('WORKER_COUNT', env.WORKER_COUNT, 4),
        WRITE_BATCH_SIZE: validateNumericEnvironmentVariable('WRITE_BATCH_SIZE', env.WRITE_BATCH_SIZE, 5000),
        HORIZON_START: validateDateEnvironmentVariable('HORIZON_START', env.HORIZON_START, '2021-01-01T00:00:00Z'),
        HORIZON_END: validateDateEnvironmentVariable('HORIZON_END', env.HORIZON_END, '2100-01-01T00:00:00Z'),
      },
      CRON: {
        WEIGHT_REFRESH: validateEnvironmentVariable('CRON_WEIGHT_REFRESH', env.CRON_WEIGHT_REFRESH, false) || '0 2 * * *',
        DISAGGREGATION: validateEnvironmentVariable('CRON_DISAGGREGATION', env.CRON_DISAGGREGATION, false) || '0 3 * * *',
      },
    };

    // Validate specific values
    if (!['development', 'production', 'test'].includes(appConfig.NODE_ENV)) {
      throw new ConfigurationError(`NODE_ENV must be one of: development, production, test. Got: ${appConfig.NODE_ENV}`);
    }

    if (!['error', 'warn', 'notify', 'info', 'debug'].includes(appConfig.LOG_LEVEL)) {
      throw new ConfigurationError(`LOG_LEVEL must be one of: error, warn, notify, info, debug. Got: ${appConfig.LOG_LEVEL}`);
    }

    if (!Number.isInteger(appConfig.AGGREGATION.MIN_OBSERVATIONS_PER_HOUR) || appConfig.AGGREGATION.MIN_OBSERVATIONS_PER_HOUR < 1) {
      throw new ConfigurationError(`MIN_OBSERVATIONS_PER_HOUR must be an integer >= 1. Got: ${appConfig.AGGREGATION.MIN_OBSERVATIONS_PER_HOUR}`);
    }

    if (!Number.isInteger(appConfig.DISAGGREGATION.MIN_FINE_CANDIDATES) || appConfig.DISAGGREGATION.MIN_FINE_CANDIDATES < 1) {
      throw new ConfigurationError(`MIN_FINE_CANDIDATES must be an integer >= 1. Got: ${appConfig.DISAGGREGATION.MIN_FINE_CANDIDATES}`);
    }

    if (!Number.isInteger(appConfig.DISAGGREGATION.WORKER_COUNT) || appConfig.DISAGGREGATION.WORKER_COUNT < 1 || appConfig.DISAGGREGATION.WORKER_COUNT > 64) {
      throw new ConfigurationError(`WORKER_COUNT must be an integer between 1 and 64. Got: ${appConfig.DISAGGREGATION.WORKER_COUNT}`);
    }

    if (!Number.isInteger(appConfig.DISAGGREGATION.WRITE_BATCH_SIZE) || appConfig.DISAGGREGATION.WRITE_BATCH_SIZE < 1) {
      throw new ConfigurationError(`WRITE_BATCH_SIZE must be an integer >= 1. Got: ${appConfig.DISAGGREGATION.WRITE_BATCH_SIZE}`);
    }

    if (appConfig.DISAGGREGATION.SUM_TOLERANCE <= 0 || appConfig.DISAGGREGATION.SUM_TOLERANCE > 1e-3) {
      throw new ConfigurationError(`SUM_TOLERANCE must be in (0, 1e-3]. Got: ${appConfig.DISAGGREGATION.SUM_TOLERANCE}`);
    }

    if (appConfig.DISAGGREGATION.HORIZON_END <= appConfig.DISAGGREGATION.HORIZON_START) {
      throw new ConfigurationError('HORIZON_END must be after HORIZON_START');
    }

    return appConfig;

  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

let Config: AppConfig;

try {
  Config = loadConfig();
} catch (error) {
  console.error('Configuration Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { Config, ConfigurationError };
export default Config;
