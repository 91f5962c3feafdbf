import { config } from 'dotenv';

config();

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

export interface AppConfig {
  PORT: number;
  NODE_ENV: NodeEnv;
  LOG_LEVEL: LogLevel;
  LOG_FILE: string;
  ALLOWED_ORIGINS?: string[];
  MONGO: {
    CONNECTION_STRING: string;
    DB_NAME: string;
  };
  AI: {
    MODEL: string;
    API_KEY: string;
    BASE_URL: string;
    REQUEST_TIMEOUT_MS: number;
  };
  PREDICTOR_URL?: string;
}

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'debug'];

const isNodeEnv = (value: string): value is NodeEnv => NODE_ENVS.some(env => env === value);
const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some(level => level === value);

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

  if (!Number.isInteger(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${stringValue}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(`NODE_ENV must be one of: ${NODE_ENVS.join(', ')}. Got: ${nodeEnv}`);
  }

  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${logLevel}`);
  }

  const port = validateNumericEnvironmentVariable('PORT', env.PORT, 5000);
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`PORT must be between 1 and 65535. Got: ${port}`);
  }

  const baseUrl = validateEnvironmentVariable('BASE_URL_GROQ', env.BASE_URL_GROQ, false) || 'https://api.groq.com/openai/v1';
  if (!baseUrl.startsWith('http')) {
    throw new ConfigurationError(`BASE_URL_GROQ must be a valid URL starting with http/https. Got: ${baseUrl}`);
  }

  const predictorUrl = validateEnvironmentVariable('PREDICTOR_URL', env.PREDICTOR_URL, false);
  if (predictorUrl && !predictorUrl.startsWith('http')) {
    throw new ConfigurationError(`PREDICTOR_URL must be a valid URL starting with http/https. Got: ${predictorUrl}`);
  }

  const origins = env.ALLOWED_ORIGINS?.split(',').map(origin => origin.trim()).filter(Boolean);

  return {
    PORT: port,
    NODE_ENV: nodeEnv,
    LOG_LEVEL: logLevel,
    // An explicitly empty LOG_FILE turns the file transport off
    LOG_FILE: env.LOG_FILE ?? 'log.txt',
    ALLOWED_ORIGINS: origins && origins.length > 0 ? origins : undefined,
    MONGO: {
      CONNECTION_STRING:
        validateEnvironmentVariable('MONGO_CONNECTION_STRING', env.MONGO_CONNECTION_STRING, false) ||
        'mongodb://localhost:27017',
      DB_NAME: validateEnvironmentVariable('MONGO_DB_NAME', env.MONGO_DB_NAME, false) || 'Unnchai',
    },
    AI: {
      MODEL: validateEnvironmentVariable('MODEL', env.MODEL, false) || 'llama-3.3-70b-versatile',
      API_KEY:
        validateEnvironmentVariable('OPENAI_API', env.OPENAI_API, false) ||
        validateEnvironmentVariable('GROQ_API_KEY', env.GROQ_API_KEY, false),
      BASE_URL: baseUrl,
      REQUEST_TIMEOUT_MS: validateNumericEnvironmentVariable('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, 30000),
    },
    PREDICTOR_URL: predictorUrl || undefined,
  };
}

let Config: AppConfig;

try {
  Config = loadConfig();
} catch (error) {
  console.error('Configuration Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { Config, ConfigurationError, loadConfig };
