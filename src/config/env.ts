import dotenv from 'dotenv';
import { envSchema } from './env.schema.js';
import type { EnvConfig } from './env.schema.js';
import { ConfigurationError } from '../shared/errors/index.js';

type RawEnv = Record<string, string | undefined>;

/**
 * Parse boolean from string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse comma separated list from string
 */
function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * process.env after loading .env from the working directory
 */
function readProcessEnv(): RawEnv {
  dotenv.config();
  return process.env;
}

/**
 * Validate a raw environment into the typed configuration.
 * Nothing reads the environment until this is called.
 */
export function loadConfig(env: RawEnv = readProcessEnv()): EnvConfig {
  const result = envSchema.safeParse({
    // Application
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    SERVICE_NAME: env.SERVICE_NAME,

    // Translations
    TRANSLATIONS_PATH: env.TRANSLATIONS_PATH,
    TRANSLATIONS_DEFAULT_LOCALE: env.TRANSLATIONS_DEFAULT_LOCALE,
    TRANSLATIONS_FILE_PREFIXES: parseList(env.TRANSLATIONS_FILE_PREFIXES),
    TRANSLATIONS_ALLOW_INVALID_FILES: parseBoolean(env.TRANSLATIONS_ALLOW_INVALID_FILES, false),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Environment validation failed: ${issues.map((issue) => `${issue.field} ${issue.message}`).join('; ')}`,
      { issues }
    );
  }

  return result.data;
}

export type { EnvConfig };
