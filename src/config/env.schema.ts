import { z } from 'zod';

export const nodeEnvSchema = z.enum(['development', 'production', 'staging', 'test']);

// pino's levels
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Environment variable validation schema using Zod
 * Configuration is validated once when loaded - fail fast on misconfiguration
 */
export const envSchema = z.object({
  // ============================================
  // APPLICATION
  // ============================================
  NODE_ENV: nodeEnvSchema.default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
  SERVICE_NAME: z.string().min(1).default('locale-catalog-registry'),

  // ============================================
  // TRANSLATIONS
  // ============================================
  TRANSLATIONS_PATH: z.string().min(1).optional(),
  TRANSLATIONS_DEFAULT_LOCALE: z.string().min(1).default('en'),
  // "active,messages" -> ['active', 'messages']
  TRANSLATIONS_FILE_PREFIXES: z
    .array(z.string().regex(/^[A-Za-z0-9_-]+$/, 'prefix may only contain letters, digits, "_" and "-"'))
    .default([]),
  TRANSLATIONS_ALLOW_INVALID_FILES: z.boolean().default(false),
});

/**
 * Type definition for the validated environment configuration
 */
export type EnvConfig = z.infer<typeof envSchema>;
