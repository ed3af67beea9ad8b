import type { Logger as PinoLogger } from 'pino';
import pino from 'pino';
import { z } from 'zod';
import { logLevelSchema, nodeEnvSchema, type EnvConfig } from '../../config/env.schema.js';

export type Logger = PinoLogger;

export type LoggerSettings = Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL' | 'SERVICE_NAME'>;

// Invalid values fall back to the defaults
const loggerSettingsSchema = z.object({
  NODE_ENV: nodeEnvSchema.catch('development'),
  LOG_LEVEL: logLevelSchema.catch('info'),
  SERVICE_NAME: z.string().min(1).catch('locale-catalog-registry'),
});

/**
 * Logger settings read leniently from an environment
 */
export function loggerSettingsFromEnv(env: Record<string, string | undefined>): LoggerSettings {
  return loggerSettingsSchema.parse(env);
}

/**
 * Template data may carry user values (names, emails) rendered into messages
 */
const REDACT_PATHS = ['data', 'templateData', 'message.data', '*.templateData'];

/**
 * Singleton Logger Factory
 * Creates a single logger instance for the entire library
 */
class LoggerFactory {
  private static instance: Logger | null = null;
  private static settings: LoggerSettings | null = null;

  /**
   * Settings are read on first use, from process.env unless configured
   */
  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = this.createLogger(this.settings ?? loggerSettingsFromEnv(process.env));
    }
    return this.instance;
  }

  /**
   * Replace the settings; the next getInstance() builds a new logger
   */
  static configure(settings: LoggerSettings): void {
    this.settings = settings;
    this.instance = null;
  }

  private static createLogger(config: LoggerSettings): Logger {
    const isDevelopment = config.NODE_ENV === 'development';
    const isTest = config.NODE_ENV === 'test';

    if (isTest) {
      return pino({ level: 'silent' });
    }

    if (isDevelopment) {
      return pino({
        level: config.LOG_LEVEL,
        redact: {
          paths: REDACT_PATHS,
          censor: '[REDACTED]',
        },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false,
          },
        },
      });
    }

    // Production logger
    return pino({
      level: config.LOG_LEVEL,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: config.SERVICE_NAME,
        env: config.NODE_ENV,
      },
    });
  }

  /**
   * Create a child logger with additional context
   */
  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }

  /**
   * Create a component-scoped logger
   */
  static forComponent(component: string): Logger {
    return this.createChild({ component });
  }

  /**
   * Reset the logger instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
    this.settings = null;
  }
}

export { LoggerFactory };
