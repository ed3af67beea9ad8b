import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/env.js';
import { ConfigurationError } from '../../src/shared/errors/index.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SERVICE_NAME: 'locale-catalog-registry',
      TRANSLATIONS_DEFAULT_LOCALE: 'en',
      TRANSLATIONS_FILE_PREFIXES: [],
      TRANSLATIONS_ALLOW_INVALID_FILES: false,
    });
  });

  it('should parse translation settings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      TRANSLATIONS_PATH: './config/translations',
      TRANSLATIONS_DEFAULT_LOCALE: 'fr',
      TRANSLATIONS_FILE_PREFIXES: 'active, messages,,',
      TRANSLATIONS_ALLOW_INVALID_FILES: 'TRUE',
    });

    expect(config.TRANSLATIONS_PATH).toBe('./config/translations');
    expect(config.TRANSLATIONS_DEFAULT_LOCALE).toBe('fr');
    expect(config.TRANSLATIONS_FILE_PREFIXES).toEqual(['active', 'messages']);
    expect(config.TRANSLATIONS_ALLOW_INVALID_FILES).toBe(true);
  });

  it.each(['trace', 'fatal', 'silent'])('should accept the %s log level', (level) => {
    expect(loadConfig({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });

  it('should reject prefixes with path characters', () => {
    expect(() => loadConfig({ TRANSLATIONS_FILE_PREFIXES: '../active' })).toThrow(/TRANSLATIONS_FILE_PREFIXES\.0/);
  });
});
