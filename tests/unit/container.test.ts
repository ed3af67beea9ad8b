import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createAppContainer, installGlobalLocalizer } from '../../src/container.js';
import { loadConfig } from '../../src/config/env.js';
import { LoggerFactory } from '../../src/infra/logger/logger.js';
import { getLocalizerService, setLocalizerService } from '../../src/shared/i18n/index.js';
import { LocalizerRegistry } from '../../src/application/services/LocalizerRegistry.js';
import { Message } from '../../src/domain/models/index.js';
import { ConfigurationError } from '../../src/shared/errors/index.js';
import { TranslationsFixture } from '../helpers/translationsFixture.js';

describe('createAppContainer', () => {
  let fixture: TranslationsFixture;

  beforeEach(() => {
    fixture = TranslationsFixture.withDefaultFiles();
  });

  afterEach(() => {
    setLocalizerService(null);
    LoggerFactory.reset();
    fixture.cleanup();
  });

  it('should build the localizer service from configuration', () => {
    const container = createAppContainer(
      loadConfig({ NODE_ENV: 'test', TRANSLATIONS_PATH: fixture.dir, TRANSLATIONS_FILE_PREFIXES: 'active' })
    );

    const service = container.cradle.localizerService;

    expect(service).toBeInstanceOf(LocalizerRegistry);
    expect(service.resolve('fr').found).toBe(true);
    expect(container.cradle.localizerService).toBe(service);
  });

  it('should fall back to the configured default locale for missing messages', () => {
    const container = createAppContainer(loadConfig({ NODE_ENV: 'test', TRANSLATIONS_PATH: fixture.dir }));
    const service = container.cradle.localizerService;

    const { localizer } = service.resolve('fr');

    expect(service.mustTranslate(localizer, Message.create('hello').withData({ name: 'World' }))).toBe(
      'Hello, World!'
    );
  });

  it('should configure the logger from the container config', () => {
    const container = createAppContainer(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'trace' }));

    expect(container.cradle.logger).toBe(LoggerFactory.getInstance());
    expect(container.cradle.logger.level).toBe('silent');
  });

  it('should require a translations path', () => {
    const container = createAppContainer(loadConfig({ NODE_ENV: 'test' }));

    expect(() => container.cradle.localizerService).toThrow(ConfigurationError);
  });

  it('should install and restore the global service', () => {
    const container = createAppContainer(loadConfig({ NODE_ENV: 'test', TRANSLATIONS_PATH: fixture.dir }));

    const restore = installGlobalLocalizer(container);
    expect(getLocalizerService()).toBe(container.cradle.localizerService);

    restore();
    expect(getLocalizerService()).toBeNull();
  });
});
