import type { AwilixContainer } from 'awilix';
import { createContainer, asValue, asFunction, InjectionMode } from 'awilix';
import { LoggerFactory, type Logger } from './infra/logger/logger.js';
import { loadConfig, type EnvConfig } from './config/env.js';
import { FileScanner } from './infra/fs/FileScanner.js';
import { MessageBundle } from './infra/backend/MessageBundle.js';
import { LocalizerRegistry } from './application/services/LocalizerRegistry.js';
import type { ILocalizerService } from './domain/services/ILocalizerService.js';
import { ConfigurationError } from './shared/errors/index.js';
import { setLocalizerService } from './shared/i18n/index.js';

/**
 * Container Cradle Interface
 * Defines all available dependencies with their types
 */
export interface Cradle {
  // Infrastructure
  config: EnvConfig;
  logger: Logger;
  fileScanner: FileScanner;
  messageBundle: MessageBundle;

  // Services
  localizerService: ILocalizerService;
}

/**
 * Create a DI container wired from configuration (process.env when omitted).
 * The localizer service is built lazily, on first resolve.
 */
export function createAppContainer(config: EnvConfig = loadConfig()): AwilixContainer<Cradle> {
  const container = createContainer<Cradle>({
    injectionMode: InjectionMode.PROXY,
    strict: true,
  });

  container.register({
    // ============================================
    // INFRASTRUCTURE
    // ============================================
    config: asValue(config),
    logger: asFunction(({ config }: Cradle) => {
      LoggerFactory.configure(config);
      return LoggerFactory.getInstance();
    }).singleton(),
    fileScanner: asFunction(
      ({ logger }: Cradle) => new FileScanner({ logger: logger.child({ component: 'FileScanner' }) })
    ).singleton(),
    messageBundle: asFunction(
      ({ config, logger }: Cradle) =>
        new MessageBundle({
          defaultLocale: config.TRANSLATIONS_DEFAULT_LOCALE,
          logger: logger.child({ component: 'MessageBundle' }),
        })
    ).singleton(),

    // ============================================
    // SERVICES
    // ============================================
    localizerService: asFunction(({ config, logger, fileScanner, messageBundle }: Cradle) => {
      if (!config.TRANSLATIONS_PATH) {
        throw new ConfigurationError('TRANSLATIONS_PATH is required to build the localizer service', {
          field: 'TRANSLATIONS_PATH',
        });
      }
      return LocalizerRegistry.fromDirectory({
        translationsPath: config.TRANSLATIONS_PATH,
        defaultLocale: config.TRANSLATIONS_DEFAULT_LOCALE,
        prefixes: config.TRANSLATIONS_FILE_PREFIXES,
        allowInvalidFiles: config.TRANSLATIONS_ALLOW_INVALID_FILES,
        scanner: fileScanner,
        backend: messageBundle.loadMessageFile,
        logger: logger.child({ component: 'LocalizerRegistry' }),
      });
    }).singleton(),
  });

  return container;
}

/**
 * Build the container's localizer service and install it as the global one
 * @returns the restore function of the global slot
 */
export function installGlobalLocalizer(container: AwilixContainer<Cradle>): () => void {
  const service = container.cradle.localizerService;
  const restore = setLocalizerService(service);
  container.cradle.logger.info('Global localizer service installed');
  return restore;
}
