/**
 * Localizer Registry
 *
 * Maps locales to backend localizers and falls back to a default locale.
 * Immutable once built: there is no reload, so lookups need no locking.
 */
import type { Logger } from '../../infra/logger/logger.js';
import { LoggerFactory } from '../../infra/logger/logger.js';
import { FileScanner } from '../../infra/fs/FileScanner.js';
import { MessageBundle } from '../../infra/backend/MessageBundle.js';
import {
  AppError,
  BackendTranslateError,
  DefaultLocaleMissingError,
  DefaultLocalizerMissingError,
  EmptyMessageIdError,
  LoadFailureError,
  NilMessageError,
  NoCandidatesError,
  TranslationFailedError,
} from '../../shared/errors/index.js';
import { canonicalizeLocale } from '../../domain/locale/index.js';
import type { LocaleTag, Message, TranslationFileDescriptor } from '../../domain/models/index.js';
import type {
  BackendLoader,
  ILocalizerService,
  Localizer,
  ResolvedLocalizer,
  TranslateResult,
} from '../../domain/services/ILocalizerService.js';

export interface LocalizerRegistryOptions {
  logger?: Logger;
}

export interface FromDirectoryOptions extends LocalizerRegistryOptions {
  translationsPath: string;
  defaultLocale: string;
  prefixes?: Iterable<string>;
  /** Defaults to a fresh MessageBundle with `defaultLocale` as its fallback */
  backend?: BackendLoader;
  scanner?: FileScanner;
  /** Build from the valid files even when some were rejected */
  allowInvalidFiles?: boolean;
}

export class LocalizerRegistry implements ILocalizerService {
  private constructor(
    private readonly localizers: ReadonlyMap<LocaleTag, Localizer>,
    public readonly defaultLocale: LocaleTag,
    private readonly logger: Logger
  ) {}

  /**
   * Load every descriptor through the backend and index the handles by locale.
   * Any failure aborts; a partial registry is never returned.
   *
   * @throws NoCandidatesError | LoadFailureError | DefaultLocaleMissingError
   */
  static build(
    descriptors: readonly TranslationFileDescriptor[],
    backendLoad: BackendLoader,
    defaultLocale: string,
    options: LocalizerRegistryOptions = {}
  ): LocalizerRegistry {
    const logger = options.logger ?? LoggerFactory.forComponent('LocalizerRegistry');

    if (descriptors.length === 0) {
      throw new NoCandidatesError();
    }

    const localizers = new Map<LocaleTag, Localizer>();
    for (const descriptor of descriptors) {
      try {
        localizers.set(descriptor.locale, backendLoad(descriptor.path));
      } catch (error) {
        logger.error({ err: error, path: descriptor.path }, 'Translation file failed to load');
        throw new LoadFailureError(descriptor.path, error);
      }
    }

    const defaultTag = canonicalizeLocale(defaultLocale) ?? defaultLocale;
    if (!localizers.has(defaultTag)) {
      throw new DefaultLocaleMissingError(defaultTag, [...localizers.keys()]);
    }

    logger.info({ locales: [...localizers.keys()], defaultLocale: defaultTag }, 'Localizer registry built');
    return new LocalizerRegistry(localizers, defaultTag, logger);
  }

  /**
   * Scan a directory and build with the default MessageBundle backend.
   * Rejected files abort the build unless `allowInvalidFiles` is set.
   */
  static fromDirectory(options: FromDirectoryOptions): LocalizerRegistry {
    const logger = options.logger ?? LoggerFactory.forComponent('LocalizerRegistry');
    const scanner = options.scanner ?? new FileScanner({ logger });
    const backend =
      options.backend ?? new MessageBundle({ defaultLocale: options.defaultLocale, logger }).loadMessageFile;

    const { files, error } = scanner.scan(options.translationsPath, options.prefixes);

    if (error) {
      if (!options.allowInvalidFiles) {
        throw error;
      }
      logger.warn({ err: error, invalidFiles: error.invalidFiles }, 'Ignoring invalid translation files');
    }

    if (files.length === 0) {
      throw new NoCandidatesError(options.translationsPath);
    }

    return LocalizerRegistry.build(files, backend, options.defaultLocale, { logger });
  }

  availableLocales(): LocaleTag[] {
    return [...this.localizers.keys()];
  }

  has(locale: string): boolean {
    const tag = canonicalizeLocale(locale);
    return tag !== undefined && this.localizers.has(tag);
  }

  /**
   * Exact lookup; a miss returns the default localizer with found = false
   * @throws DefaultLocalizerMissingError
   */
  resolve(locale: string): ResolvedLocalizer {
    const tag = canonicalizeLocale(locale);
    const localizer = tag === undefined ? undefined : this.localizers.get(tag);
    if (localizer) {
      return { localizer, found: true };
    }

    const fallback = this.localizers.get(this.defaultLocale);
    if (!fallback) {
      throw new DefaultLocalizerMissingError(this.defaultLocale);
    }

    this.logger.debug({ requested: locale, defaultLocale: this.defaultLocale }, 'Falling back to default locale');
    return { localizer: fallback, found: false };
  }

  translate(localizer: Localizer, message: Message | null | undefined): TranslateResult {
    if (!message) {
      return failure(new NilMessageError());
    }

    if (message.id === '') {
      return failure(new EmptyMessageIdError());
    }

    try {
      const text = localizer.localize({
        messageId: message.id,
        templateData: message.data,
        pluralCount: message.pluralCount,
      });
      return { success: true, text };
    } catch (error) {
      return failure(new BackendTranslateError(message.id, localizer.locale, error));
    }
  }

  /**
   * For ids that are known to exist; any failure is a programming error
   * @throws TranslationFailedError
   */
  mustTranslate(localizer: Localizer, message: Message | null | undefined): string {
    const result = this.translate(localizer, message);
    if (!result.success) {
      throw new TranslationFailedError(result.error);
    }
    return result.text;
  }
}

function failure(error: AppError): TranslateResult {
  return { success: false, text: '', error };
}
