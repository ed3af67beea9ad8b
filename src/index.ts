/**
 * locale-catalog-registry
 *
 * Translation file discovery, BCP 47 locale validation and a localizer
 * registry with default-locale fallback.
 */

// Domain
export { Message, type TemplateData, type PluralCount } from './domain/models/index.js';
export type { LocaleTag, TranslationFileDescriptor } from './domain/models/index.js';
export type {
  BackendLoader,
  ILocalizerService,
  LocalizeConfig,
  Localizer,
  ResolvedLocalizer,
  TranslateResult,
} from './domain/services/ILocalizerService.js';
export {
  SUPPORTED_EXTENSIONS,
  canonicalizeLocale,
  extractAndValidateLocale,
  extractLocale,
  hasSupportedExtension,
  parseLocale,
  validateLocale,
} from './domain/locale/index.js';

// Discovery and backend
export { FileScanner, MAX_TRANSLATION_FILE_SIZE, type ScanResult } from './infra/fs/FileScanner.js';
export { MessageBundle, BundleLocalizer, renderTemplate } from './infra/backend/MessageBundle.js';
export type { CatalogDecoder } from './infra/backend/catalogDecoders.js';

// Registry
export {
  LocalizerRegistry,
  type FromDirectoryOptions,
  type LocalizerRegistryOptions,
} from './application/services/LocalizerRegistry.js';

// Ambient access
export {
  setLocalizerService,
  getLocalizerService,
  resolve,
  translate,
  mustTranslate,
  localize,
} from './shared/i18n/index.js';
export { RequestContext, type RequestContextData } from './shared/context/index.js';

// Errors
export * from './shared/errors/index.js';

// Composition
export { createAppContainer, installGlobalLocalizer, type Cradle } from './container.js';
export { loadConfig, type EnvConfig } from './config/env.js';
