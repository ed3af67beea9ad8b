import type { AppError } from '../../shared/errors/index.js';
import type { Message, PluralCount, TemplateData } from '../models/Message.js';
import type { LocaleTag } from '../models/TranslationFile.js';

/**
 * Input handed to a backend localizer
 */
export interface LocalizeConfig {
  messageId: string;
  templateData?: TemplateData;
  pluralCount?: PluralCount;
}

/**
 * Per-locale handle produced by a translation backend.
 *
 * The registry only indexes handles by locale; rendering is the backend's job.
 * `localize` throws when the message cannot be rendered.
 */
export interface Localizer {
  readonly locale: LocaleTag;
  localize(config: LocalizeConfig): string;
}

/**
 * Loads one translation file and returns the localizer of its locale
 */
export type BackendLoader = (path: string) => Localizer;

export interface ResolvedLocalizer {
  localizer: Localizer;
  /** false when the requested locale was missing and the default was used */
  found: boolean;
}

export type TranslateResult =
  | { success: true; text: string }
  | { success: false; text: ''; error: AppError };

/**
 * Localizer Service Interface
 *
 * Lives in the domain layer so the global slot and callers depend on the
 * capability, not on LocalizerRegistry.
 */
export interface ILocalizerService {
  /**
   * Localizer for a locale, falling back to the default locale
   */
  resolve(locale: string): ResolvedLocalizer;

  /**
   * Render a message; failures are returned, never thrown
   */
  translate(localizer: Localizer, message: Message | null | undefined): TranslateResult;

  /**
   * Render a message; any failure throws TranslationFailedError
   */
  mustTranslate(localizer: Localizer, message: Message | null | undefined): string;
}
