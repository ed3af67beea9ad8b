/**
 * Canonical BCP 47 language tag, e.g. "en" or "zh-CN".
 * Produced by LocaleResolver; never "und".
 */
export type LocaleTag = string;

/**
 * A translation file accepted by a directory scan
 */
export interface TranslationFileDescriptor {
  readonly path: string;
  readonly fileName: string;
  readonly locale: LocaleTag;
}

export function createTranslationFileDescriptor(
  path: string,
  fileName: string,
  locale: LocaleTag
): TranslationFileDescriptor {
  return Object.freeze({ path, fileName, locale });
}
