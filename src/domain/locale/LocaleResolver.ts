/**
 * Locale Resolver
 *
 * Extracts the BCP 47 tag embedded in a translation filename
 * (`<prefix>.<locale>.<ext>`) and validates it.
 *
 * @example
 * extractAndValidateLocale('active.zh-CN.toml'); // 'zh-CN'
 * extractAndValidateLocale('active..toml');      // throws InvalidFilenameFormatError
 */
import { basename } from 'path';
import { InvalidFilenameFormatError, InvalidLocaleError } from '../../shared/errors/index.js';
import type { LocaleTag } from '../models/TranslationFile.js';

// ============================================
// CONSTANTS
// ============================================

export const SUPPORTED_EXTENSIONS = ['.toml', '.json', '.yaml', '.yml'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const UNDEFINED_LOCALE = 'und';

export const MAX_LOCALE_LENGTH = 35;

const FORBIDDEN_LOCALE_CHARS = /[/\\<>:"|?*]/;

const TRANSLATION_FILENAME_REGEX = /^[A-Za-z0-9_-]+\.[A-Za-z0-9-]+\.[A-Za-z0-9]+$/;

const EXPECTED_FORMAT =
  `expected 'prefix.locale.{ext}' where ext is one of: ${SUPPORTED_EXTENSIONS.join(', ')} ` +
  '(only alphanumeric, hyphens, underscores allowed)';

// ============================================
// EXTENSIONS
// ============================================

/**
 * First supported extension the filename ends with (case-insensitive)
 */
export function findSupportedExtension(fileName: string): SupportedExtension | undefined {
  const lower = fileName.toLowerCase();
  return SUPPORTED_EXTENSIONS.find((ext) => lower.endsWith(ext));
}

export function hasSupportedExtension(fileName: string): boolean {
  return findSupportedExtension(fileName) !== undefined;
}

// ============================================
// PARSING
// ============================================

/**
 * Parse a BCP 47 tag
 * @throws InvalidLocaleError when the tag is not well-formed
 */
export function parseLocale(input: string, fileName?: string): Intl.Locale {
  try {
    return new Intl.Locale(input);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'not a well-formed BCP 47 tag';
    throw new InvalidLocaleError(input, reason, fileName);
  }
}

/**
 * Canonical form of a tag, or undefined when it does not parse
 */
export function canonicalizeLocale(input: string): LocaleTag | undefined {
  try {
    return new Intl.Locale(input).toString();
  } catch {
    return undefined;
  }
}

/**
 * Checks applied after a successful parse
 * @throws InvalidLocaleError carrying the offending tag
 */
export function validateLocale(locale: Intl.Locale, fileName?: string): void {
  const tag = locale.toString();

  if (tag === UNDEFINED_LOCALE) {
    throw new InvalidLocaleError(tag, 'undefined language tag', fileName);
  }

  if (!locale.language) {
    throw new InvalidLocaleError(tag, 'invalid base language', fileName);
  }

  if (tag.length > MAX_LOCALE_LENGTH) {
    throw new InvalidLocaleError(tag, `language tag longer than ${MAX_LOCALE_LENGTH} characters`, fileName);
  }

  if (FORBIDDEN_LOCALE_CHARS.test(tag)) {
    throw new InvalidLocaleError(tag, 'language tag contains invalid characters', fileName);
  }
}

// ============================================
// FILENAMES
// ============================================

/**
 * Locale segment of `<prefix>.<locale>.<ext>`, parsed but not validated
 */
export function extractLocale(fileName: string): Intl.Locale {
  const ext = findSupportedExtension(fileName);
  const withoutExt = ext ? fileName.slice(0, -ext.length) : fileName;

  const parts = withoutExt.split('.');
  if (parts.length < 2) {
    throw new InvalidFilenameFormatError(fileName, 'missing locale segment');
  }

  return parseLocale(parts[parts.length - 1] ?? '', fileName);
}

/**
 * Full check used by the directory scanner
 */
export function extractAndValidateLocale(fileName: string): LocaleTag {
  if (!TRANSLATION_FILENAME_REGEX.test(fileName)) {
    throw new InvalidFilenameFormatError(fileName, `does not match expected format, ${EXPECTED_FORMAT}`);
  }

  if (!hasSupportedExtension(fileName)) {
    throw new InvalidFilenameFormatError(fileName, `unsupported extension, ${EXPECTED_FORMAT}`);
  }

  if (basename(fileName) !== fileName) {
    throw new InvalidFilenameFormatError(fileName, 'contains invalid path characters');
  }

  const locale = extractLocale(fileName);
  validateLocale(locale, fileName);

  return locale.toString();
}
