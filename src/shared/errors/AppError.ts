/**
 * Application Error Classes
 * Centralized error definitions for the discovery, registry and translate layers
 */

/**
 * Error details for additional context
 */
export interface ErrorDetails {
  path?: string;
  fileName?: string;
  locale?: string;
  [key: string]: unknown;
}

/**
 * Base Application Error
 * All custom errors should extend this class
 */
export class AppError extends Error {
  public readonly timestamp: Date;
  public readonly isOperational: boolean;

  constructor(
    public readonly message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: ErrorDetails,
    options?: { cause?: unknown; isOperational?: boolean }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.timestamp = new Date();
    // Operational errors are expected (vs programming errors)
    this.isOperational = options?.isOperational ?? true;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ============================================
// SCAN ERRORS (fatal to the scan call)
// ============================================

export class PathNotFoundError extends AppError {
  constructor(path: string) {
    super(`Translations path does not exist: ${path}`, 'PATH_NOT_FOUND', { path });
  }
}

export class PathNotDirectoryError extends AppError {
  constructor(path: string) {
    super(`Translations path is not a directory: ${path}`, 'PATH_NOT_DIRECTORY', { path });
  }
}

export class ReadFailureError extends AppError {
  constructor(path: string, cause: unknown) {
    super(`Failed to read translations directory ${path}: ${describeCause(cause)}`, 'READ_FAILURE', { path }, { cause });
  }
}

// ============================================
// FILE VALIDATION ERRORS (collected per file)
// ============================================

export class InvalidFilenameFormatError extends AppError {
  constructor(fileName: string, reason: string) {
    super(`Invalid translation filename '${fileName}': ${reason}`, 'INVALID_FILENAME_FORMAT', { fileName });
  }
}

export class InvalidLocaleError extends AppError {
  constructor(locale: string, reason: string, fileName?: string) {
    const where = fileName ? ` in filename '${fileName}'` : '';
    super(`Invalid locale '${locale}'${where}: ${reason}`, 'INVALID_LOCALE', { locale, fileName });
  }
}

export interface InvalidTranslationFile {
  fileName: string;
  reason: string;
}

/**
 * Aggregate of every file rejected during one scan
 */
export class InvalidTranslationFilesError extends AppError {
  constructor(
    public readonly invalidFiles: readonly InvalidTranslationFile[],
    prefixes: readonly string[],
    extensions: readonly string[]
  ) {
    const prefixMessage = prefixes.length > 0 ? ` with prefixes [${prefixes.join(', ')}]` : '';
    const names = invalidFiles.map((file) => file.fileName).join(', ');
    super(
      `Found ${invalidFiles.length} invalid translation files${prefixMessage}: [${names}] ` +
        `(files must follow format 'prefix.{locale}.{ext}' where ext is one of: ${extensions.join(', ')})`,
      'INVALID_TRANSLATION_FILES',
      { files: invalidFiles, prefixes, extensions }
    );
  }
}

// ============================================
// REGISTRY CONSTRUCTION ERRORS
// ============================================

export class NoCandidatesError extends AppError {
  constructor(path?: string) {
    super(
      path
        ? `No corresponding translation files were found in path: ${path}`
        : 'No translation files were given to the registry',
      'NO_CANDIDATES',
      { path }
    );
  }
}

export class DefaultLocaleMissingError extends AppError {
  constructor(locale: string, available: readonly string[]) {
    super(
      `Default locale ${locale} not found in available translation files (available: ${available.join(', ') || 'none'})`,
      'DEFAULT_LOCALE_MISSING',
      { locale, available }
    );
  }
}

export class LoadFailureError extends AppError {
  constructor(path: string, cause: unknown) {
    super(`Failed to load translation file ${path}: ${describeCause(cause)}`, 'LOAD_FAILURE', { path }, { cause });
  }
}

export class DefaultLocalizerMissingError extends AppError {
  constructor(locale: string) {
    super(
      `Default localizer ${locale} not found, please check your translations configuration`,
      'DEFAULT_LOCALIZER_MISSING',
      { locale }
    );
  }
}

// ============================================
// TRANSLATE ERRORS
// ============================================

export class NilMessageError extends AppError {
  constructor() {
    super('Message cannot be nil', 'NIL_MESSAGE');
  }
}

export class EmptyMessageIdError extends AppError {
  constructor() {
    super('Message ID cannot be empty', 'EMPTY_MESSAGE_ID');
  }
}

export class BackendTranslateError extends AppError {
  constructor(messageId: string, locale: string, cause: unknown) {
    super(
      `Failed to localize message '${messageId}': ${describeCause(cause)}`,
      'BACKEND_TRANSLATE_FAILURE',
      { messageId, locale },
      { cause }
    );
  }
}

/**
 * Raised by mustTranslate: a programming error, not an expected condition
 */
export class TranslationFailedError extends AppError {
  constructor(cause: AppError) {
    super(`Translation failed: ${cause.message}`, 'TRANSLATION_FAILED', cause.details, {
      cause,
      isOperational: false,
    });
  }
}

export class LocalizerServiceNotSetError extends AppError {
  constructor() {
    super(
      'No localizer service installed; call setLocalizerService before use',
      'LOCALIZER_SERVICE_NOT_SET',
      undefined,
      { isOperational: false }
    );
  }
}

// ============================================
// BACKEND ERRORS
// ============================================

export class MessageNotFoundError extends AppError {
  constructor(messageId: string, locale: string) {
    super(`Message "${messageId}" not found in language "${locale}"`, 'MESSAGE_NOT_FOUND', {
      messageId,
      locale,
    });
  }
}

export class MessageFormMissingError extends AppError {
  constructor(messageId: string, locale: string) {
    super(`Message "${messageId}" has no "other" form in language "${locale}"`, 'MESSAGE_FORM_MISSING', {
      messageId,
      locale,
    });
  }
}

export class CatalogDecodeError extends AppError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot decode message file ${path}: ${reason}`, 'CATALOG_DECODE_FAILURE', { path }, { cause });
  }
}

export class InvalidPluralCountError extends AppError {
  constructor(messageId: string, count: unknown) {
    super(`Invalid plural count ${String(count)} for message '${messageId}'`, 'INVALID_PLURAL_COUNT', {
      messageId,
      count,
    });
  }
}

// ============================================
// CONFIGURATION
// ============================================

export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', details, { isOperational: false });
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
