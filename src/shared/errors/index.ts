/**
 * Error Handling Module
 *
 * Clean, simple error handling based on isOperational flag.
 */

// Error classes
export {
  AppError,
  PathNotFoundError,
  PathNotDirectoryError,
  ReadFailureError,
  InvalidFilenameFormatError,
  InvalidLocaleError,
  InvalidTranslationFilesError,
  NoCandidatesError,
  DefaultLocaleMissingError,
  LoadFailureError,
  DefaultLocalizerMissingError,
  NilMessageError,
  EmptyMessageIdError,
  BackendTranslateError,
  TranslationFailedError,
  LocalizerServiceNotSetError,
  MessageNotFoundError,
  MessageFormMissingError,
  CatalogDecodeError,
  InvalidPluralCountError,
  ConfigurationError,
  type ErrorDetails,
  type InvalidTranslationFile,
} from './AppError.js';

export { isAppError, isOperationalError } from './guards.js';
