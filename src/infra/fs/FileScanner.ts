/**
 * File Scanner
 *
 * Discovers translation files (`<prefix>.<locale>.<ext>`) directly inside one
 * directory. Fatal problems with the directory itself are thrown; problems
 * with individual files are collected and reported together so that a single
 * pass shows everything wrong.
 *
 * @example
 * const { files, error } = new FileScanner().scan('config/translations', ['active']);
 * if (error) logger.warn({ err: error }, 'Some translation files were rejected');
 */
import { closeSync, openSync, readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import type { Logger } from '../logger/logger.js';
import { LoggerFactory } from '../logger/logger.js';
import {
  InvalidTranslationFilesError,
  PathNotDirectoryError,
  PathNotFoundError,
  ReadFailureError,
  isAppError,
  type InvalidTranslationFile,
} from '../../shared/errors/index.js';
import {
  SUPPORTED_EXTENSIONS,
  extractAndValidateLocale,
  hasSupportedExtension,
} from '../../domain/locale/index.js';
import {
  createTranslationFileDescriptor,
  type TranslationFileDescriptor,
} from '../../domain/models/index.js';

// ============================================
// CONSTANTS
// ============================================

/** 1 MiB */
export const MAX_TRANSLATION_FILE_SIZE = 1024 * 1024;

// ============================================
// TYPES
// ============================================

export interface ScanResult {
  files: TranslationFileDescriptor[];
  invalidFiles: InvalidTranslationFile[];
  /** Set when invalidFiles is not empty */
  error?: InvalidTranslationFilesError;
}

export interface FileScannerOptions {
  logger?: Logger;
  maxFileSize?: number;
}

// ============================================
// SCANNER
// ============================================

export class FileScanner {
  private readonly logger: Logger;
  private readonly maxFileSize: number;

  constructor(options: FileScannerOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.forComponent('FileScanner');
    this.maxFileSize = options.maxFileSize ?? MAX_TRANSLATION_FILE_SIZE;
  }

  /**
   * Scan one directory (non-recursive)
   *
   * @param directoryPath - Directory holding the translation files
   * @param prefixes - When non-empty, only `<prefix>.` files are candidates
   * @throws PathNotFoundError | PathNotDirectoryError | ReadFailureError
   */
  scan(directoryPath: string, prefixes: Iterable<string> = []): ScanResult {
    const prefixList = [...new Set(prefixes)];
    const entries = this.readDirectory(directoryPath);

    const files: TranslationFileDescriptor[] = [];
    const invalidFiles: InvalidTranslationFile[] = [];

    for (const entry of entries) {
      const fileName = entry.name;

      if (entry.isDirectory()) {
        this.logger.debug({ fileName }, 'Skipping directory entry');
        continue;
      }

      if (!hasSupportedExtension(fileName)) {
        this.logger.debug({ fileName }, 'Skipping file with unsupported extension');
        continue;
      }

      if (!matchesPrefix(fileName, prefixList)) {
        this.logger.debug({ fileName, prefixes: prefixList }, 'Skipping file without matching prefix');
        continue;
      }

      const fullPath = join(directoryPath, fileName);

      const fileProblem = this.checkFile(fullPath);
      if (fileProblem) {
        invalidFiles.push({ fileName, reason: fileProblem });
        continue;
      }

      try {
        const locale = extractAndValidateLocale(fileName);
        files.push(createTranslationFileDescriptor(fullPath, fileName, locale));
      } catch (error) {
        if (!isAppError(error)) {
          throw error;
        }
        invalidFiles.push({ fileName, reason: error.message });
      }
    }

    this.logger.info(
      { directoryPath, accepted: files.length, rejected: invalidFiles.length },
      'Translation directory scanned'
    );

    if (invalidFiles.length === 0) {
      return { files, invalidFiles };
    }

    return {
      files,
      invalidFiles,
      error: new InvalidTranslationFilesError(invalidFiles, prefixList, SUPPORTED_EXTENSIONS),
    };
  }

  private readDirectory(directoryPath: string): Dirent[] {
    try {
      if (!statSync(directoryPath).isDirectory()) {
        throw new PathNotDirectoryError(directoryPath);
      }
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      if (errorCode(error) === 'ENOENT') {
        throw new PathNotFoundError(directoryPath);
      }
      throw new ReadFailureError(directoryPath, error);
    }

    try {
      return readdirSync(directoryPath, { withFileTypes: true }).sort((a, b) =>
        a.name < b.name ? -1 : a.name > b.name ? 1 : 0
      );
    } catch (error) {
      throw new ReadFailureError(directoryPath, error);
    }
  }

  /**
   * Size and readability check
   * @returns the rejection reason, or undefined when the file is usable
   */
  private checkFile(filePath: string): string | undefined {
    try {
      const stats = statSync(filePath);
      if (!stats.isFile()) {
        return 'not a regular file';
      }
      if (stats.size > this.maxFileSize) {
        return `file is larger than ${this.maxFileSize} bytes (${stats.size} bytes)`;
      }
      closeSync(openSync(filePath, 'r'));
      return undefined;
    } catch (error) {
      return `file cannot be read: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
}

function matchesPrefix(fileName: string, prefixes: readonly string[]): boolean {
  if (prefixes.length === 0) {
    return true;
  }
  return prefixes.some((prefix) => fileName.startsWith(`${prefix}.`));
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
