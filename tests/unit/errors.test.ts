import { describe, it, expect } from 'vitest';
import {
  AppError,
  InvalidTranslationFilesError,
  LocalizerServiceNotSetError,
  MessageFormMissingError,
  PathNotFoundError,
  isAppError,
  isOperationalError,
} from '../../src/shared/errors/index.js';

describe('AppError', () => {
  it('should serialize code, message and details', () => {
    const error = new PathNotFoundError('/missing');

    expect(error.toJSON()).toEqual({
      error: 'PATH_NOT_FOUND',
      message: 'Translations path does not exist: /missing',
      details: { path: '/missing' },
      timestamp: error.timestamp.toISOString(),
    });
    expect(error.name).toBe('PathNotFoundError');
  });

  it('should list every invalid file with the accepted extensions', () => {
    const error = new InvalidTranslationFilesError(
      [
        { fileName: 'a..toml', reason: 'bad' },
        { fileName: 'b.toml', reason: 'bad' },
      ],
      ['active', 'common'],
      ['.toml', '.json']
    );

    expect(error.message).toBe(
      "Found 2 invalid translation files with prefixes [active, common]: [a..toml, b.toml] (files must follow format 'prefix.{locale}.{ext}' where ext is one of: .toml, .json)"
    );
  });
});

describe('MessageFormMissingError', () => {
  it('should carry the message id and locale', () => {
    const error = new MessageFormMissingError('items', 'en');

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('MESSAGE_FORM_MISSING');
    expect(error.message).toBe('Message "items" has no "other" form in language "en"');
    expect(error.details).toEqual({ messageId: 'items', locale: 'en' });
  });
});

describe('error guards', () => {
  it('should recognise application errors', () => {
    expect(isAppError(new PathNotFoundError('/x'))).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
  });

  it('should separate operational errors from programming errors', () => {
    expect(isOperationalError(new PathNotFoundError('/x'))).toBe(true);
    expect(isOperationalError(new LocalizerServiceNotSetError())).toBe(false);
    expect(isOperationalError(new Error('plain'))).toBe(false);
  });
});
