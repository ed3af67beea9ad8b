import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import {
  getLocalizerService,
  localize,
  mustTranslate,
  resolve,
  setLocalizerService,
  translate,
} from '../../src/shared/i18n/index.js';
import { RequestContext } from '../../src/shared/context/index.js';
import { Message } from '../../src/domain/models/index.js';
import type { ILocalizerService, Localizer } from '../../src/domain/services/ILocalizerService.js';
import { LocalizerServiceNotSetError } from '../../src/shared/errors/index.js';

const localizer: Localizer = { locale: 'en', localize: () => 'unused' };

interface MockService extends ILocalizerService {
  resolve: Mock<ILocalizerService['resolve']>;
  translate: Mock<ILocalizerService['translate']>;
  mustTranslate: Mock<ILocalizerService['mustTranslate']>;
}

function createMockService(): MockService {
  return {
    resolve: vi.fn<ILocalizerService['resolve']>(() => ({ localizer, found: true })),
    translate: vi.fn<ILocalizerService['translate']>(() => ({ success: true, text: 'Translated' })),
    mustTranslate: vi.fn<ILocalizerService['mustTranslate']>(() => 'Translated'),
  };
}

describe('global localizer service', () => {
  afterEach(() => {
    setLocalizerService(null);
  });

  describe('setLocalizerService', () => {
    it('should replace and restore the service', () => {
      const service = createMockService();

      const restore = setLocalizerService(service);
      expect(getLocalizerService()).toBe(service);

      restore();
      expect(getLocalizerService()).toBeNull();
    });

    it('should restore nested swaps in reverse order', () => {
      const first = createMockService();
      const second = createMockService();

      const restoreFirst = setLocalizerService(first);
      const restoreSecond = setLocalizerService(second);
      expect(getLocalizerService()).toBe(second);

      restoreSecond();
      expect(getLocalizerService()).toBe(first);

      restoreFirst();
      expect(getLocalizerService()).toBeNull();
    });

    it('should be safe to call a restore function more than once', () => {
      const original = createMockService();
      setLocalizerService(original);
      const restore = setLocalizerService(createMockService());

      restore();
      expect(getLocalizerService()).toBe(original);

      restore();
      expect(getLocalizerService()).toBe(original);
    });

    it('should restore the snapshot taken at its own swap', () => {
      const a = createMockService();
      const b = createMockService();
      const c = createMockService();

      const restoreA = setLocalizerService(a);
      const restoreB = setLocalizerService(b);
      const restoreC = setLocalizerService(c);
      restoreC();

      restoreA();
      expect(getLocalizerService()).toBeNull();

      // Not an undo stack: B's snapshot is A even after A was restored away
      restoreB();
      expect(getLocalizerService()).toBe(a);
    });

    it('should return null when cleared', () => {
      const restore = setLocalizerService(createMockService());
      setLocalizerService(null);

      expect(getLocalizerService()).toBeNull();
      restore();
    });

    it('should give concurrent readers the same service', async () => {
      const service = createMockService();
      setLocalizerService(service);

      const results = await Promise.all(
        Array.from({ length: 100 }, async () => {
          await Promise.resolve();
          return getLocalizerService();
        })
      );

      expect(results.every((result) => result === service)).toBe(true);
    });

    it('should always observe a complete service during interleaved swaps', async () => {
      const base = createMockService();
      setLocalizerService(base);

      const observed = await Promise.all(
        Array.from({ length: 50 }, async (_, index) => {
          await Promise.resolve();
          if (index % 2 === 0) {
            const restore = setLocalizerService(createMockService());
            await Promise.resolve();
            restore();
            return 'writer';
          }
          return getLocalizerService() === null ? 'missing' : 'present';
        })
      );

      expect(observed).not.toContain('missing');
    });
  });

  describe('pass-through helpers', () => {
    it('should forward resolve', () => {
      const service = createMockService();
      setLocalizerService(service);

      expect(resolve('fr')).toEqual({ localizer, found: true });
      expect(service.resolve).toHaveBeenCalledWith('fr');
    });

    it('should forward translate', () => {
      const service = createMockService();
      setLocalizerService(service);
      const message = Message.create('test.message');

      expect(translate(localizer, message)).toEqual({ success: true, text: 'Translated' });
      expect(service.translate).toHaveBeenCalledWith(localizer, message);
    });

    it('should forward mustTranslate', () => {
      const service = createMockService();
      setLocalizerService(service);
      const message = Message.create('test.message');

      expect(mustTranslate(localizer, message)).toBe('Translated');
      expect(service.mustTranslate).toHaveBeenCalledWith(localizer, message);
    });

    it('should throw when no service is installed', () => {
      setLocalizerService(null);

      expect(() => resolve('en')).toThrow(LocalizerServiceNotSetError);
      expect(() => translate(localizer, Message.create('test'))).toThrow(LocalizerServiceNotSetError);
      expect(() => mustTranslate(localizer, Message.create('test'))).toThrow(LocalizerServiceNotSetError);
      expect(() => localize(Message.create('test'))).toThrow(LocalizerServiceNotSetError);
    });
  });

  describe('localize', () => {
    it('should use the locale of the request context', () => {
      const service = createMockService();
      setLocalizerService(service);

      const result = RequestContext.run({ locale: 'fr' }, () => localize(Message.create('hello')));

      expect(service.resolve).toHaveBeenCalledWith('fr');
      expect(result).toEqual({ success: true, text: 'Translated', found: true });
    });

    it('should prefer an explicit locale', () => {
      const service = createMockService();
      setLocalizerService(service);

      RequestContext.run({ locale: 'fr' }, () => localize(Message.create('hello'), 'de'));

      expect(service.resolve).toHaveBeenCalledWith('de');
    });

    it('should fall back to the default outside a request', () => {
      const service = createMockService();
      service.resolve.mockReturnValue({ localizer, found: false });
      setLocalizerService(service);

      const result = localize(Message.create('hello'));

      expect(service.resolve).toHaveBeenCalledWith('');
      expect(result.found).toBe(false);
    });
  });
});
