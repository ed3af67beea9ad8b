import { describe, it, expect } from 'vitest';
import { RequestContext } from '../../src/shared/context/index.js';

describe('RequestContext', () => {
  it('should expose the locale inside a context only', () => {
    expect(RequestContext.getLocale()).toBeUndefined();

    const locale = RequestContext.run({ locale: 'fr' }, () => RequestContext.getLocale());

    expect(locale).toBe('fr');
    expect(RequestContext.getLocale()).toBeUndefined();
  });

  it('should keep the context across awaits', async () => {
    const result = await RequestContext.runAsync({ locale: 'de' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return RequestContext.getLocale();
    });

    expect(result).toBe('de');
  });

  it.each([
    ['fr-CH, fr;q=0.9, en;q=0.8', 'fr-CH'],
    ['en', 'en'],
    ['de;q=0.7', 'de'],
    ['*', undefined],
    ['', undefined],
    [undefined, undefined],
  ])('should take the first Accept-Language entry of %s', (header, expected) => {
    expect(RequestContext.parseAcceptLanguage(header)).toBe(expected);
  });
});
