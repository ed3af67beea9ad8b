/**
 * RequestContext - Request-scoped data storage using AsyncLocalStorage
 *
 * Carries the caller's preferred locale through a request so that
 * `localize()` can be used without threading the locale through every call.
 *
 * Usage:
 *   // In middleware:
 *   RequestContext.run({ locale: 'fr' }, () => handleRequest());
 *
 *   // Anywhere in the call stack:
 *   const locale = RequestContext.getLocale(); // 'fr'
 *
 * @see https://nodejs.org/api/async_context.html
 */
import { AsyncLocalStorage } from 'async_hooks';

// ============================================
// TYPES
// ============================================

export interface RequestContextData {
  /** User's preferred language (BCP 47) */
  locale?: string;
}

// ============================================
// ASYNC LOCAL STORAGE INSTANCE
// ============================================

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

// ============================================
// REQUEST CONTEXT API
// ============================================

export const RequestContext = {
  /**
   * Run a function within a request context
   * All code executed within the callback will have access to the context
   */
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Run an async function within a request context
   */
  runAsync<T>(context: RequestContextData, fn: () => Promise<T>): Promise<T> {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (or undefined if not in a context)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current locale (undefined outside a context)
   */
  getLocale(): string | undefined {
    return asyncLocalStorage.getStore()?.locale;
  },

  /**
   * First language of an Accept-Language header ("fr-CH, fr;q=0.9" -> "fr-CH")
   */
  parseAcceptLanguage(value: string | undefined): string | undefined {
    const first = value?.split(',')[0]?.split(';')[0]?.trim();
    return first && first !== '*' ? first : undefined;
  },
};

export default RequestContext;
