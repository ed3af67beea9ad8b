/**
 * i18n Module
 *
 * Process-wide slot for the active localizer service, plus pass-through
 * helpers for call sites that prefer ambient access over passing the
 * registry along.
 *
 * @example
 * const restore = setLocalizerService(LocalizerRegistry.fromDirectory({ ... }));
 *
 * const { localizer } = resolve('fr');
 * const text = mustTranslate(localizer, Message.create('hello').withData({ name: 'World' }));
 *
 * restore();
 *
 * A restore function re-installs whatever was active when *its* swap happened.
 * It is a snapshot, not an undo stack: with interleaved swaps the final value
 * is the snapshot of the last restore called.
 */
import { RequestContext } from '../context/index.js';
import { LocalizerServiceNotSetError } from '../errors/index.js';
import type { Message } from '../../domain/models/index.js';
import type {
  ILocalizerService,
  Localizer,
  ResolvedLocalizer,
  TranslateResult,
} from '../../domain/services/ILocalizerService.js';

// ============================================
// GLOBAL SLOT
// ============================================

// Every access is a single synchronous read or assignment on the event loop
let currentService: ILocalizerService | null = null;

/**
 * Replace the active service
 * @returns a function restoring the service active before this call
 */
export function setLocalizerService(service: ILocalizerService | null): () => void {
  const previous = currentService;
  currentService = service;
  return () => {
    currentService = previous;
  };
}

export function getLocalizerService(): ILocalizerService | null {
  return currentService;
}

function requireService(): ILocalizerService {
  const service = currentService;
  if (!service) {
    throw new LocalizerServiceNotSetError();
  }
  return service;
}

// ============================================
// PASS-THROUGH
// ============================================

/**
 * @throws LocalizerServiceNotSetError when no service is installed
 */
export function resolve(locale: string): ResolvedLocalizer {
  return requireService().resolve(locale);
}

/**
 * @throws LocalizerServiceNotSetError when no service is installed
 */
export function translate(localizer: Localizer, message: Message | null | undefined): TranslateResult {
  return requireService().translate(localizer, message);
}

/**
 * @throws LocalizerServiceNotSetError when no service is installed
 */
export function mustTranslate(localizer: Localizer, message: Message | null | undefined): string {
  return requireService().mustTranslate(localizer, message);
}

/**
 * Translate for the locale of the current RequestContext (or an explicit one).
 * Without either, the service's default locale is used.
 */
export function localize(message: Message, locale?: string): TranslateResult & { found: boolean } {
  const service = requireService();
  const { localizer, found } = service.resolve(locale ?? RequestContext.getLocale() ?? '');
  return { ...service.translate(localizer, message), found };
}
