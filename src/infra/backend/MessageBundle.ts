/**
 * Message Bundle
 *
 * Default translation backend. Decodes TOML, JSON and YAML message files,
 * keeps one catalog per locale and hands out a Localizer per locale.
 *
 * Messages are written as
 *
 *   [items]
 *   one = "{{.count}} item"
 *   other = "{{.count}} items"
 *
 * The plural form is picked with Intl.PluralRules for the catalog's locale.
 * Ids missing from a locale are looked up in the default locale's catalog.
 */
import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import type { Logger } from '../logger/logger.js';
import { LoggerFactory } from '../logger/logger.js';
import {
  CatalogDecodeError,
  InvalidPluralCountError,
  MessageFormMissingError,
  MessageNotFoundError,
} from '../../shared/errors/index.js';
import { canonicalizeLocale, extractLocale, validateLocale } from '../../domain/locale/index.js';
import type { LocaleTag, PluralCount, TemplateData } from '../../domain/models/index.js';
import type { LocalizeConfig, Localizer } from '../../domain/services/ILocalizerService.js';
import { DEFAULT_DECODERS, normalizeExtension, type CatalogDecoder } from './catalogDecoders.js';
import { flattenCatalog, isRecord, type MessageCatalog } from './messageCatalog.js';

const PLACEHOLDER_REGEX = /\{\{\s*\.([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\s*\}\}/g;

const DECIMAL_REGEX = /^[+-]?\d+(?:\.(\d+))?$/;

// Intl.PluralRules default
const DEFAULT_MAX_FRACTION_DIGITS = 3;

// ============================================
// LOCALIZER
// ============================================

export class BundleLocalizer implements Localizer {
  private readonly pluralRules: Intl.PluralRules;

  /**
   * @param fallback - Localizer of the default locale, when it is another one
   */
  constructor(
    public readonly locale: LocaleTag,
    private readonly catalog: MessageCatalog,
    private readonly fallback: () => Localizer | undefined = () => undefined
  ) {
    this.pluralRules = new Intl.PluralRules(locale);
  }

  localize(config: LocalizeConfig): string {
    const definition = this.catalog.get(config.messageId);
    if (!definition) {
      const fallback = this.fallback();
      if (fallback) {
        return fallback.localize(config);
      }
      throw new MessageNotFoundError(config.messageId, this.locale);
    }

    let template = definition.other;
    let data = config.templateData;

    if (config.pluralCount !== undefined) {
      template = definition[this.selectPluralForm(config.messageId, config.pluralCount)] ?? definition.other;
      data = { PluralCount: config.pluralCount, ...data };
    }

    if (template === undefined) {
      throw new MessageFormMissingError(config.messageId, this.locale);
    }

    return renderTemplate(template, data);
  }

  /**
   * "1" and "1.0" differ: visible fraction digits of string counts take part in the rules
   */
  private selectPluralForm(messageId: string, count: PluralCount): Intl.LDMLPluralRule {
    const operand = toPluralOperand(count);
    if (!operand) {
      throw new InvalidPluralCountError(messageId, count);
    }
    if (operand.fractionDigits === 0) {
      return this.pluralRules.select(operand.value);
    }
    return new Intl.PluralRules(this.locale, {
      minimumFractionDigits: operand.fractionDigits,
      maximumFractionDigits: Math.max(operand.fractionDigits, DEFAULT_MAX_FRACTION_DIGITS),
    }).select(operand.value);
  }
}

// ============================================
// BUNDLE
// ============================================

export interface MessageBundleOptions {
  /** Catalog consulted for ids missing from the requested locale */
  defaultLocale?: string;
  logger?: Logger;
}

export class MessageBundle {
  private readonly logger: Logger;
  private readonly defaultLocale: LocaleTag | undefined;
  private readonly decoders = new Map<string, CatalogDecoder>(DEFAULT_DECODERS);
  private readonly catalogs = new Map<LocaleTag, MessageCatalog>();
  private readonly localizers = new Map<LocaleTag, BundleLocalizer>();

  constructor(options: MessageBundleOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.forComponent('MessageBundle');
    this.defaultLocale =
      options.defaultLocale === undefined
        ? undefined
        : (canonicalizeLocale(options.defaultLocale) ?? options.defaultLocale);
  }

  /**
   * Register (or replace) the decoder used for an extension
   */
  registerDecoder(extension: string, decoder: CatalogDecoder): this {
    this.decoders.set(normalizeExtension(extension), decoder);
    return this;
  }

  /**
   * Load one message file and return the localizer of its locale.
   * Files of the same locale merge into one catalog; later ids win.
   */
  readonly loadMessageFile = (path: string): Localizer => {
    const fileName = basename(path);
    const extension = normalizeExtension(extname(fileName));

    const decoder = this.decoders.get(extension);
    if (!decoder) {
      throw new CatalogDecodeError(path, `no decoder registered for extension ${extension}`);
    }

    const parsed = extractLocale(fileName);
    validateLocale(parsed, fileName);
    const locale = parsed.toString();

    const content = readFileSync(path, 'utf-8');
    const messages = this.decode(path, content, decoder);

    const catalog = this.catalogFor(locale);
    for (const [id, definition] of messages) {
      catalog.set(id, definition);
    }

    this.logger.debug({ path, locale, messages: messages.size }, 'Message file loaded');
    return this.localizerFor(locale);
  };

  locales(): LocaleTag[] {
    return [...this.catalogs.keys()];
  }

  private decode(path: string, content: string, decoder: CatalogDecoder): MessageCatalog {
    if (content.trim().length === 0) {
      return new Map();
    }

    let data: unknown;
    try {
      data = decoder(content);
    } catch (error) {
      throw new CatalogDecodeError(path, error instanceof Error ? error.message : String(error), error);
    }

    try {
      return flattenCatalog(data);
    } catch (error) {
      throw new CatalogDecodeError(path, error instanceof Error ? error.message : String(error), error);
    }
  }

  private catalogFor(locale: LocaleTag): MessageCatalog {
    const existing = this.catalogs.get(locale);
    if (existing) {
      return existing;
    }
    const catalog: MessageCatalog = new Map();
    this.catalogs.set(locale, catalog);
    return catalog;
  }

  private localizerFor(locale: LocaleTag): BundleLocalizer {
    const existing = this.localizers.get(locale);
    if (existing) {
      return existing;
    }
    const localizer = new BundleLocalizer(locale, this.catalogFor(locale), () =>
      this.defaultLocale === undefined || this.defaultLocale === locale
        ? undefined
        : this.localizers.get(this.defaultLocale)
    );
    this.localizers.set(locale, localizer);
    return localizer;
  }
}

// ============================================
// RENDERING
// ============================================

interface PluralOperand {
  value: number;
  fractionDigits: number;
}

function toPluralOperand(count: PluralCount): PluralOperand | undefined {
  if (typeof count === 'number') {
    return Number.isFinite(count) ? { value: count, fractionDigits: 0 } : undefined;
  }

  const text = count.trim();
  const value = text === '' ? Number.NaN : Number(text);
  if (!Number.isFinite(value)) {
    return undefined;
  }
  return { value, fractionDigits: DECIMAL_REGEX.exec(text)?.[1]?.length ?? 0 };
}

/**
 * Get a nested value using dot notation
 */
function getNestedValue(data: TemplateData, path: string): unknown {
  let current: unknown = data;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Replace {{.name}} placeholders; missing values render as ''
 */
export function renderTemplate(template: string, data: TemplateData | undefined): string {
  return template.replace(PLACEHOLDER_REGEX, (_match, path: string) =>
    data ? formatValue(getNestedValue(data, path)) : ''
  );
}
