/**
 * Values substituted into a message template, addressed as {{.name}}
 */
export type TemplateData = Record<string, unknown>;

/**
 * Count used to pick the plural form. Strings hold decimal numbers ("1.5").
 */
export type PluralCount = number | string;

/**
 * Translatable message
 * Built fluently; each with* call mutates and returns the same instance.
 */
export class Message {
  private _data: TemplateData | undefined;
  private _pluralCount: PluralCount | undefined;

  constructor(public readonly id: string) {}

  get data(): TemplateData | undefined {
    return this._data;
  }

  get pluralCount(): PluralCount | undefined {
    return this._pluralCount;
  }

  // Factory method
  static create(id: string): Message {
    return new Message(id);
  }

  withData(data: TemplateData | undefined): this {
    this._data = data;
    return this;
  }

  withPluralCount(count: PluralCount | undefined): this {
    this._pluralCount = count;
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      data: this._data,
      pluralCount: this._pluralCount,
    };
  }
}
