import { z } from 'zod';

/**
 * A single message as written in a catalog file.
 * Keys are matched case-insensitively.
 */
export const messageDefinitionSchema = z.strictObject({
  id: z.string().optional(),
  description: z.string().optional(),
  hash: z.string().optional(),
  zero: z.string().optional(),
  one: z.string().optional(),
  two: z.string().optional(),
  few: z.string().optional(),
  many: z.string().optional(),
  other: z.string().optional(),
});

export type MessageDefinition = z.infer<typeof messageDefinitionSchema>;

export type MessageCatalog = Map<string, MessageDefinition>;

/**
 * Type guard to check if a value is a record object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lowerKeys(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key.toLowerCase(), entry]));
}

/**
 * A table is a message when every key is a message field holding a string
 */
function asMessageDefinition(value: Record<string, unknown>): MessageDefinition | undefined {
  if (Object.keys(value).length === 0) {
    return undefined;
  }
  const result = messageDefinitionSchema.safeParse(lowerKeys(value));
  return result.success ? result.data : undefined;
}

/**
 * Flatten decoded catalog data into message id -> definition.
 *
 * `hello = "Hi"` is shorthand for `[hello] other = "Hi"`; tables that are not
 * messages nest, joining ids with ".".
 *
 * @throws Error describing the first entry that is neither
 */
export function flattenCatalog(data: unknown): MessageCatalog {
  const catalog: MessageCatalog = new Map();

  if (data === null || data === undefined) {
    return catalog;
  }
  if (!isRecord(data)) {
    throw new Error('top-level value must be a table of messages');
  }

  const visit = (prefix: string, value: Record<string, unknown>): void => {
    for (const [key, entry] of Object.entries(value)) {
      const id = prefix ? `${prefix}.${key}` : key;

      if (typeof entry === 'string') {
        catalog.set(id, { other: entry });
        continue;
      }

      if (!isRecord(entry)) {
        throw new Error(`message "${id}" must be a string or a table`);
      }

      const definition = asMessageDefinition(entry);
      if (definition) {
        catalog.set(definition.id ?? id, definition);
      } else {
        visit(id, entry);
      }
    }
  };

  visit('', data);
  return catalog;
}
