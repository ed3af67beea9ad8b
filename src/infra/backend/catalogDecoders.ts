import { parse as parseToml } from 'smol-toml';
import { parse as parseYaml } from 'yaml';

/**
 * Turns the raw text of a message file into plain data
 */
export type CatalogDecoder = (content: string) => unknown;

export const DEFAULT_DECODERS: ReadonlyArray<readonly [string, CatalogDecoder]> = [
  ['.toml', (content) => parseToml(content)],
  ['.json', (content): unknown => JSON.parse(content)],
  ['.yaml', (content): unknown => parseYaml(content)],
  ['.yml', (content): unknown => parseYaml(content)],
];

/**
 * ".TOML", "toml" -> ".toml"
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
