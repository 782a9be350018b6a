import { CONFIG_STRING_ASSIGNMENT, CONFIG_STRING_SEPARATOR } from '../config/constants';

// Key-value mapping as read from a configuration, in declaration order
export type RawConfig = Record<string, string>;

const BOM = '\uFEFF';

/**
 * Converts the contents of a config.txt file into a configuration string:
 * one `key=value` pair per non-empty, non-comment line, joined with `|`.
 */
export function configTextToString(raw: string): string {
  const text = raw.startsWith(BOM) ? raw.slice(BOM.length) : raw;
  const pairs: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    pairs.push(line);
  }
  return pairs.join(CONFIG_STRING_SEPARATOR);
}

export function parseConfigString(configString: string): RawConfig {
  const pairs: Array<[string, string]> = [];
  for (const chunk of configString.split(CONFIG_STRING_SEPARATOR)) {
    const at = chunk.indexOf(CONFIG_STRING_ASSIGNMENT);
    if (at === -1) continue;
    const key = chunk.slice(0, at).trim();
    if (!key) continue;
    pairs.push([key, chunk.slice(at + 1).trim()]);
  }
  // fromEntries defines own properties, so keys such as __proto__ stay plain data
  return Object.fromEntries(pairs);
}

export function serializeConfig(config: RawConfig): string {
  return Object.entries(config)
    .map(([key, value]) => `${key}${CONFIG_STRING_ASSIGNMENT}${value}`)
    .join(CONFIG_STRING_SEPARATOR);
}
