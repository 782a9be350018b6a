import { ConfigError } from '../errors/index';

export function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compiles a file or directory name pattern taken from a configuration.
 * Patterns are plain (non-global) expressions so `test()` carries no state.
 */
export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Invalid regular expression '${source}': ${reason}`);
  }
}

// Matches only at the start of the subject, like a prefix match on the name
export function anchorAtStart(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '');
  return new RegExp(`^(?:${pattern.source})`, flags);
}
