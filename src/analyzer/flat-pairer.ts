import { relativeEntryPath, stripExtension } from '../container/entry-path';
import type { MatchedUnit } from './types';

export type EntryStream = 'text' | 'audio';

export interface DuplicateKeyEvent {
  stream: EntryStream;
  key: string;
  discarded: string;
  kept: string;
}

export interface FlatPairingOptions {
  // Keys are computed relative to these roots when given
  textRoot?: string | undefined;
  audioRoot?: string | undefined;
  onDuplicateKey?: ((event: DuplicateKeyEvent) => void) | undefined;
}

export function pairingKey(entry: string, root?: string): string {
  const relative = root === undefined ? entry : relativeEntryPath(entry, root) ?? entry;
  return stripExtension(relative);
}

function keyEntries(
  entries: readonly string[],
  stream: EntryStream,
  root: string | undefined,
  onDuplicateKey: FlatPairingOptions['onDuplicateKey']
): Map<string, string> {
  const byKey = new Map<string, string>();
  for (const entry of entries) {
    const key = pairingKey(entry, root);
    const previous = byKey.get(key);
    if (previous !== undefined && onDuplicateKey) {
      onDuplicateKey({ stream, key, discarded: previous, kept: entry });
    }
    // Last entry wins; the key keeps its first position
    byKey.set(key, entry);
  }
  return byKey;
}

/**
 * Pairs text and audio entries whose paths agree once the extension is
 * removed. Keys present on one side only are dropped. Order follows the
 * text entries.
 */
export function pairFlatEntries(
  textEntries: readonly string[],
  audioEntries: readonly string[],
  options: FlatPairingOptions = {}
): MatchedUnit[] {
  const texts = keyEntries(textEntries, 'text', options.textRoot, options.onDuplicateKey);
  const audios = keyEntries(audioEntries, 'audio', options.audioRoot, options.onDuplicateKey);

  const units: MatchedUnit[] = [];
  for (const [key, textPath] of texts) {
    const audioPath = audios.get(key);
    if (audioPath !== undefined) {
      units.push({ identifier: key, textPath, audioPath });
    }
  }
  return units;
}
