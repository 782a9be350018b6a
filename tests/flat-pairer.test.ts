import { describe, it, expect, vi } from 'vitest';
import { pairFlatEntries, pairingKey } from '../src/analyzer/flat-pairer';
import type { MatchedUnit } from '../src/analyzer/types';

function byIdentifier(units: MatchedUnit[]): MatchedUnit[] {
  return [...units].sort((a, b) => a.identifier.localeCompare(b.identifier));
}

describe('pairFlatEntries', () => {
  it('pairs entries whose paths agree without extension', () => {
    expect(pairFlatEntries(['a/x.txt'], ['a/x.mp3'])).toEqual([
      { identifier: 'a/x', textPath: 'a/x.txt', audioPath: 'a/x.mp3' },
    ]);
  });

  it('drops keys present on one side only', () => {
    expect(pairFlatEntries(['a/x.txt'], ['a/y.mp3'])).toEqual([]);
  });

  it('keeps directories in the key', () => {
    expect(pairFlatEntries(['a/x.txt'], ['b/x.mp3'])).toEqual([]);
  });

  it('computes keys relative to the given roots', () => {
    const units = pairFlatEntries(['text/ch1.txt', 'text/ch2.txt'], ['audio/ch1.mp3'], {
      textRoot: 'text',
      audioRoot: 'audio',
    });
    expect(units).toEqual([{ identifier: 'ch1', textPath: 'text/ch1.txt', audioPath: 'audio/ch1.mp3' }]);
  });

  it('yields the same pairs for any input order', () => {
    const texts = ['a/1.txt', 'a/2.txt', 'a/3.txt'];
    const audios = ['a/3.mp3', 'a/1.mp3'];
    const forward = pairFlatEntries(texts, audios);
    const backward = pairFlatEntries([...texts].reverse(), [...audios].reverse());
    expect(byIdentifier(backward)).toEqual(byIdentifier(forward));
    expect(forward.map((u) => u.identifier)).toEqual(['a/1', 'a/3']);
  });

  it('follows the order of the text entries', () => {
    expect(pairFlatEntries(['b.txt', 'a.txt'], ['a.mp3', 'b.mp3']).map((u) => u.identifier)).toEqual(['b', 'a']);
  });

  it('keeps the last entry of a duplicated key and reports it', () => {
    const onDuplicateKey = vi.fn();
    const units = pairFlatEntries(['a/x.txt', 'a/x.xhtml'], ['a/x.mp3'], { onDuplicateKey });

    expect(units).toEqual([{ identifier: 'a/x', textPath: 'a/x.xhtml', audioPath: 'a/x.mp3' }]);
    expect(onDuplicateKey).toHaveBeenCalledTimes(1);
    expect(onDuplicateKey).toHaveBeenCalledWith({
      stream: 'text',
      key: 'a/x',
      discarded: 'a/x.txt',
      kept: 'a/x.xhtml',
    });
  });
});

describe('pairingKey', () => {
  it('falls back to the full path outside the root', () => {
    expect(pairingKey('other/x.txt', 'text')).toBe('other/x');
    expect(pairingKey('text/x.txt', 'text')).toBe('x');
  });
});
