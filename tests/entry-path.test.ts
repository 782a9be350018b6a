import { describe, it, expect } from 'vitest';
import {
  entryBasename,
  entryDirname,
  normJoin,
  relativeEntryPath,
  splitEntryPath,
  stripExtension,
  toEntryPath,
} from '../src/container/entry-path';

describe('normJoin', () => {
  it('drops trailing separators and current-directory parts', () => {
    expect(normJoin('', 'assets/')).toBe('assets');
    expect(normJoin('a', '.')).toBe('a');
    expect(normJoin('a/b', '../c')).toBe('a/c');
  });

  it('skips undefined parts', () => {
    expect(normJoin('out', undefined, 'ch1.smil')).toBe('out/ch1.smil');
  });

  it('yields the current directory when nothing is left', () => {
    expect(normJoin()).toBe('.');
    expect(normJoin('', '')).toBe('.');
  });

  it('converts backslashes', () => {
    expect(normJoin('a\\b', 'c')).toBe('a/b/c');
    expect(toEntryPath('x\\y.txt')).toBe('x/y.txt');
  });
});

describe('splitEntryPath', () => {
  it('treats the root as having no segments', () => {
    expect(splitEntryPath('.')).toEqual([]);
    expect(splitEntryPath('')).toEqual([]);
  });

  it('ignores empty segments', () => {
    expect(splitEntryPath('a//b/')).toEqual(['a', 'b']);
    expect(splitEntryPath('./a/b.txt')).toEqual(['a', 'b.txt']);
  });
});

describe('relativeEntryPath', () => {
  it('returns the part below the root', () => {
    expect(relativeEntryPath('text/ch1.txt', 'text')).toBe('ch1.txt');
    expect(relativeEntryPath('text/sub/ch1.txt', 'text')).toBe('sub/ch1.txt');
  });

  it('compares whole segments', () => {
    expect(relativeEntryPath('text2/a.txt', 'text')).toBeUndefined();
  });

  it('does not count the root itself as inside', () => {
    expect(relativeEntryPath('text', 'text')).toBeUndefined();
  });

  it('treats . and the empty string as the container root', () => {
    expect(relativeEntryPath('a/b.txt', '.')).toBe('a/b.txt');
    expect(relativeEntryPath('a/b.txt', '')).toBe('a/b.txt');
  });
});

describe('file name helpers', () => {
  it('removes only the final extension', () => {
    expect(stripExtension('a/x.txt')).toBe('a/x');
    expect(stripExtension('a/x.tar.gz')).toBe('a/x.tar');
    expect(stripExtension('a.b/c')).toBe('a.b/c');
    expect(stripExtension('.hidden')).toBe('.hidden');
  });

  it('splits directory and base name', () => {
    expect(entryDirname('config.txt')).toBe('');
    expect(entryDirname('a/b/config.txt')).toBe('a/b');
    expect(entryBasename('a/b/config.txt')).toBe('config.txt');
  });
});
