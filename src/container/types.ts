/**
 * Read-only view over a bundle of text and audio resources.
 * Entry paths are relative to the container root and use `/` separators.
 */
export interface Container {
  readonly source: string;
  entries(): readonly string[];
  readEntry(entryPath: string): Uint8Array;
  hasSimpleConfig(): boolean;
  hasStructuredConfig(): boolean;
  simpleConfigEntryPath(): string | undefined;
  structuredConfigEntryPath(): string | undefined;
}
