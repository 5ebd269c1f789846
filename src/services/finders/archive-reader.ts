// ZIP archive access shared by the archive finder and the search path provider

import * as fs from 'fs';
import { unzipSync } from 'fflate';

/**
 * Lists entry names without decompressing any entry
 */
export function listArchiveEntries(data: Uint8Array): string[] {
  const names: string[] = [];
  unzipSync(data, {
    filter: file => {
      names.push(file.name);
      return false;
    }
  });
  return names;
}

/**
 * Decompresses the entries accepted by `accept`
 */
export function extractArchiveEntries(
  data: Uint8Array,
  accept: (name: string) => boolean
): Map<string, Uint8Array> {
  const entries = unzipSync(data, { filter: file => accept(file.name) });
  return new Map(Object.entries(entries));
}

/**
 * Reads an archive file and descends into nested archives by entry name.
 * Returns the bytes of the innermost archive.
 */
export function openNestedArchive(archivePath: string, nested: readonly string[]): Uint8Array {
  let data: Uint8Array = fs.readFileSync(archivePath);

  for (const entryName of nested) {
    const inner = extractArchiveEntries(data, name => name === entryName).get(entryName);
    if (inner === undefined) {
      throw new Error(`Nested archive entry not found: ${entryName}`);
    }
    data = inner;
  }

  return data;
}

/**
 * True when the entry lies under the prefix and is not a directory entry
 */
export function isEntryUnder(name: string, prefix: string): boolean {
  if (name.endsWith('/')) {
    return false;
  }
  return prefix === '' || name.startsWith(`${prefix}/`);
}
