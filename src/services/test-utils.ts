// Shared fixtures for scanner tests

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { zipSync } from 'fflate';
import { Logger, LogLevel } from '../core/logger.js';
import type { Finder, SchemeFinderFactory } from '../models/finder.js';
import type { LocationIdentifier } from '../models/location.js';
import { formatLocation } from '../models/location.js';
import type { LoadingContext } from '../models/types.js';
import { BaseFinder } from './finders/base-finder.js';
import { LocationProvider } from './location/location-provider.js';

export const silentLogger = new Logger({ level: LogLevel.SILENT });

/**
 * Finder over a fixed list of names; each resource's content is its name
 */
export class ListFinder extends BaseFinder {
  private position = 0;
  readonly removed: string[] = [];

  constructor(private readonly names: readonly string[], private readonly writable = false) {
    super();
  }

  protected advance(): string | null {
    return this.position < this.names.length ? this.names[this.position++] : null;
  }

  protected openResource(name: string): Readable {
    return Readable.from([Buffer.from(name)]);
  }

  protected removeResource(name: string): void {
    if (!this.writable) {
      super.removeResource(name);
    }
    this.removed.push(name);
  }

  protected restart(): void {
    this.position = 0;
  }
}

/**
 * Serves `mem:` locations from an in-memory table of location -> names
 */
export class MemorySchemeFinderFactory implements SchemeFinderFactory {
  readonly kind = 'memory';
  readonly created: string[] = [];

  constructor(
    private readonly content: Record<string, readonly string[]>,
    private readonly schemes: ReadonlySet<string> = new Set(['mem'])
  ) {}

  supportedSchemes(): ReadonlySet<string> {
    return this.schemes;
  }

  create(location: LocationIdentifier): Finder {
    const key = formatLocation(location);
    this.created.push(key);
    return new ListFinder(this.content[key] ?? []);
  }
}

/**
 * LocationProvider answering from a fixed table of namespace path -> raw locations
 */
export class FakeLocationProvider extends LocationProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly table: Record<string, readonly string[]>,
    private readonly failOn?: { namespacePath: string; error: Error }
  ) {
    super();
  }

  *getLocations(namespacePath: string, _context: LoadingContext): Iterable<string> {
    this.calls.push(namespacePath);
    if (this.failOn && this.failOn.namespacePath === namespacePath) {
      throw this.failOn.error;
    }
    yield* this.table[namespacePath] ?? [];
  }
}

export async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function drain(cursor: { hasNext(): boolean; next(): string }): string[] {
  const names: string[] = [];
  while (cursor.hasNext()) {
    names.push(cursor.next());
  }
  return names;
}

export function makeTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `nsscan-${label}-`));
}

/**
 * Writes files (relative path -> content) below a directory
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, ...relative.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

/**
 * Builds ZIP bytes from entry name -> content
 */
export function zipBytes(files: Record<string, string | Uint8Array>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(files)) {
    entries[name] = typeof content === 'string' ? new TextEncoder().encode(content) : content;
  }
  return zipSync(entries);
}

/**
 * Runs `action` and returns what it threw
 */
export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}
