/**
 * Archive Finder
 *
 * Enumerates the entries of a ZIP-format archive below an entry prefix,
 * including archives nested inside other archives
 * (`jar:file:/app.war!/WEB-INF/lib/core.jar!/com/acme`).
 * The archive is read on first use and is read-only.
 */

import { Readable } from 'stream';
import { DiscoveryIOError } from '../../core/errors.js';
import type { Finder, SchemeFinderFactory } from '../../models/finder.js';
import { formatLocation, type LocationIdentifier } from '../../models/location.js';
import { splitArchiveLocation, type ArchiveLocation } from '../location/uri.js';
import { BaseFinder } from './base-finder.js';
import { extractArchiveEntries, isEntryUnder, openNestedArchive } from './archive-reader.js';

export class ArchiveFinder extends BaseFinder {
  private entries: Map<string, Uint8Array> | null = null;
  private names: string[] = [];
  private position = 0;

  constructor(private readonly archive: ArchiveLocation, private readonly label: string) {
    super();
  }

  private load(): Map<string, Uint8Array> {
    if (this.entries !== null) {
      return this.entries;
    }

    const { archivePath, nested, prefix } = this.archive;
    let extracted: Map<string, Uint8Array>;
    try {
      const data = openNestedArchive(archivePath, nested);
      extracted = extractArchiveEntries(data, name => isEntryUnder(name, prefix));
    } catch (error) {
      throw new DiscoveryIOError(`Unable to read archive ${this.label}`, { archivePath, nested }, { cause: error });
    }

    const offset = prefix === '' ? 0 : prefix.length + 1;
    const entries = new Map<string, Uint8Array>();
    for (const [name, data] of extracted) {
      entries.set(name.slice(offset), data);
    }

    this.entries = entries;
    this.names = [...entries.keys()].sort();
    return entries;
  }

  protected advance(): string | null {
    this.load();
    if (this.position >= this.names.length) {
      return null;
    }
    return this.names[this.position++];
  }

  protected openResource(name: string): Readable {
    const data = this.load().get(name);
    if (data === undefined) {
      throw new DiscoveryIOError(`Entry ${name} not found in ${this.label}`);
    }
    return Readable.from([Buffer.from(data)]);
  }

  protected restart(): void {
    this.position = 0;
  }
}

/**
 * Builds archive finders for `jar`, `zip` and `wsjar` locations
 */
export class ArchiveSchemeFinderFactory implements SchemeFinderFactory {
  readonly kind = 'archive';
  private static readonly SCHEMES: ReadonlySet<string> = new Set(['jar', 'zip', 'wsjar']);

  supportedSchemes(): ReadonlySet<string> {
    return ArchiveSchemeFinderFactory.SCHEMES;
  }

  create(location: LocationIdentifier): Finder {
    return new ArchiveFinder(splitArchiveLocation(location), formatLocation(location));
  }
}
