/**
 * Virtual Finder
 *
 * Enumerates a directory of a VirtualFileSystem volume. Locations take the
 * form `vfs://<volume>/<path>`; `vfs:/<volume>/<path>` is accepted too.
 */

import { Readable } from 'stream';
import { DiscoveryIOError } from '../../core/errors.js';
import type { Finder, SchemeFinderFactory } from '../../models/finder.js';
import type { LocationIdentifier } from '../../models/location.js';
import { decodePath } from '../location/uri.js';
import { BaseFinder } from './base-finder.js';
import { VirtualFileSystem } from './virtual-file-system.js';

export class VirtualFinder extends BaseFinder {
  private names: string[] | null = null;
  private position = 0;

  constructor(
    private readonly vfs: VirtualFileSystem,
    private readonly volume: string,
    private readonly directory: string
  ) {
    super();
  }

  private fullPath(name: string): string {
    return this.directory === '' ? name : `${this.directory}/${name}`;
  }

  protected advance(): string | null {
    if (this.names === null) {
      const offset = this.directory === '' ? 0 : this.directory.length + 1;
      this.names = this.vfs.list(this.volume, this.directory).map(filePath => filePath.slice(offset));
    }
    if (this.position >= this.names.length) {
      return null;
    }
    return this.names[this.position++];
  }

  protected openResource(name: string): Readable {
    const data = this.vfs.read(this.volume, this.fullPath(name));
    if (data === undefined) {
      throw new DiscoveryIOError(`vfs resource no longer exists: ${this.volume}/${this.fullPath(name)}`);
    }
    return Readable.from([Buffer.from(data)]);
  }

  protected removeResource(name: string): void {
    this.vfs.delete(this.volume, this.fullPath(name));
  }

  protected restart(): void {
    this.names = null;
    this.position = 0;
  }
}

/**
 * Builds virtual finders for `vfs` locations
 */
export class VfsSchemeFinderFactory implements SchemeFinderFactory {
  readonly kind = 'virtual-fs';
  private static readonly SCHEMES: ReadonlySet<string> = new Set(['vfs']);

  constructor(private readonly vfs: VirtualFileSystem = VirtualFileSystem.getInstance()) {}

  supportedSchemes(): ReadonlySet<string> {
    return VfsSchemeFinderFactory.SCHEMES;
  }

  create(location: LocationIdentifier): Finder {
    const segments = decodePath(location.path).split('/').filter(segment => segment.length > 0);
    const authority = location.authority ?? '';
    const volume = authority !== '' ? authority : (segments.shift() ?? '');
    return new VirtualFinder(this.vfs, volume, segments.join('/'));
  }
}
