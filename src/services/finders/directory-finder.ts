/**
 * Directory Finder
 *
 * Walks a directory tree depth-first, one listing at a time, with the
 * entries of each directory in sorted order. Names are relative to the root
 * and `/`-separated.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { DiscoveryIOError, errnoCode } from '../../core/errors.js';
import type { Finder, SchemeFinderFactory } from '../../models/finder.js';
import type { LocationIdentifier } from '../../models/location.js';
import { toFilePath } from '../location/uri.js';
import { BaseFinder } from './base-finder.js';

interface Frame {
  /** Directory relative to the root, '' for the root itself */
  dir: string;
  entries: fs.Dirent[];
  index: number;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export class DirectoryFinder extends BaseFinder {
  private frames: Frame[] | null = null;
  /** Set when the root is a regular file */
  private single: string | null = null;

  constructor(private readonly root: string) {
    super();
  }

  private start(): Frame[] {
    const frames: Frame[] = [];
    let stat: fs.Stats;
    try {
      stat = fs.statSync(this.root);
    } catch (error) {
      if (isMissing(error)) {
        return frames;
      }
      throw new DiscoveryIOError(`Unable to read ${this.root}`, { root: this.root }, { cause: error });
    }

    if (stat.isDirectory()) {
      frames.push(this.frame(''));
    } else if (stat.isFile()) {
      this.single = path.basename(this.root);
    }
    return frames;
  }

  private frame(dir: string): Frame {
    const absolute = path.join(this.root, dir);
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(absolute, { withFileTypes: true });
    } catch (error) {
      if (!isMissing(error)) {
        throw new DiscoveryIOError(`Unable to list ${absolute}`, { directory: absolute }, { cause: error });
      }
      entries = [];
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return { dir, entries, index: 0 };
  }

  private kindOf(entry: fs.Dirent, relative: string): 'file' | 'directory' | 'other' {
    if (entry.isSymbolicLink()) {
      try {
        const target = fs.statSync(path.join(this.root, relative));
        return target.isDirectory() ? 'directory' : target.isFile() ? 'file' : 'other';
      } catch {
        // dangling link
        return 'other';
      }
    }
    return entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : 'other';
  }

  protected advance(): string | null {
    if (this.frames === null) {
      this.frames = this.start();
      if (this.single !== null) {
        return this.single;
      }
    }

    while (this.frames.length > 0) {
      const top = this.frames[this.frames.length - 1];
      if (top.index >= top.entries.length) {
        this.frames.pop();
        continue;
      }

      const entry = top.entries[top.index++];
      const relative = top.dir === '' ? entry.name : `${top.dir}/${entry.name}`;
      const kind = this.kindOf(entry, relative);
      if (kind === 'directory') {
        this.frames.push(this.frame(relative));
      } else if (kind === 'file') {
        return relative;
      }
    }

    return null;
  }

  private resolve(name: string): string {
    return this.single !== null ? this.root : path.join(this.root, ...name.split('/'));
  }

  protected openResource(name: string): Readable {
    return fs.createReadStream(this.resolve(name));
  }

  protected removeResource(name: string): void {
    const target = this.resolve(name);
    try {
      fs.unlinkSync(target);
    } catch (error) {
      throw new DiscoveryIOError(`Unable to delete ${target}`, { path: target }, { cause: error });
    }
  }

  protected restart(): void {
    this.frames = null;
    this.single = null;
  }
}

/**
 * Builds directory finders for `file` locations
 */
export class FileSchemeFinderFactory implements SchemeFinderFactory {
  readonly kind = 'directory';
  private static readonly SCHEMES: ReadonlySet<string> = new Set(['file']);

  supportedSchemes(): ReadonlySet<string> {
    return FileSchemeFinderFactory.SCHEMES;
  }

  create(location: LocationIdentifier): Finder {
    return new DirectoryFinder(toFilePath(location));
  }
}
