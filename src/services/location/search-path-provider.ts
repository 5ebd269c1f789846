/**
 * Search Path Location Provider
 *
 * The default LocationProvider: resolves a namespace path against the
 * directory and archive roots of a LoadingContext, in root order.
 * Filesystem paths are percent-encoded into `file:` URLs, so characters such
 * as `#`, `?` and `%` in a root or directory name stay part of the path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { errnoCode } from '../../core/errors.js';
import { ARCHIVE_EXTENSIONS, type LoadingContext } from '../../models/types.js';
import { isEntryUnder, listArchiveEntries } from '../finders/archive-reader.js';
import { LocationProvider } from './location-provider.js';

/**
 * Builds a loading context with absolute roots
 */
export function createLoadingContext(roots: readonly string[], baseDir: string = process.cwd()): LoadingContext {
  return { roots: roots.map(root => path.resolve(baseDir, root)) };
}

/**
 * `file:` URL of an absolute filesystem path
 */
export function fileLocation(absolutePath: string): string {
  return pathToFileURL(absolutePath).href;
}

/**
 * Percent-encodes each segment of a `/`-separated entry path
 */
export function encodeEntryPath(entryPath: string): string {
  return entryPath.split('/').map(encodeURIComponent).join('/');
}

function statOrNull(target: string): fs.Stats | null {
  try {
    return fs.statSync(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw error;
  }
}

function isArchive(file: string): boolean {
  return ARCHIVE_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

export class SearchPathLocationProvider extends LocationProvider {
  *getLocations(namespacePath: string, context: LoadingContext): Iterable<string> {
    for (const root of context.roots) {
      const absolute = path.resolve(root);
      const stat = statOrNull(absolute);
      if (stat === null) {
        continue;
      }

      if (stat.isDirectory()) {
        const target = namespacePath === '' ? absolute : path.join(absolute, ...namespacePath.split('/'));
        if (statOrNull(target)?.isDirectory()) {
          yield fileLocation(target);
        }
      } else if (stat.isFile() && isArchive(absolute)) {
        const entries = this.archiveEntries(absolute, context);
        if (entries.some(name => isEntryUnder(name, namespacePath))) {
          yield `jar:${fileLocation(absolute)}!/${encodeEntryPath(namespacePath)}`;
        }
      }
    }
  }

  private archiveEntries(archive: string, context: LoadingContext): readonly string[] {
    const cached = context.archiveEntries?.get(archive);
    if (cached !== undefined) {
      return cached;
    }
    const entries = listArchiveEntries(fs.readFileSync(archive));
    context.archiveEntries?.set(archive, entries);
    return entries;
  }
}
