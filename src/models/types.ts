// Core type definitions for the namespace scanner

/**
 * Ordered search path the host resolves namespaces against.
 * Each root is a directory or an archive file.
 */
export interface LoadingContext {
  readonly roots: readonly string[];
  /**
   * Entry listings of archive roots already read during the current
   * discovery pass, keyed by absolute archive path. A pass starts empty.
   */
  readonly archiveEntries?: Map<string, readonly string[]>;
}

/**
 * File extensions treated as archives on the search path
 */
export const ARCHIVE_EXTENSIONS: readonly string[] = ['.jar', '.zip', '.war', '.ear'];
