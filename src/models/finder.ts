// Finder contracts shared by the stack, the registry and the scanner

import type { Readable } from 'stream';
import type { LocationIdentifier } from './location.js';

/**
 * Pull-based cursor over resource names with on-demand byte access
 * to the resource most recently returned by `next()`.
 */
export interface ResourceCursor {
  hasNext(): boolean;
  next(): string;
  open(): Readable;
  remove(): void;
}

/**
 * A cursor rooted at one physical location
 */
export interface Finder extends ResourceCursor {
  /** Restarts enumeration from the first resource */
  reset(): void;
}

/**
 * Builds finders for the schemes it declares
 */
export interface SchemeFinderFactory {
  /** Short label used in log output */
  readonly kind: string;
  supportedSchemes(): ReadonlySet<string>;
  create(location: LocationIdentifier): Finder;
}
