// Namespace to raw location lookup strategy

import type { LoadingContext } from '../../models/types.js';

/**
 * Finds every raw location exposing a namespace path.
 *
 * Implementations may return a lazy iterable; I/O failures may surface
 * from the call itself or while iterating. A namespace with no locations
 * yields an empty sequence.
 */
export abstract class LocationProvider {
  abstract getLocations(namespacePath: string, context: LoadingContext): Iterable<string>;
}
