/**
 * Package Scanner
 *
 * Resolves namespace names to physical locations through the process-wide
 * LocationProvider and exposes every resource found there as one cursor.
 * Each discovery pass is all-or-nothing: a lookup failure, a malformed
 * location or an unsupported scheme aborts the pass and no partial cursor
 * is exposed.
 */

import type { Readable } from 'stream';
import { DiscoveryIOError, ScannerError, UnsupportedSchemeError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { splitNamespaces, toNamespacePath, validateNamespace } from '../../core/validation.js';
import type { Finder, ResourceCursor, SchemeFinderFactory } from '../../models/finder.js';
import { formatLocation, type LocationIdentifier } from '../../models/location.js';
import type { LoadingContext } from '../../models/types.js';
import { ArchiveSchemeFinderFactory } from '../finders/archive-finder.js';
import { FileSchemeFinderFactory } from '../finders/directory-finder.js';
import { FinderStack } from '../finders/finder-stack.js';
import { SchemeRegistry } from '../finders/scheme-registry.js';
import { VfsSchemeFinderFactory } from '../finders/virtual-finder.js';
import type { VirtualFileSystem } from '../finders/virtual-file-system.js';
import type { LocationProvider } from '../location/location-provider.js';
import { LocationProviders } from '../location/location-providers.js';
import { createLoadingContext } from '../location/search-path-provider.js';
import { normalizeLocation } from '../location/uri.js';

export interface PackageScannerOptions {
  /** Search path namespaces are resolved against (default: current directory) */
  context?: LoadingContext;
  /** Factories registered after the built-ins; the last registration for a scheme wins */
  factories?: readonly SchemeFinderFactory[];
  /** Volume registry for `vfs` locations (default: the shared instance) */
  vfs?: VirtualFileSystem;
  logger?: Logger;
}

export class PackageScanner implements ResourceCursor, Iterable<string> {
  private readonly namespaces: readonly string[];
  private readonly context: LoadingContext;
  private readonly registry: SchemeRegistry;
  private readonly logger: Logger;
  private stack = new FinderStack();
  private discovered: LocationIdentifier[] = [];

  /**
   * @param namespaces - dot-delimited namespace names, one per element
   */
  constructor(namespaces: readonly string[], options: PackageScannerOptions = {}) {
    this.namespaces = namespaces.map(validateNamespace);
    this.context = options.context ?? createLoadingContext(['.']);
    this.logger = options.logger ?? Logger.getInstance();

    this.registry = new SchemeRegistry(this.logger);
    this.registry.register(new ArchiveSchemeFinderFactory());
    this.registry.register(new FileSchemeFinderFactory());
    this.registry.register(new VfsSchemeFinderFactory(options.vfs));
    for (const factory of options.factories ?? []) {
      this.registry.register(factory);
    }

    this.init();
  }

  /**
   * Creates a scanner from namespace names separated by `,`, `;` or whitespace
   */
  static fromString(namespaces: string | readonly string[], options: PackageScannerOptions = {}): PackageScanner {
    return new PackageScanner(splitNamespaces(namespaces), options);
  }

  /**
   * Canonical locations found by the last discovery pass, in push order
   */
  get locations(): readonly LocationIdentifier[] {
    return this.discovered;
  }

  get schemes(): string[] {
    return this.registry.schemes();
  }

  hasNext(): boolean {
    return this.stack.hasNext();
  }

  next(): string {
    return this.stack.next();
  }

  open(): Readable {
    return this.stack.open();
  }

  remove(): void {
    this.stack.remove();
  }

  /**
   * Discards the cursor and repeats the full discovery pass
   */
  reset(): void {
    this.init();
  }

  *[Symbol.iterator](): Iterator<string> {
    while (this.hasNext()) {
      yield this.next();
    }
  }

  private init(): void {
    this.stack = new FinderStack();
    this.discovered = [];

    const provider = LocationProviders.get();
    const context: LoadingContext = { ...this.context, archiveEntries: new Map<string, readonly string[]>() };
    const stack = new FinderStack();
    const discovered: LocationIdentifier[] = [];

    for (const namespace of this.namespaces) {
      for (const raw of this.lookup(provider, namespace, context)) {
        const location = normalizeLocation(raw);
        stack.push(this.createFinder(location));
        discovered.push(location);
        this.logger.debug('Location added', { namespace, location: formatLocation(location) });
      }
    }

    this.stack = stack;
    this.discovered = discovered;
    this.logger.info('Discovery pass complete', {
      namespaces: this.namespaces.length,
      locations: discovered.length
    });
  }

  /**
   * Drains the provider's sequence for one namespace. Failures raised by the
   * provider, eagerly or while iterating, become DiscoveryIOError.
   */
  private lookup(provider: LocationProvider, namespace: string, context: LoadingContext): string[] {
    const locations: string[] = [];
    try {
      for (const raw of provider.getLocations(toNamespacePath(namespace), context)) {
        locations.push(raw);
      }
    } catch (error) {
      if (error instanceof ScannerError) {
        throw error;
      }
      throw new DiscoveryIOError(
        `IO error when scanning namespace "${namespace}"`,
        { namespace },
        { cause: error }
      );
    }
    return locations;
  }

  private createFinder(location: LocationIdentifier): Finder {
    const factory = this.registry.lookup(location.scheme);
    if (factory === undefined) {
      throw new UnsupportedSchemeError(location.scheme, formatLocation(location));
    }
    return factory.create(location);
  }
}
