// Scheme to finder factory dispatch

import { Logger } from '../../core/logger.js';
import type { SchemeFinderFactory } from '../../models/finder.js';

/**
 * Maps lowercase scheme tokens to the factory that handles them.
 * Append/overwrite only: the last registered factory for a scheme wins.
 */
export class SchemeRegistry {
  private readonly factories = new Map<string, SchemeFinderFactory>();

  constructor(private readonly logger: Logger = Logger.getInstance()) {}

  register(factory: SchemeFinderFactory): void {
    for (const scheme of factory.supportedSchemes()) {
      const key = scheme.toLowerCase();
      const previous = this.factories.get(key);
      if (previous !== undefined && previous !== factory) {
        this.logger.warn(`Scheme "${key}" handler replaced`, {
          previous: previous.kind,
          replacement: factory.kind
        });
      }
      this.factories.set(key, factory);
    }
  }

  lookup(scheme: string): SchemeFinderFactory | undefined {
    return this.factories.get(scheme.toLowerCase());
  }

  schemes(): string[] {
    return [...this.factories.keys()].sort();
  }
}
