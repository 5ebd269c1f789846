/**
 * Finder Stack
 *
 * Composes finders into one flattened cursor. Finders are drained in push
 * order; the active pointer only moves forward.
 */

import type { Readable } from 'stream';
import { ExhaustedSequenceError, StaleCursorError } from '../../core/errors.js';
import type { Finder, ResourceCursor } from '../../models/finder.js';

export class FinderStack implements ResourceCursor {
  private readonly finders: Finder[] = [];
  private active = 0;
  /** Finder that produced the last name returned by next() */
  private current: Finder | null = null;

  push(finder: Finder): void {
    this.finders.push(finder);
  }

  get size(): number {
    return this.finders.length;
  }

  hasNext(): boolean {
    while (this.active < this.finders.length) {
      if (this.finders[this.active].hasNext()) {
        return true;
      }
      this.active++;
    }
    return false;
  }

  next(): string {
    if (!this.hasNext()) {
      throw new ExhaustedSequenceError();
    }
    const finder = this.finders[this.active];
    const name = finder.next();
    this.current = finder;
    return name;
  }

  open(): Readable {
    return this.currentFinder('open').open();
  }

  remove(): void {
    this.currentFinder('remove').remove();
    this.current = null;
  }

  private currentFinder(operation: 'open' | 'remove'): Finder {
    if (this.current === null || this.current !== this.finders[this.active]) {
      throw new StaleCursorError(operation);
    }
    return this.current;
  }
}
