// Shared cursor bookkeeping for the built-in finders

import type { Readable } from 'stream';
import {
  ExhaustedSequenceError,
  StaleCursorError,
  UnsupportedOperationError
} from '../../core/errors.js';
import type { Finder } from '../../models/finder.js';

/**
 * Implements the Finder cursor on top of a single `advance()` primitive.
 * Subclasses produce names lazily; one name is looked ahead by `hasNext()`.
 */
export abstract class BaseFinder implements Finder {
  /** undefined: not computed yet, null: exhausted */
  private lookahead: string | null | undefined = undefined;
  private current: string | null = null;

  /** Returns the next resource name, or null when exhausted */
  protected abstract advance(): string | null;

  protected abstract openResource(name: string): Readable;

  /** Drops enumeration state so the next `advance()` starts over */
  protected abstract restart(): void;

  protected removeResource(_name: string): void {
    throw new UnsupportedOperationError(`${this.constructor.name} is read-only`);
  }

  hasNext(): boolean {
    if (this.lookahead === undefined) {
      this.lookahead = this.advance();
    }
    return this.lookahead !== null;
  }

  next(): string {
    if (!this.hasNext() || this.lookahead == null) {
      throw new ExhaustedSequenceError();
    }
    this.current = this.lookahead;
    this.lookahead = undefined;
    return this.current;
  }

  open(): Readable {
    if (this.current === null) {
      throw new StaleCursorError('open');
    }
    return this.openResource(this.current);
  }

  remove(): void {
    if (this.current === null) {
      throw new StaleCursorError('remove');
    }
    this.removeResource(this.current);
    this.current = null;
  }

  reset(): void {
    this.lookahead = undefined;
    this.current = null;
    this.restart();
  }
}
