// CLI error formatting tests

import { describe, it, expect } from 'vitest';
import { formatError, exitCodeFor } from './error-handler.js';
import {
  ConfigError,
  DiscoveryIOError,
  ExhaustedSequenceError,
  MalformedLocationError,
  SecurityError,
  UnsupportedSchemeError,
  ValidationError
} from '../../core/errors.js';

describe('formatError', () => {
  it('should name the field of validation errors', () => {
    expect(formatError(new ValidationError('Invalid namespace', 'namespace'))).toBe(
      'Validation Error (field: namespace): Invalid namespace'
    );
  });

  it('should include the code and cause of scanner errors', () => {
    const error = new DiscoveryIOError('IO error when scanning namespace "a"', {}, { cause: new Error('EACCES') });
    expect(formatError(error)).toBe('Error [DISCOVERY_IO_ERROR]: IO error when scanning namespace "a"\n  caused by: EACCES');
    expect(formatError(new ExhaustedSequenceError())).toBe('Error [EXHAUSTED_SEQUENCE]: No more resources');
  });

  it('should format plain errors and other values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError(42)).toBe('Unknown error: 42');
  });
});

describe('exitCodeFor', () => {
  it('should map error kinds to exit codes', () => {
    expect(exitCodeFor(new ValidationError('x'))).toBe(2);
    expect(exitCodeFor(new ConfigError('x'))).toBe(2);
    expect(exitCodeFor(new SecurityError('x'))).toBe(3);
    expect(exitCodeFor(new UnsupportedSchemeError('ftp', 'ftp://h/p'))).toBe(4);
    expect(exitCodeFor(new MalformedLocationError('/p'))).toBe(4);
    expect(exitCodeFor(new DiscoveryIOError('x'))).toBe(5);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});
