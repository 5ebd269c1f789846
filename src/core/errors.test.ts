// Error type tests

import { describe, it, expect } from 'vitest';
import {
  ScannerError,
  MalformedLocationError,
  StaleCursorError,
  UnsupportedSchemeError,
  errnoCode
} from './errors.js';

describe('ScannerError', () => {
  it('should carry name, code and context', () => {
    const error = new UnsupportedSchemeError('ftp', 'ftp://host/pkg');
    expect(error).toBeInstanceOf(ScannerError);
    expect(error.name).toBe('UnsupportedSchemeError');
    expect(error.toJSON()).toEqual({
      name: 'UnsupportedSchemeError',
      code: 'UNSUPPORTED_SCHEME',
      message: error.message,
      context: { scheme: 'ftp', location: 'ftp://host/pkg' }
    });
  });

  it('should keep the cause', () => {
    const cause = new Error('bad escape');
    expect(new MalformedLocationError('file:/%zz', cause).cause).toBe(cause);
  });

  it('should name the misused operation', () => {
    expect(new StaleCursorError('remove').message).toBe('remove() requires a resource returned by next()');
  });
});

describe('errnoCode', () => {
  it('should read system error codes', () => {
    expect(errnoCode(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});
