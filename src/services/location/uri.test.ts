/**
 * Tests for location parsing, repair and archive splitting
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  parseLocation,
  contextualEncode,
  rebuildLocation,
  normalizeLocation,
  decodePath,
  toFilePath,
  splitArchiveLocation
} from './uri.js';
import { formatLocation } from '../../models/location.js';
import { LocationSyntaxError, MalformedLocationError } from '../../core/errors.js';
import { captureError } from '../test-utils.js';

describe('parseLocation', () => {
  it('should parse a file location', () => {
    expect(parseLocation('file:/home/app/classes/com/acme')).toEqual({
      scheme: 'file',
      path: '/home/app/classes/com/acme'
    });
  });

  it('should keep the archive part of a jar location in the path', () => {
    expect(parseLocation('jar:file:/lib/app.jar!/com/acme')).toEqual({
      scheme: 'jar',
      path: 'file:/lib/app.jar!/com/acme'
    });
  });

  it('should split every component', () => {
    expect(parseLocation('http://host:8080/a/b?x=1#frag')).toEqual({
      scheme: 'http',
      authority: 'host:8080',
      path: '/a/b',
      query: 'x=1',
      fragment: 'frag'
    });
  });

  it('should keep an empty authority', () => {
    const location = parseLocation('file:///tmp/x');
    expect(location.authority).toBe('');
    expect(formatLocation(location)).toBe('file:///tmp/x');
  });

  it('should reject unescaped spaces and report their index', () => {
    const error = captureError(() => parseLocation('file:/a dir/pkg'));
    if (!(error instanceof LocationSyntaxError)) throw error;
    expect(error.index).toBe(7);
  });

  it('should reject a missing scheme', () => {
    expect(() => parseLocation('/a/b')).toThrow(LocationSyntaxError);
    expect(() => parseLocation(':/a/b')).toThrow(LocationSyntaxError);
  });

  it('should reject malformed escapes', () => {
    expect(() => parseLocation('file:/a%zz')).toThrow(LocationSyntaxError);
    expect(() => parseLocation('file:/a%4')).toThrow(LocationSyntaxError);
  });
});

describe('contextualEncode', () => {
  it('should encode illegal path characters and keep valid escapes', () => {
    expect(contextualEncode('/a dir/%41%zz', 'path')).toBe('/a%20dir/%41%25zz');
  });

  it('should encode question marks in paths but not in queries', () => {
    expect(contextualEncode('/x?y', 'path')).toBe('/x%3Fy');
    expect(contextualEncode('x?y', 'query')).toBe('x?y');
  });

  it('should encode non-ASCII characters as UTF-8', () => {
    expect(contextualEncode('q=a b&c=ü', 'query')).toBe('q=a%20b&c=%C3%BC');
  });
});

describe('rebuildLocation', () => {
  it('should re-encode the path', () => {
    expect(rebuildLocation('file:/a dir/pkg')).toBe('file:/a%20dir/pkg');
  });

  it('should drop an empty authority', () => {
    expect(rebuildLocation('file:///a b')).toBe('file:/a%20b');
  });

  it('should encode the query and leave the fragment as is', () => {
    expect(rebuildLocation('http://h/p q?a b#c d')).toBe('http://h/p%20q?a%20b#c d');
  });
});

describe('normalizeLocation', () => {
  it('should return strictly valid locations unchanged', () => {
    expect(formatLocation(normalizeLocation('file:/srv/classes/com/acme'))).toBe('file:/srv/classes/com/acme');
  });

  it('should repair a path with a space', () => {
    expect(normalizeLocation('file:/a dir/pkg')).toEqual({ scheme: 'file', path: '/a%20dir/pkg' });
  });

  it('should repair archive locations', () => {
    expect(normalizeLocation('jar:file:/my libs/app.jar!/com/acme').path).toBe('file:/my%20libs/app.jar!/com/acme');
  });

  it('should fail on a missing scheme', () => {
    expect(() => normalizeLocation('/no/scheme')).toThrow(MalformedLocationError);
  });

  it('should fail when the unescaped fragment stays illegal', () => {
    const error = captureError(() => normalizeLocation('file:/a#b c'));
    if (!(error instanceof MalformedLocationError)) throw error;
    expect(error.location).toBe('file:/a#b c');
    expect(error.cause).toBeInstanceOf(LocationSyntaxError);
  });

  it('should repair any file path without a fragment', () => {
    fc.assert(
      fc.property(
        fc.fullUnicodeString().filter(s => !s.includes('#') && !s.startsWith('/')),
        s => {
          const location = normalizeLocation(`file:/${s}`);
          expect(location.scheme).toBe('file');
          expect(parseLocation(formatLocation(location))).toEqual(location);
        }
      )
    );
  });

  it('should preserve the decoded path of repaired locations', () => {
    fc.assert(
      fc.property(
        fc.fullUnicodeString().filter(s => !/[#?%]/.test(s) && !s.startsWith('/')),
        s => {
          expect(decodePath(normalizeLocation(`file:/${s}`).path)).toBe(`/${s}`);
        }
      )
    );
  });
});

describe('decodePath', () => {
  it('should decode escapes', () => {
    expect(decodePath('/a%20b/%C3%BC')).toBe('/a b/ü');
  });

  it('should reject escapes that are not UTF-8', () => {
    expect(() => decodePath('/%FF')).toThrow(LocationSyntaxError);
  });
});

describe('toFilePath', () => {
  it('should decode local file locations', () => {
    expect(toFilePath({ scheme: 'file', path: '/a%20b' })).toBe('/a b');
    expect(toFilePath({ scheme: 'FILE', authority: 'localhost', path: '/x' })).toBe('/x');
  });

  it('should reject remote hosts and other schemes', () => {
    expect(() => toFilePath({ scheme: 'file', authority: 'remote', path: '/x' })).toThrow(MalformedLocationError);
    expect(() => toFilePath({ scheme: 'http', path: '/x' })).toThrow(MalformedLocationError);
  });
});

describe('splitArchiveLocation', () => {
  it('should split a simple archive location', () => {
    expect(splitArchiveLocation(parseLocation('jar:file:/lib/app.jar!/com/acme'))).toEqual({
      archivePath: '/lib/app.jar',
      nested: [],
      prefix: 'com/acme'
    });
  });

  it('should split nested archives', () => {
    expect(splitArchiveLocation(parseLocation('jar:file:/srv/app.war!/WEB-INF/lib/core.jar!/com/acme/'))).toEqual({
      archivePath: '/srv/app.war',
      nested: ['WEB-INF/lib/core.jar'],
      prefix: 'com/acme'
    });
  });

  it('should treat a missing or empty entry part as the archive root', () => {
    expect(splitArchiveLocation(parseLocation('jar:file:/lib/app.jar!/')).prefix).toBe('');
    expect(splitArchiveLocation(parseLocation('jar:file:/lib/my%20app.jar'))).toEqual({
      archivePath: '/lib/my app.jar',
      nested: [],
      prefix: ''
    });
  });
});
