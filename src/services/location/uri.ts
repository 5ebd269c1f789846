/**
 * Location identifier parsing and repair
 *
 * Raw locations handed out by a LocationProvider are not always correctly
 * percent-encoded (a directory with a space in its name is the usual case).
 * `normalizeLocation` first parses strictly and, on failure, rebuilds the
 * location by re-encoding its path and query before parsing once more.
 */

import { LocationSyntaxError, MalformedLocationError } from '../../core/errors.js';
import { formatLocation, type LocationIdentifier } from '../../models/location.js';

/**
 * Component types understood by the contextual encoder
 */
export type ComponentType = 'path' | 'query';

/**
 * RFC 3986, appendix B. Matches every string.
 */
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;

const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;

const UNRESERVED = "A-Za-z0-9\\-._~";
const SUB_DELIMS = "!$&'()*+,;=";
const ESCAPED_SUB_DELIMS = SUB_DELIMS.replace(/[$()*+]/g, '\\$&');

const LEGAL_CHARS: Record<ComponentType | 'authority' | 'fragment', RegExp> = {
  authority: new RegExp(`^[${UNRESERVED}${ESCAPED_SUB_DELIMS}:@\\[\\]]$`),
  path: new RegExp(`^[${UNRESERVED}${ESCAPED_SUB_DELIMS}:@/]$`),
  query: new RegExp(`^[${UNRESERVED}${ESCAPED_SUB_DELIMS}:@/?]$`),
  fragment: new RegExp(`^[${UNRESERVED}${ESCAPED_SUB_DELIMS}:@/?]$`)
};

const HEX = /^[0-9A-Fa-f]{2}$/;

interface RawComponents {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

function split(raw: string): RawComponents {
  const match = URI_PATTERN.exec(raw);
  // The pattern accepts any input; a null match is unreachable
  if (!match) {
    throw new LocationSyntaxError('Unparseable location', raw, 0);
  }
  return {
    scheme: match[1],
    authority: match[2],
    path: match[3] ?? '',
    query: match[4],
    fragment: match[5]
  };
}

function isEscape(value: string, index: number): boolean {
  return value[index] === '%' && HEX.test(value.slice(index + 1, index + 3));
}

function checkComponent(
  value: string,
  type: keyof typeof LEGAL_CHARS,
  input: string,
  offset: number
): void {
  const legal = LEGAL_CHARS[type];
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '%') {
      if (!isEscape(value, i)) {
        throw new LocationSyntaxError(`Malformed escape pair in ${type}`, input, offset + i);
      }
      i += 2;
      continue;
    }
    if (!legal.test(ch)) {
      throw new LocationSyntaxError(`Illegal character in ${type}`, input, offset + i);
    }
  }
}

/**
 * Strictly parses a location. Every location must carry a scheme.
 */
export function parseLocation(raw: string): LocationIdentifier {
  const parts = split(raw);

  if (parts.scheme === undefined || parts.scheme.length === 0) {
    throw new LocationSyntaxError('Missing scheme', raw, 0);
  }
  if (!SCHEME_PATTERN.test(parts.scheme)) {
    throw new LocationSyntaxError('Illegal character in scheme', raw, 0);
  }

  let offset = parts.scheme.length + 1;
  if (parts.authority !== undefined) {
    offset += 2;
    checkComponent(parts.authority, 'authority', raw, offset);
    offset += parts.authority.length;
  }
  checkComponent(parts.path, 'path', raw, offset);
  offset += parts.path.length;
  if (parts.query !== undefined) {
    offset += 1;
    checkComponent(parts.query, 'query', raw, offset);
    offset += parts.query.length;
  }
  if (parts.fragment !== undefined) {
    checkComponent(parts.fragment, 'fragment', raw, offset + 1);
  }

  const location: LocationIdentifier = { scheme: parts.scheme, path: parts.path };
  if (parts.authority !== undefined) location.authority = parts.authority;
  if (parts.query !== undefined) location.query = parts.query;
  if (parts.fragment !== undefined) location.fragment = parts.fragment;
  return location;
}

/**
 * Percent-encodes the characters of `value` that are illegal in the given
 * component. Existing `%XX` escapes are kept as they are.
 */
export function contextualEncode(value: string, type: ComponentType): string {
  const legal = LEGAL_CHARS[type];
  let result = '';
  let i = 0;

  for (const ch of value) {
    if (isEscape(value, i)) {
      result += ch;
    } else if (ch !== '%' && legal.test(ch)) {
      result += ch;
    } else {
      result += encodeURIComponent(ch);
    }
    i += ch.length;
  }

  return result;
}

/**
 * Rebuilds a raw location with its path and query re-encoded.
 * The fragment is copied unescaped.
 */
export function rebuildLocation(raw: string): string {
  const parts = split(raw);

  let result = `${parts.scheme ?? ''}:`;
  if (parts.authority !== undefined && parts.authority.length > 0) {
    result += `//${parts.authority}`;
  }
  result += contextualEncode(parts.path, 'path');
  if (parts.query !== undefined) {
    result += `?${contextualEncode(parts.query, 'query')}`;
  }
  if (parts.fragment !== undefined) {
    result += `#${parts.fragment}`;
  }
  return result;
}

/**
 * Converts a raw location into a canonical identifier, repairing bad
 * encoding once. Fails with MalformedLocationError wrapping the original
 * parse failure.
 */
export function normalizeLocation(raw: string): LocationIdentifier {
  try {
    return parseLocation(raw);
  } catch (error) {
    if (!(error instanceof LocationSyntaxError)) {
      throw error;
    }
    let repaired: LocationIdentifier;
    try {
      repaired = parseLocation(rebuildLocation(raw));
    } catch {
      throw new MalformedLocationError(raw, error);
    }
    return repaired;
  }
}

/**
 * Percent-decodes an encoded path
 */
export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch (error) {
    throw new LocationSyntaxError(
      `Path is not valid UTF-8 once decoded: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
}

/**
 * Returns the local filesystem path of a `file` location
 */
export function toFilePath(location: LocationIdentifier): string {
  const host = location.authority ?? '';
  if (location.scheme.toLowerCase() !== 'file' || (host !== '' && host !== 'localhost')) {
    throw new MalformedLocationError(formatLocation(location));
  }
  return decodePath(location.path);
}

/**
 * Parts of an archive location such as `jar:file:/a.jar!/lib/b.jar!/com/x`
 */
export interface ArchiveLocation {
  /** Filesystem path of the outermost archive */
  archivePath: string;
  /** Entry names of nested archives, outermost first */
  nested: string[];
  /** Entry prefix inside the innermost archive, without surrounding slashes */
  prefix: string;
}

/**
 * Splits an archive location on its `!/` separators
 */
export function splitArchiveLocation(location: LocationIdentifier): ArchiveLocation {
  const segments = location.path.split('!/');
  const outer = segments[0].endsWith('!') ? segments[0].slice(0, -1) : segments[0];
  const archivePath = toFilePath(parseLocation(outer));

  const inner = segments.slice(1).map(segment => decodePath(trimSlashes(segment)));
  const prefix = inner.length > 0 ? inner[inner.length - 1] : '';
  const nested = inner.slice(0, -1);

  return { archivePath, nested, prefix };
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}
