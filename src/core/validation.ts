// Input validation for namespace names

import { ValidationError, SecurityError } from './errors.js';

/**
 * Delimiters accepted between namespace names in a single string
 */
export const COMMON_DELIMITERS = /[,;\s]+/;

/**
 * One namespace segment: letters and digits of any script, `_`, `$` and `-`
 */
const SEGMENT_PATTERN = /^[\p{L}\p{N}_$-]+$/u;

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

export const MAX_NAMESPACE_LENGTH = 512;

/**
 * Splits namespace strings on the common delimiters, dropping empty elements
 */
export function splitNamespaces(values: string | readonly string[]): string[] {
  const inputs = typeof values === 'string' ? [values] : values;
  const result: string[] = [];

  for (const value of inputs) {
    for (const element of value.split(COMMON_DELIMITERS)) {
      const trimmed = element.trim();
      if (trimmed.length > 0) {
        result.push(trimmed);
      }
    }
  }

  return result;
}

/**
 * Validates a dot-delimited namespace name. The empty string names the root.
 */
export function validateNamespace(name: string): string {
  if (typeof name !== 'string') {
    throw new ValidationError('Namespace must be a string', 'namespace');
  }

  const trimmed = name.trim();

  if (trimmed.length > MAX_NAMESPACE_LENGTH) {
    throw new ValidationError(`Namespace exceeds maximum length of ${MAX_NAMESPACE_LENGTH}`, 'namespace');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new SecurityError('Invalid namespace: potential path traversal detected', { namespace: name });
    }
  }

  if (trimmed === '') {
    return trimmed;
  }

  const segments = trimmed.split('.');
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new ValidationError(`Invalid namespace "${name}": bad segment "${segment}"`, 'namespace');
    }
  }

  return trimmed;
}

/**
 * Replaces namespace delimiters with path separators
 */
export function toNamespacePath(name: string): string {
  return name.replace(/\./g, '/');
}
