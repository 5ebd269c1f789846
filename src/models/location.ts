// Canonical location identifiers

/**
 * A parsed, canonical location. `path` is kept in its encoded form.
 */
export interface LocationIdentifier {
  /** Scheme as written; compare via `scheme.toLowerCase()` */
  scheme: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

/**
 * Renders a location back to its canonical string form
 */
export function formatLocation(location: LocationIdentifier): string {
  let result = `${location.scheme}:`;
  if (location.authority !== undefined) {
    result += `//${location.authority}`;
  }
  result += location.path;
  if (location.query !== undefined) {
    result += `?${location.query}`;
  }
  if (location.fragment !== undefined) {
    result += `#${location.fragment}`;
  }
  return result;
}
