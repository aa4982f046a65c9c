/**
 * Request parameters keyed by their canonical (upper-case) name. Values are kept verbatim.
 */
export type RawRequestParameters = Readonly<Record<string, string>>;

/**
 * Converts all of the keys in the passed in object to upper-case strings, leaving values
 * untouched. Repeated parameters are joined with commas, and when two keys differ only by
 * case the later one wins. Nested values, which the "simple" query parser never
 * produces, are dropped.
 *
 * @param query - The query parameters as received
 * @returns The parameters keyed by upper-case name
 */
export function keysToUpperCase(query: Record<string, unknown>): RawRequestParameters {
  const updatedObject: Record<string, string> = {};
  for (const [k, v] of Object.entries(query)) {
    if (typeof v === 'string') {
      updatedObject[k.toUpperCase()] = v;
    } else if (Array.isArray(v)) {
      updatedObject[k.toUpperCase()] = v.filter((item) => typeof item === 'string').join(',');
    }
  }
  return Object.freeze(updatedObject);
}
