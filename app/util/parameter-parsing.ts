/**
 * Tag class for denoting errors during parsing
 *
 */
export class ParameterParseError extends Error {}

/**
 * Returns the parameter parsed as an array of comma-separated values, with leading and
 * trailing whitespace removed from each value
 *
 * @param value - The parameter value to parse
 */
export function parseMultiValueParameter(value: string): string[] {
  return value.split(',').map((v) => v.trim());
}

/**
 * Strictly parses a decimal number (no trailing garbage, no empty strings)
 *
 * @param name - the name of the parameter, for messages
 * @param valueStr - the unparsed number as it appears in the input
 * @returns the parsed number
 * @throws ParameterParseError - if the value is not a finite number
 */
export function parseNumber(name: string, valueStr: string): number {
  // The `+` strictly converts a string to a number or NaN if it's invalid
  const value = valueStr.trim() === '' ? NaN : +valueStr;
  if (!Number.isFinite(value)) {
    throw new ParameterParseError(`${name} has an invalid numeric value "${valueStr}"`);
  }
  return value;
}

/**
 * Strictly parses an integer
 *
 * @param name - the name of the parameter, for messages
 * @param valueStr - the unparsed integer as it appears in the input
 * @returns the parsed integer
 * @throws ParameterParseError - if the value is not an integer
 */
export function parseInteger(name: string, valueStr: string): number {
  if (!/^\s*[-+]?\d+\s*$/.test(valueStr)) {
    throw new ParameterParseError(`${name} has an invalid integer value "${valueStr}"`);
  }
  return parseInt(valueStr, 10);
}

// 2020-01-01, 2020-01-01T10:15, 2020-01-01T10:15:30.123Z, 2020-01-01T10:15:30+02:00
const isoDateTimeRegex = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parses an ISO-8601 date or date-time. Values without a zone designator are taken as UTC.
 *
 * @param name - the name of the parameter, for messages
 * @param valueStr - the unparsed date as it appears in the input
 * @returns the parsed date
 * @throws ParameterParseError - if the value is not an ISO-8601 date-time
 */
export function parseDateTime(name: string, valueStr: string): Date {
  const trimmed = valueStr.trim();
  const match = isoDateTimeRegex.exec(trimmed);
  if (!match) {
    throw new ParameterParseError(`${name} has an invalid date time "${valueStr}"`);
  }
  const hasTime = match[1] !== undefined;
  const hasZone = match[4] !== undefined;
  const value = new Date(hasTime && !hasZone ? `${trimmed}Z` : trimmed);
  if (Number.isNaN(+value)) {
    throw new ParameterParseError(`${name} has an invalid date time "${valueStr}"`);
  }
  return value;
}
