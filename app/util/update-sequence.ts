import { ParameterParseError, parseDateTime } from './parameter-parsing';

const numberRegex = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Parses both values as dates, returning undefined if either is not an ISO-8601 date-time
 */
function asDates(a: string, b: string): [Date, Date] | undefined {
  try {
    return [parseDateTime('UPDATESEQUENCE', a), parseDateTime('UPDATESEQUENCE', b)];
  } catch (e) {
    if (e instanceof ParameterParseError) return undefined;
    throw e;
  }
}

/**
 * Compares two update sequence values: numerically when both are numbers, as timestamps
 * when both are ISO-8601 date-times, and as strings otherwise
 *
 * @param a - the first value
 * @param b - the second value
 * @returns a negative number if a is earlier, 0 if equal, a positive number if a is later
 */
export function compareUpdateSequence(a: string, b: string): number {
  if (numberRegex.test(a) && numberRegex.test(b)) {
    return Math.sign(parseFloat(a) - parseFloat(b));
  }
  const dates = asDates(a, b);
  if (dates) {
    return Math.sign(dates[0].getTime() - dates[1].getTime());
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
