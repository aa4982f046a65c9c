import { CoverageDescriptor } from '../models/coverage';
import { TimeRange, TimeSelection } from '../models/subset-request';
import { toISODateTime } from '../util/date';
import { Outcome, WcsExceptionCode, fail, succeed } from '../util/errors';
import { ParameterParseError, parseDateTime, parseMultiValueParameter } from '../util/parameter-parsing';

/**
 * Returns the selection covering the coverage's whole temporal extent
 *
 * @param coverage - the coverage
 */
export function fullTemporalExtent(coverage: CoverageDescriptor): TimeSelection {
  const { start, end } = coverage.temporalExtent;
  return { kind: 'ranges', ranges: [{ start, end }] };
}

/**
 * Parses `start/end[/period]` ranges. The period is accepted and ignored.
 *
 * @param tokens - the comma-separated parts of the TIME value
 * @throws ParameterParseError - if a range is malformed
 */
function parseRanges(tokens: string[]): TimeRange[] {
  return tokens.map((token) => {
    const parts = token.split('/');
    if (parts.length < 2 || parts.length > 3) {
      throw new ParameterParseError(`TIME range "${token}" must be given as start/end or start/end/period`);
    }
    return { start: parseDateTime('TIME', parts[0]), end: parseDateTime('TIME', parts[1]) };
  });
}

/**
 * Parses the TIME parameter. A `/` anywhere in the value means the whole value is a list
 * of ranges; otherwise it is a list of instants, each of which must be one of the
 * coverage's acquisition times.
 *
 * @param value - the raw TIME value
 * @param coverage - the coverage being subset
 * @returns the time selection, or an InvalidParameterValue failure
 */
export function parseTimeSelection(value: string, coverage: CoverageDescriptor): Outcome<TimeSelection> {
  const tokens = parseMultiValueParameter(value);
  try {
    if (value.includes('/')) {
      const ranges = parseRanges(tokens);
      const reversed = ranges.find((r) => r.start.getTime() > r.end.getTime());
      if (reversed) {
        return fail(WcsExceptionCode.InvalidParameterValue, ['TIME'],
          `TIME range start ${toISODateTime(reversed.start)} is after its end ${toISODateTime(reversed.end)}`);
      }
      return succeed({ kind: 'ranges', ranges });
    }

    const instants = tokens.map((t) => parseDateTime('TIME', t));
    const acquired = new Set(coverage.temporalExtent.acquisitions.map((d) => d.getTime()));
    const missing = instants.find((d) => !acquired.has(d.getTime()));
    if (missing) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['TIME'],
        `Coverage "${coverage.name}" has no acquisition at ${toISODateTime(missing)}`);
    }
    return succeed({ kind: 'instants', instants });
  } catch (e) {
    if (e instanceof ParameterParseError) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['TIME'], e.message);
    }
    throw e;
  }
}
