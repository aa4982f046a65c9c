import { CoverageDescriptor } from '../models/coverage';
import { NumericRange } from '../models/subset-request';
import { Outcome, WcsExceptionCode, fail, succeed } from '../util/errors';
import { ParameterParseError, parseMultiValueParameter, parseNumber } from '../util/parameter-parsing';

export interface BoundingBox {
  latitude: NumericRange;
  longitude: NumericRange;
}

/**
 * Returns true if the two closed intervals share at least one point
 *
 * @param a - the first interval
 * @param b - the second interval
 */
export function intersects(a: NumericRange, b: NumericRange): boolean {
  return a[0] <= b[1] && b[0] <= a[1];
}

/**
 * Returns the coverage's own extent as a bounding box
 *
 * @param coverage - the coverage
 */
export function coverageExtent(coverage: CoverageDescriptor): BoundingBox {
  const { spatialExtent: e } = coverage;
  return {
    latitude: [e.minLatitude, e.maxLatitude],
    longitude: [e.minLongitude, e.maxLongitude],
  };
}

/**
 * Parses a BBOX parameter of the form `minx,miny,maxx,maxy[,minz,maxz]` and checks it
 * against the coverage's extent. x is longitude and y is latitude; the z pair, when
 * given, is parsed and otherwise ignored.
 *
 * @param value - the raw BBOX value
 * @param coverage - the coverage being subset
 * @returns the latitude and longitude ranges, or an InvalidParameterValue failure
 */
export function parseBoundingBox(value: string, coverage: CoverageDescriptor): Outcome<BoundingBox> {
  const tokens = parseMultiValueParameter(value);
  if (tokens.length !== 4 && tokens.length !== 6) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['BBOX'],
      'BBOX must be given as minx,miny,maxx,maxy or minx,miny,maxx,maxy,minz,maxz');
  }
  let numbers: number[];
  try {
    numbers = tokens.map((t) => parseNumber('BBOX', t));
  } catch (e) {
    if (e instanceof ParameterParseError) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['BBOX'], e.message);
    }
    throw e;
  }
  const [minx, miny, maxx, maxy] = numbers;
  const bbox: BoundingBox = { latitude: [miny, maxy], longitude: [minx, maxx] };
  if (minx > maxx || miny > maxy) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['BBOX'],
      'BBOX minimum values must not be greater than the maximum values');
  }
  const extent = coverageExtent(coverage);
  if (!intersects(bbox.latitude, extent.latitude) || !intersects(bbox.longitude, extent.longitude)) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['BBOX'],
      `BBOX does not intersect the extent of coverage "${coverage.name}"`);
  }
  return succeed(bbox);
}
