import { NumericRange, TimeRange, ValidatedSubsetRequest } from '../models/subset-request';

/**
 * Parameters of a single load against the data engine, excluding time
 */
export interface DataQuery {
  product: string;
  latitude: NumericRange;
  longitude: NumericRange;
  measurements: string[];
  // (resy, resx)
  resolution: readonly [number, number];
  crs: string;
  resampling: string;
}

export interface TranslatedRequest {
  query: DataQuery;
  instants: Date[];
  ranges: TimeRange[];
}

/**
 * Maps a validated subset request onto the parameters the data engine takes
 *
 * @param request - the validated request
 * @returns the load query plus the instants and ranges to fetch
 */
export function translateSubsetRequest(request: ValidatedSubsetRequest): TranslatedRequest {
  const { time } = request;
  return {
    query: {
      product: request.coverage.name,
      latitude: request.latitude,
      longitude: request.longitude,
      measurements: [...request.measurements],
      resolution: [request.resolution.resy, request.resolution.resx],
      crs: request.crs,
      resampling: request.resampling,
    },
    instants: time.kind === 'instants' ? [...time.instants] : [],
    ranges: time.kind === 'ranges' ? time.ranges.map((r) => ({ ...r })) : [],
  };
}
