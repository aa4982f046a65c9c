import { Logger } from 'winston';
import { TemporalReduction } from '../util/env';
import { Measurement } from '../models/coverage';
import { TimeRange } from '../models/subset-request';
import { addSeconds } from '../util/date';
import { DataEngine } from './data-engine';
import {
  Band, LoadResult, LogicalDataset, TimeSlice, emptyBand, gridCoordinates,
} from './dataset';
import { DataQuery } from './translator';

export interface StackOptions {
  // Seconds either side of an instant to search for its acquisition
  instantWindowSeconds: number;
  reduction: TemporalReduction;
  // Null values for each requested measurement
  measurements: Measurement[];
  logger: Logger;
}

/**
 * Widens each instant into an inclusive window and appends the ranges
 *
 * @param instants - discrete acquisition times
 * @param ranges - time ranges
 * @param windowSeconds - seconds either side of each instant
 */
export function fetchWindows(instants: Date[], ranges: TimeRange[], windowSeconds: number): TimeRange[] {
  return [
    ...instants.map((t) => ({ start: addSeconds(t, -windowSeconds), end: addSeconds(t, windowSeconds) })),
    ...ranges,
  ];
}

/**
 * Mean of the valid pixels of every slice. Pixels equal to the null value (or NaN) are
 * excluded; a pixel with no valid value in any slice keeps the null value.
 *
 * @param slices - the slices to average, all on the same grid
 * @param name - the band
 * @param nullValue - the band's null value
 * @param size - pixels per slice
 */
function meanOfSlices(slices: TimeSlice[], name: string, nullValue: number, size: number): Float64Array {
  const sums = new Float64Array(size);
  const counts = new Uint32Array(size);
  for (const slice of slices) {
    const values = slice.values[name];
    if (!values) continue;
    for (let i = 0; i < size; i++) {
      const v = values[i];
      if (v !== nullValue && !Number.isNaN(v)) {
        sums[i] += v;
        counts[i] += 1;
      }
    }
  }
  return sums.map((sum, i) => (counts[i] === 0 ? nullValue : sum / counts[i]));
}

/**
 * Reduces time-sorted slices to one band per measurement
 *
 * @param slices - slices sorted by ascending time
 * @param options - reduction and measurement null values
 * @param size - pixels per slice
 */
export function reduceSlices(slices: TimeSlice[], options: StackOptions, size: number): Band[] {
  return options.measurements.map((m) => {
    if (options.reduction === 'latest' || slices.length === 1) {
      const data = slices[slices.length - 1].values[m.name];
      return data ? { name: m.name, nullValue: m.nullValue, data } : emptyBand(m, size);
    }
    return { name: m.name, nullValue: m.nullValue, data: meanOfSlices(slices, m.name, m.nullValue, size) };
  });
}

/**
 * Fetches every instant window and range from the data engine, orders the slices by
 * time and reduces them to a single raster. When nothing was acquired in any window the
 * result is a grid of the requested shape holding only null values.
 *
 * @param engine - the data engine
 * @param query - the load query
 * @param instants - acquisition instants to fetch
 * @param ranges - time ranges to fetch
 * @param options - windowing, reduction and measurement details
 * @returns the dataset to encode
 */
export async function fetchAndStack(
  engine: DataEngine,
  query: DataQuery,
  instants: Date[],
  ranges: TimeRange[],
  options: StackOptions,
): Promise<LogicalDataset> {
  const windows = fetchWindows(instants, ranges, options.instantWindowSeconds);
  const results: LoadResult[] = await Promise.all(windows.map((w) => engine.load(query, w, options.logger)));
  const withData = results.filter((r) => r.slices.length > 0);
  const resolution = { resx: query.resolution[1], resy: query.resolution[0] };

  if (withData.length === 0) {
    options.logger.info(`No acquisitions of ${query.product} found in ${windows.length} time window(s)`);
    const grid = gridCoordinates(query.latitude, query.longitude, query.resolution);
    const size = grid.latitude.length * grid.longitude.length;
    return { ...grid, resolution, bands: options.measurements.map((m) => emptyBand(m, size)) };
  }

  const { latitude, longitude } = withData[0];
  const slices = withData
    .flatMap((r) => r.slices)
    .sort((a, b) => a.time.getTime() - b.time.getTime());
  options.logger.debug(`Reducing ${slices.length} time slice(s) of ${query.product} by ${options.reduction}`);
  const bands = reduceSlices(slices, options, latitude.length * longitude.length);
  return { latitude, longitude, resolution, bands };
}
