import { Measurement } from '../models/coverage';
import { NumericRange } from '../models/subset-request';

/**
 * One measurement's pixels, row-major with rows running north to south
 */
export interface Band {
  name: string;
  nullValue: number;
  data: Float64Array;
}

/**
 * The pixels of every requested measurement at a single acquisition time
 */
export interface TimeSlice {
  time: Date;
  values: Record<string, Float64Array>;
}

/**
 * What the data engine returns for a single load: the grid coordinates and zero or more
 * time slices on that grid
 */
export interface LoadResult {
  latitude: number[];
  longitude: number[];
  slices: TimeSlice[];
}

/**
 * A two-dimensional, time-reduced raster ready for encoding
 */
export interface LogicalDataset {
  // Pixel centres, north to south
  latitude: number[];
  // Pixel centres, west to east
  longitude: number[];
  resolution: { resx: number; resy: number };
  bands: Band[];
}

/**
 * Number of cells needed to cover the range at the given resolution. A degenerate
 * resolution or range yields a single cell.
 *
 * @param range - the (min, max) extent
 * @param resolution - the signed cell size
 */
export function cellCount(range: NumericRange, resolution: number): number {
  const count = Math.round(Math.abs(range[1] - range[0]) / Math.abs(resolution));
  return Number.isFinite(count) && count >= 1 ? count : 1;
}

/**
 * Builds the pixel centre coordinates of a grid covering the requested extent
 *
 * @param latitude - the latitude range
 * @param longitude - the longitude range
 * @param resolution - the (resy, resx) cell size
 * @returns latitude (north to south) and longitude (west to east) coordinates
 */
export function gridCoordinates(
  latitude: NumericRange,
  longitude: NumericRange,
  resolution: readonly [number, number],
): { latitude: number[]; longitude: number[] } {
  const [resy, resx] = resolution;
  const rows = cellCount(latitude, resy);
  const columns = cellCount(longitude, resx);
  const cellHeight = (latitude[1] - latitude[0]) / rows;
  const cellWidth = (longitude[1] - longitude[0]) / columns;
  return {
    latitude: Array.from({ length: rows }, (_v, i) => latitude[1] - (i + 0.5) * cellHeight),
    longitude: Array.from({ length: columns }, (_v, j) => longitude[0] + (j + 0.5) * cellWidth),
  };
}

/**
 * Returns a band of the given size holding only the measurement's null value
 *
 * @param measurement - the measurement
 * @param size - number of pixels
 */
export function emptyBand(measurement: Measurement, size: number): Band {
  return { name: measurement.name, nullValue: measurement.nullValue, data: new Float64Array(size).fill(measurement.nullValue) };
}

/**
 * Affine placement of a dataset's grid: the outer corner of the north-west pixel and the
 * size of a pixel in each direction
 */
export interface GridPlacement {
  west: number;
  north: number;
  pixelWidth: number;
  pixelHeight: number;
}

/**
 * Spacing of a coordinate axis, falling back to the nominal resolution for axes with a
 * single coordinate
 */
function spacing(coordinates: number[], nominal: number): number {
  if (coordinates.length > 1) {
    return Math.abs(coordinates[1] - coordinates[0]);
  }
  return Math.abs(nominal);
}

/**
 * Computes the placement of the dataset's grid from its pixel centre coordinates
 *
 * @param dataset - the dataset
 */
export function gridPlacement(dataset: LogicalDataset): GridPlacement {
  const pixelWidth = spacing(dataset.longitude, dataset.resolution.resx);
  const pixelHeight = spacing(dataset.latitude, dataset.resolution.resy);
  return {
    west: (dataset.longitude[0] ?? 0) - pixelWidth / 2,
    north: (dataset.latitude[0] ?? 0) + pixelHeight / 2,
    pixelWidth,
    pixelHeight,
  };
}
