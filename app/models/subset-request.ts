import { CoverageDescriptor } from './coverage';

/**
 * An ordered (min, max) pair
 */
export type NumericRange = readonly [number, number];

export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * The temporal part of a subset request: either discrete acquisition instants or
 * (start, end) ranges, never both
 */
export type TimeSelection =
  | { kind: 'instants'; instants: readonly Date[] }
  | { kind: 'ranges'; ranges: readonly TimeRange[] };

export interface Resolution {
  resx: number;
  // Non-positive: pixel rows run north to south
  resy: number;
}

/**
 * A GetCoverage request after every validation gate has passed. Built once per request
 * and frozen.
 */
export interface ValidatedSubsetRequest {
  readonly coverage: CoverageDescriptor;
  readonly crs: string;
  readonly responseCrs: string;
  readonly latitude: NumericRange;
  readonly longitude: NumericRange;
  readonly time: TimeSelection;
  readonly resolution: Readonly<Resolution>;
  readonly resampling: string;
  readonly format: string;
  readonly measurements: readonly string[];
}
