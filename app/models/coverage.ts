/**
 * A named data layer within a coverage, e.g. "red" or "nir"
 */
export interface Measurement {
  name: string;
  // Sentinel marking absent / invalid pixels
  nullValue: number;
}

export interface SpatialExtent {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

export interface TemporalExtent {
  start: Date;
  end: Date;
  // Discrete acquisition timestamps, ascending
  acquisitions: Date[];
}

/**
 * Description of a coverage offering as held by the catalog. Read-only to the request
 * pipeline.
 */
export interface CoverageDescriptor {
  name: string;
  label: string;
  description: string;
  spatialExtent: SpatialExtent;
  temporalExtent: TemporalExtent;
  nativeCrs: string;
  requestCrs: string[];
  responseCrs: string[];
  formats: string[];
  measurements: Measurement[];
}
