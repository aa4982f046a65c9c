import { LogicalDataset } from '../data/dataset';
import { ServerError } from '../util/errors';
import { encodeGeoTiff } from './geotiff';
import { encodeNetCdf } from './netcdf';

/**
 * Serializes a dataset in one output format
 */
export interface ResponseFormatter {
  contentType: string;
  extension: string;
  encode(dataset: LogicalDataset, crs: string): Buffer;
}

export interface EncodedCoverage {
  body: Buffer;
  contentType: string;
  filename: string;
}

const formatters: ReadonlyMap<string, ResponseFormatter> = new Map([
  ['GeoTIFF', { contentType: 'image/tiff', extension: 'tif', encode: encodeGeoTiff }],
  ['NetCDF', { contentType: 'application/x-netcdf', extension: 'nc', encode: encodeNetCdf }],
]);

/**
 * Returns the names of every format an encoder exists for
 */
export function availableFormats(): string[] {
  return [...formatters.keys()];
}

/**
 * Encodes the dataset in the named format
 *
 * @param dataset - the dataset to encode
 * @param format - the WCS format name
 * @param crs - the response CRS
 * @param coverageName - used to name the returned file
 * @returns the encoded bytes with their content type and file name
 * @throws ServerError - if the format is advertised but has no encoder
 */
export function formatResponse(
  dataset: LogicalDataset, format: string, crs: string, coverageName: string,
): EncodedCoverage {
  const formatter = formatters.get(format);
  if (!formatter) {
    throw new ServerError(`No encoder is available for format ${format}`);
  }
  return {
    body: formatter.encode(dataset, crs),
    contentType: formatter.contentType,
    filename: `${coverageName}.${formatter.extension}`,
  };
}
