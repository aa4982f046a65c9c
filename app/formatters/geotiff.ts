import { LogicalDataset, gridPlacement } from '../data/dataset';

// TIFF field types
enum FieldType {
  ASCII = 2,
  SHORT = 3,
  LONG = 4,
  DOUBLE = 12,
}

const fieldSizes: Record<FieldType, number> = {
  [FieldType.ASCII]: 1,
  [FieldType.SHORT]: 2,
  [FieldType.LONG]: 4,
  [FieldType.DOUBLE]: 8,
};

enum TiffTag {
  ImageWidth = 256,
  ImageLength = 257,
  BitsPerSample = 258,
  Compression = 259,
  PhotometricInterpretation = 262,
  StripOffsets = 273,
  SamplesPerPixel = 277,
  RowsPerStrip = 278,
  StripByteCounts = 279,
  PlanarConfiguration = 284,
  ExtraSamples = 338,
  SampleFormat = 339,
  ModelPixelScale = 33550,
  ModelTiepoint = 33922,
  GeoKeyDirectory = 34735,
  GdalNoData = 42113,
}

// GeoKey identifiers and values
const GTModelTypeGeoKey = 1024;
const GTRasterTypeGeoKey = 1025;
const GeographicTypeGeoKey = 2048;
const ProjectedCSTypeGeoKey = 3072;
const ModelTypeProjected = 1;
const ModelTypeGeographic = 2;
const RasterPixelIsArea = 1;
const UserDefined = 32767;

interface IfdEntry {
  tag: TiffTag;
  type: FieldType;
  values: number[] | string;
}

/**
 * Returns the numeric code of an `EPSG:<code>` CRS identifier
 *
 * @param crs - the CRS identifier
 */
export function epsgCode(crs: string): number | undefined {
  const match = /^EPSG:(\d+)$/i.exec(crs.trim());
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Builds the GeoKey directory for the CRS. EPSG codes 4000 to 4999 are geographic;
 * anything else is treated as projected.
 *
 * @param crs - the CRS identifier
 */
export function geoKeyDirectory(crs: string): number[] {
  const code = epsgCode(crs) ?? UserDefined;
  const geographic = code >= 4000 && code < 5000;
  const keys = [
    [GTModelTypeGeoKey, 0, 1, geographic ? ModelTypeGeographic : ModelTypeProjected],
    [GTRasterTypeGeoKey, 0, 1, RasterPixelIsArea],
    [geographic ? GeographicTypeGeoKey : ProjectedCSTypeGeoKey, 0, 1, code],
  ];
  return [1, 1, 0, keys.length, ...keys.flat()];
}

function valueCount(entry: IfdEntry): number {
  // ASCII values carry a trailing NUL
  return typeof entry.values === 'string' ? entry.values.length + 1 : entry.values.length;
}

function byteLength(entry: IfdEntry): number {
  return valueCount(entry) * fieldSizes[entry.type];
}

function writeValues(buffer: Buffer, offset: number, entry: IfdEntry): void {
  if (typeof entry.values === 'string') {
    buffer.write(entry.values, offset, 'latin1');
    return;
  }
  let position = offset;
  for (const value of entry.values) {
    switch (entry.type) {
      case FieldType.SHORT: buffer.writeUInt16LE(value, position); break;
      case FieldType.LONG: buffer.writeUInt32LE(value, position); break;
      case FieldType.DOUBLE: buffer.writeDoubleLE(value, position); break;
      default: buffer.writeUInt8(value, position);
    }
    position += fieldSizes[entry.type];
  }
}

/**
 * Encodes the dataset as an uncompressed little-endian GeoTIFF with one float32 plane
 * per band
 *
 * @param dataset - the dataset to encode
 * @param crs - the CRS the grid is expressed in
 * @returns the file contents
 */
export function encodeGeoTiff(dataset: LogicalDataset, crs: string): Buffer {
  const width = dataset.longitude.length;
  const height = dataset.latitude.length;
  const samples = dataset.bands.length;
  const planeBytes = width * height * 4;
  const placement = gridPlacement(dataset);
  const perBand = (value: number): number[] => new Array<number>(samples).fill(value);

  const entries: IfdEntry[] = [
    { tag: TiffTag.ImageWidth, type: FieldType.LONG, values: [width] },
    { tag: TiffTag.ImageLength, type: FieldType.LONG, values: [height] },
    { tag: TiffTag.BitsPerSample, type: FieldType.SHORT, values: perBand(32) },
    { tag: TiffTag.Compression, type: FieldType.SHORT, values: [1] },
    { tag: TiffTag.PhotometricInterpretation, type: FieldType.SHORT, values: [1] },
    { tag: TiffTag.StripOffsets, type: FieldType.LONG, values: perBand(0) },
    { tag: TiffTag.SamplesPerPixel, type: FieldType.SHORT, values: [samples] },
    { tag: TiffTag.RowsPerStrip, type: FieldType.LONG, values: [height] },
    { tag: TiffTag.StripByteCounts, type: FieldType.LONG, values: perBand(planeBytes) },
    { tag: TiffTag.PlanarConfiguration, type: FieldType.SHORT, values: [2] },
    { tag: TiffTag.SampleFormat, type: FieldType.SHORT, values: perBand(3) },
    { tag: TiffTag.ModelPixelScale, type: FieldType.DOUBLE, values: [placement.pixelWidth, placement.pixelHeight, 0] },
    { tag: TiffTag.ModelTiepoint, type: FieldType.DOUBLE, values: [0, 0, 0, placement.west, placement.north, 0] },
    { tag: TiffTag.GeoKeyDirectory, type: FieldType.SHORT, values: geoKeyDirectory(crs) },
  ];
  if (samples > 1) {
    entries.push({ tag: TiffTag.ExtraSamples, type: FieldType.SHORT, values: new Array<number>(samples - 1).fill(0) });
  }
  if (samples > 0) {
    // GDAL holds a single no-data value per file
    entries.push({ tag: TiffTag.GdalNoData, type: FieldType.ASCII, values: String(dataset.bands[0].nullValue) });
  }
  entries.sort((a, b) => a.tag - b.tag);

  // Layout: header, IFD, out-of-line values, then one plane per band
  const ifdOffset = 8;
  let cursor = ifdOffset + 2 + entries.length * 12 + 4;
  const valueOffsets = entries.map((entry) => {
    if (byteLength(entry) <= 4) return undefined;
    const offset = cursor;
    cursor += byteLength(entry) + (byteLength(entry) % 2);
    return offset;
  });
  const dataOffset = cursor;
  const stripOffsets = entries.find((e) => e.tag === TiffTag.StripOffsets);
  if (stripOffsets) {
    stripOffsets.values = dataset.bands.map((_b, i) => dataOffset + i * planeBytes);
  }

  const buffer = Buffer.alloc(dataOffset + samples * planeBytes);
  buffer.write('II', 0, 'latin1');
  buffer.writeUInt16LE(42, 2);
  buffer.writeUInt32LE(ifdOffset, 4);
  buffer.writeUInt16LE(entries.length, ifdOffset);
  entries.forEach((entry, i) => {
    const position = ifdOffset + 2 + i * 12;
    buffer.writeUInt16LE(entry.tag, position);
    buffer.writeUInt16LE(entry.type, position + 2);
    buffer.writeUInt32LE(valueCount(entry), position + 4);
    const offset = valueOffsets[i];
    if (offset === undefined) {
      writeValues(buffer, position + 8, entry);
    } else {
      buffer.writeUInt32LE(offset, position + 8);
      writeValues(buffer, offset, entry);
    }
  });
  // Next IFD offset stays 0

  dataset.bands.forEach((band, i) => {
    let position = dataOffset + i * planeBytes;
    for (const value of band.data) {
      buffer.writeFloatLE(value, position);
      position += 4;
    }
  });
  return buffer;
}
