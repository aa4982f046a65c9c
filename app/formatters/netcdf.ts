import { LogicalDataset } from '../data/dataset';

// netCDF classic format tags and external types
const NC_DIMENSION = 0x0a;
const NC_VARIABLE = 0x0b;
const NC_ATTRIBUTE = 0x0c;

export enum NcType {
  CHAR = 2,
  FLOAT = 5,
  DOUBLE = 6,
}

const typeSizes: Record<NcType, number> = {
  [NcType.CHAR]: 1,
  [NcType.FLOAT]: 4,
  [NcType.DOUBLE]: 8,
};

interface NcAttribute {
  name: string;
  type: NcType;
  values: number[] | string;
}

interface NcVariable {
  name: string;
  dimensions: number[];
  attributes: NcAttribute[];
  type: NcType;
  values: ArrayLike<number>;
}

/**
 * Accumulates big-endian values for a netCDF header or data section
 */
class BigEndianWriter {
  private chunks: Buffer[] = [];

  length = 0;

  private push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  int(value: number): void {
    const chunk = Buffer.alloc(4);
    chunk.writeInt32BE(value);
    this.push(chunk);
  }

  /**
   * Writes the values followed by zero padding to a four byte boundary
   */
  values(type: NcType, values: ArrayLike<number> | string): void {
    const count = typeof values === 'string' ? Buffer.byteLength(values) : values.length;
    const size = count * typeSizes[type];
    const chunk = Buffer.alloc(size + ((4 - (size % 4)) % 4));
    if (typeof values === 'string') {
      chunk.write(values, 0, 'utf8');
    } else {
      for (let i = 0; i < count; i++) {
        if (type === NcType.FLOAT) chunk.writeFloatBE(values[i], i * 4);
        else if (type === NcType.DOUBLE) chunk.writeDoubleBE(values[i], i * 8);
        else chunk.writeUInt8(values[i], i);
      }
    }
    this.push(chunk);
  }

  name(value: string): void {
    this.int(Buffer.byteLength(value));
    this.values(NcType.CHAR, value);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

function writeAttributes(writer: BigEndianWriter, attributes: NcAttribute[]): void {
  if (attributes.length === 0) {
    writer.int(0);
    writer.int(0);
    return;
  }
  writer.int(NC_ATTRIBUTE);
  writer.int(attributes.length);
  for (const attribute of attributes) {
    writer.name(attribute.name);
    writer.int(attribute.type);
    writer.int(typeof attribute.values === 'string' ? Buffer.byteLength(attribute.values) : attribute.values.length);
    writer.values(attribute.type, attribute.values);
  }
}

function variableSize(variable: NcVariable): number {
  const size = variable.values.length * typeSizes[variable.type];
  return size + ((4 - (size % 4)) % 4);
}

/**
 * Writes the header, using the given data offsets for each variable
 */
function writeHeader(
  dimensions: [string, number][],
  globals: NcAttribute[],
  variables: NcVariable[],
  offsets: number[],
): Buffer {
  const writer = new BigEndianWriter();
  writer.values(NcType.CHAR, 'CDF\x01');
  writer.int(0); // numrecs
  writer.int(NC_DIMENSION);
  writer.int(dimensions.length);
  for (const [name, length] of dimensions) {
    writer.name(name);
    writer.int(length);
  }
  writeAttributes(writer, globals);
  writer.int(NC_VARIABLE);
  writer.int(variables.length);
  variables.forEach((variable, i) => {
    writer.name(variable.name);
    writer.int(variable.dimensions.length);
    variable.dimensions.forEach((d) => writer.int(d));
    writeAttributes(writer, variable.attributes);
    writer.int(variable.type);
    writer.int(variableSize(variable));
    writer.int(offsets[i]);
  });
  return writer.toBuffer();
}

/**
 * Encodes the dataset as a netCDF classic (CDF-1) file with latitude and longitude
 * coordinate variables and one float variable per band
 *
 * @param dataset - the dataset to encode
 * @param crs - the CRS, stored as the global crs attribute
 * @returns the file contents
 */
export function encodeNetCdf(dataset: LogicalDataset, crs: string): Buffer {
  const dimensions: [string, number][] = [
    ['latitude', dataset.latitude.length],
    ['longitude', dataset.longitude.length],
  ];
  const globals: NcAttribute[] = [
    { name: 'Conventions', type: NcType.CHAR, values: 'CF-1.6' },
    { name: 'crs', type: NcType.CHAR, values: crs },
  ];
  const variables: NcVariable[] = [
    {
      name: 'latitude',
      dimensions: [0],
      attributes: [{ name: 'units', type: NcType.CHAR, values: 'degrees_north' }],
      type: NcType.DOUBLE,
      values: dataset.latitude,
    },
    {
      name: 'longitude',
      dimensions: [1],
      attributes: [{ name: 'units', type: NcType.CHAR, values: 'degrees_east' }],
      type: NcType.DOUBLE,
      values: dataset.longitude,
    },
    ...dataset.bands.map((band) => ({
      name: band.name,
      dimensions: [0, 1],
      attributes: [{ name: '_FillValue', type: NcType.FLOAT, values: [band.nullValue] }],
      type: NcType.FLOAT,
      values: band.data,
    })),
  ];

  // Offsets are fixed-width, so the header length does not depend on their values
  const headerLength = writeHeader(dimensions, globals, variables, variables.map(() => 0)).length;
  const offsets: number[] = [];
  let cursor = headerLength;
  for (const variable of variables) {
    offsets.push(cursor);
    cursor += variableSize(variable);
  }

  const data = new BigEndianWriter();
  for (const variable of variables) {
    data.values(variable.type, variable.values);
  }
  return Buffer.concat([writeHeader(dimensions, globals, variables, offsets), data.toBuffer()]);
}
