import { describe, it } from 'mocha';
import { expect } from 'chai';
import { LogicalDataset } from '../../app/data/dataset';
import { encodeNetCdf } from '../../app/formatters/netcdf';

const dataset: LogicalDataset = {
  latitude: [1.5, 0.5],
  longitude: [10.5, 11.5, 12.5],
  resolution: { resx: 1, resy: -1 },
  bands: [
    { name: 'hh', nullValue: 0, data: Float64Array.from([1, 2, 3, 4, 5, 6]) },
    { name: 'hv', nullValue: 0, data: Float64Array.from([0.5, 0, 0.25, 8, 16, 32]) },
  ],
};

interface Variable {
  name: string;
  dimensions: number[];
  attributes: Record<string, number[] | string>;
  type: number;
  size: number;
  begin: number;
}

/**
 * Reads the header of a netCDF classic file
 */
class HeaderReader {
  position = 0;

  constructor(private buffer: Buffer) {}

  int(): number {
    const value = this.buffer.readInt32BE(this.position);
    this.position += 4;
    return value;
  }

  // Advances past a padded block, returning where it started
  skip(bytes: number): number {
    const start = this.position;
    this.position += bytes + ((4 - (bytes % 4)) % 4);
    return start;
  }

  name(): string {
    const length = this.int();
    const start = this.skip(length);
    return this.buffer.toString('utf8', start, start + length);
  }

  attributes(): Record<string, number[] | string> {
    this.int();
    const count = this.int();
    const result: Record<string, number[] | string> = {};
    for (let i = 0; i < count; i++) {
      const name = this.name();
      const type = this.int();
      const length = this.int();
      if (type === 2) {
        const start = this.skip(length);
        result[name] = this.buffer.toString('utf8', start, start + length);
      } else {
        const size = type === 6 ? 8 : 4;
        const start = this.skip(length * size);
        result[name] = Array.from({ length }, (_v, j) => (
          type === 6 ? this.buffer.readDoubleBE(start + j * 8) : this.buffer.readFloatBE(start + j * 4)));
      }
    }
    return result;
  }

  read(): { dimensions: [string, number][]; globals: Record<string, number[] | string>; variables: Variable[] } {
    this.skip(4); // magic
    this.int(); // numrecs
    this.int();
    const dimensions = Array.from({ length: this.int() }, (): [string, number] => [this.name(), this.int()]);
    const globals = this.attributes();
    this.int();
    const variables = Array.from({ length: this.int() }, (): Variable => ({
      name: this.name(),
      dimensions: Array.from({ length: this.int() }, () => this.int()),
      attributes: this.attributes(),
      type: this.int(),
      size: this.int(),
      begin: this.int(),
    }));
    return { dimensions, globals, variables };
  }
}

describe('NetCDF encoding', function () {
  const file = encodeNetCdf(dataset, 'EPSG:4326');
  const { dimensions, globals, variables } = new HeaderReader(file).read();
  const variable = (name: string): Variable => {
    const found = variables.find((v) => v.name === name);
    if (!found) expect.fail(`No variable named ${name}`);
    return found;
  };

  it('writes the classic format magic number', function () {
    expect(file.toString('latin1', 0, 4)).to.equal('CDF\x01');
  });

  it('declares latitude and longitude dimensions', function () {
    expect(dimensions).to.eql([['latitude', 2], ['longitude', 3]]);
  });

  it('records the conventions and CRS as global attributes', function () {
    expect(globals).to.eql({ Conventions: 'CF-1.6', crs: 'EPSG:4326' });
  });

  it('writes coordinate variables followed by one variable per band', function () {
    expect(variables.map((v) => v.name)).to.eql(['latitude', 'longitude', 'hh', 'hv']);
    expect(variables.map((v) => v.dimensions)).to.eql([[0], [1], [0, 1], [0, 1]]);
  });

  it('stores coordinates as doubles with units', function () {
    const latitude = variable('latitude');
    expect(latitude.type).to.equal(6);
    expect(latitude.attributes).to.eql({ units: 'degrees_north' });
    expect([0, 1].map((i) => file.readDoubleBE(latitude.begin + i * 8))).to.eql([1.5, 0.5]);
    expect(variable('longitude').attributes).to.eql({ units: 'degrees_east' });
  });

  it('stores bands as floats with their null value as the fill value', function () {
    const hv = variable('hv');
    expect(hv.type).to.equal(5);
    expect(hv.size).to.equal(24);
    expect(hv.attributes).to.eql({ _FillValue: [0] });
    expect(Array.from({ length: 6 }, (_v, i) => file.readFloatBE(hv.begin + i * 4))).to.eql([0.5, 0, 0.25, 8, 16, 32]);
  });

  it('lays the variables out back to back after the header', function () {
    variables.slice(1).forEach((v, i) => {
      expect(v.begin).to.equal(variables[i].begin + variables[i].size);
    });
    const last = variables[variables.length - 1];
    expect(last.begin + last.size).to.equal(file.length);
  });
});
