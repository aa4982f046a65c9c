import * as fs from 'fs';
import * as path from 'path';
import { Knex } from 'knex';
import { before } from 'mocha';
import { CoverageCatalog } from '../../app/catalog/coverage-catalog';
import { CoverageDescriptor, Measurement } from '../../app/models/coverage';
import db from '../../app/util/db';

const schemaPath = path.resolve(__dirname, '../../db/db.sql');

/**
 * Returns the fixture coverage used throughout the tests: latitude -40 to -10, longitude
 * 110 to 150, red / green / blue with a null value of -9999
 *
 * @param overrides - fields to replace
 */
export function landsatCoverage(overrides: Partial<CoverageDescriptor> = {}): CoverageDescriptor {
  return {
    name: 'ls8_usgs_sr_scene',
    label: 'Landsat 8 surface reflectance',
    description: 'Landsat 8 USGS Collection 1 Level 2 surface reflectance',
    spatialExtent: {
      minLatitude: -40, maxLatitude: -10, minLongitude: 110, maxLongitude: 150,
    },
    temporalExtent: {
      start: new Date('2020-01-01T00:00:00Z'),
      end: new Date('2020-12-31T00:00:00Z'),
      acquisitions: [
        new Date('2020-01-01T00:00:00Z'),
        new Date('2020-02-01T10:30:00Z'),
        new Date('2020-12-31T00:00:00Z'),
      ],
    },
    nativeCrs: 'EPSG:4326',
    requestCrs: ['EPSG:4326'],
    responseCrs: ['EPSG:4326'],
    formats: ['GeoTIFF'],
    measurements: [
      { name: 'red', nullValue: -9999 },
      { name: 'green', nullValue: -9999 },
      { name: 'blue', nullValue: -9999 },
    ],
    ...overrides,
  };
}

/**
 * A second coverage with a small extent and two radar bands
 *
 * @param overrides - fields to replace
 */
export function palsarCoverage(overrides: Partial<CoverageDescriptor> = {}): CoverageDescriptor {
  return {
    name: 'alos_palsar_mosaic',
    label: 'ALOS PALSAR annual mosaic',
    description: 'L-band radar & backscatter <annual>',
    spatialExtent: {
      minLatitude: 0, maxLatitude: 10, minLongitude: 20, maxLongitude: 30,
    },
    temporalExtent: {
      start: new Date('2015-01-01T00:00:00Z'),
      end: new Date('2017-01-01T00:00:00Z'),
      acquisitions: [
        new Date('2015-01-01T00:00:00Z'),
        new Date('2016-01-01T00:00:00Z'),
        new Date('2017-01-01T00:00:00Z'),
      ],
    },
    nativeCrs: 'EPSG:4326',
    requestCrs: ['EPSG:4326'],
    responseCrs: ['EPSG:4326'],
    formats: ['GeoTIFF', 'NetCDF'],
    measurements: [
      { name: 'hh', nullValue: 0 },
      { name: 'hv', nullValue: 0 },
    ],
    ...overrides,
  };
}

/**
 * Coverage catalog held in memory, for tests that do not need the database
 */
export class InMemoryCoverageCatalog implements CoverageCatalog {
  coverages: CoverageDescriptor[];

  calls = 0;

  constructor(coverages: CoverageDescriptor[]) {
    this.coverages = coverages;
  }

  async get(name: string): Promise<CoverageDescriptor | undefined> {
    this.calls += 1;
    return this.coverages.find((c) => c.name === name);
  }

  async listAll(): Promise<CoverageDescriptor[]> {
    this.calls += 1;
    return [...this.coverages].sort((a, b) => (a.name < b.name ? -1 : 1));
  }

  async measurementsOf(name: string): Promise<Measurement[]> {
    return (await this.get(name))?.measurements ?? [];
  }
}

/**
 * Creates the catalog tables from db/db.sql
 *
 * @param database - the knex instance
 */
export async function createCatalogSchema(database: Knex): Promise<void> {
  const statements = fs.readFileSync(schemaPath, 'utf8')
    .replace(/--.*$/gm, '')
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  for (const statement of statements) {
    await database.raw(statement);
  }
}

/**
 * Removes every row from the catalog tables
 *
 * @param database - the knex instance
 */
export async function truncateCatalog(database: Knex): Promise<void> {
  await database('coverage_acquisitions').delete();
  await database('coverage_measurements').delete();
  await database('coverage_offerings').delete();
}

/**
 * Inserts the coverages into the catalog tables. Formats and CRSs come from the service
 * configuration and are not stored.
 *
 * @param database - the knex instance
 * @param coverages - the coverages to insert
 */
export async function seedCatalog(database: Knex, coverages: CoverageDescriptor[]): Promise<void> {
  for (const c of coverages) {
    await database('coverage_offerings').insert({
      name: c.name,
      label: c.label,
      description: c.description,
      min_latitude: c.spatialExtent.minLatitude,
      max_latitude: c.spatialExtent.maxLatitude,
      min_longitude: c.spatialExtent.minLongitude,
      max_longitude: c.spatialExtent.maxLongitude,
      start_time: c.temporalExtent.start,
      end_time: c.temporalExtent.end,
      native_crs: c.nativeCrs,
    });
    if (c.measurements.length > 0) {
      await database('coverage_measurements').insert(c.measurements.map((m, i) => ({
        coverage_name: c.name, band_name: m.name, null_value: m.nullValue, band_order: i,
      })));
    }
    if (c.temporalExtent.acquisitions.length > 0) {
      await database('coverage_acquisitions').insert(c.temporalExtent.acquisitions.map((t) => ({
        coverage_name: c.name, acquired_at: t,
      })));
    }
  }
}

/**
 * Adds hooks creating the catalog schema in the in-memory test database and seeding it
 * with the given coverages for the duration of the enclosing describe block
 *
 * @param coverages - the coverages to insert
 */
export function hookCatalogDatabase(coverages: CoverageDescriptor[]): void {
  before(async function () {
    if (!(await db.schema.hasTable('coverage_offerings'))) {
      await createCatalogSchema(db);
    }
    await truncateCatalog(db);
    await seedCatalog(db, coverages);
  });
}
