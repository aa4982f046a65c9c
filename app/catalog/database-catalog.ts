import _ from 'lodash';
import { Knex } from 'knex';
import { Logger } from 'winston';
import { CoverageCatalog } from './coverage-catalog';
import { CoverageDescriptor, Measurement } from '../models/coverage';
import { WcsConfig } from '../models/service-config';

export interface CoverageOfferingRow {
  name: string;
  label: string;
  description: string;
  min_latitude: number;
  max_latitude: number;
  min_longitude: number;
  max_longitude: number;
  start_time: Date | number | string;
  end_time: Date | number | string;
  native_crs: string;
}

export interface CoverageMeasurementRow {
  coverage_name: string;
  band_name: string;
  null_value: number;
  band_order: number;
}

export interface CoverageAcquisitionRow {
  coverage_name: string;
  acquired_at: Date | number | string;
}

/**
 * Converts a timestamp column to a Date. sqlite hands back epoch milliseconds where
 * postgres returns Date objects.
 *
 * @param value - the column value
 */
function toDate(value: Date | number | string): Date {
  return value instanceof Date ? value : new Date(value);
}

/**
 * Coverage catalog backed by the coverage_offerings, coverage_measurements and
 * coverage_acquisitions tables
 */
export default class DatabaseCoverageCatalog implements CoverageCatalog {
  private db: Knex;

  private config: WcsConfig;

  private logger: Logger;

  /**
   * Creates the catalog
   *
   * @param db - the knex instance or transaction to query with
   * @param config - service configuration supplying the advertised CRSs and formats
   * @param logger - the logger to use
   */
  constructor(db: Knex, config: WcsConfig, logger: Logger) {
    this.db = db;
    this.config = config;
    this.logger = logger;
  }

  async get(name: string): Promise<CoverageDescriptor | undefined> {
    const row = await this.db<CoverageOfferingRow>('coverage_offerings').where({ name }).first();
    if (!row) return undefined;
    const [descriptor] = await this.toDescriptors([row]);
    return descriptor;
  }

  async listAll(): Promise<CoverageDescriptor[]> {
    const rows = await this.db<CoverageOfferingRow>('coverage_offerings').orderBy('name');
    return this.toDescriptors(rows);
  }

  async measurementsOf(name: string): Promise<Measurement[]> {
    const rows = await this.db<CoverageMeasurementRow>('coverage_measurements')
      .where({ coverage_name: name })
      .orderBy([{ column: 'band_order' }, { column: 'band_name' }]);
    return rows.map((r) => ({ name: r.band_name, nullValue: r.null_value }));
  }

  /**
   * Loads the measurements and acquisitions of the given offerings and assembles their
   * descriptors. Offerings without measurements are skipped.
   *
   * @param rows - coverage_offerings rows
   * @returns the descriptors, in the order of the rows
   */
  private async toDescriptors(rows: CoverageOfferingRow[]): Promise<CoverageDescriptor[]> {
    if (rows.length === 0) return [];
    const names = rows.map((r) => r.name);
    const [measurementRows, acquisitionRows] = await Promise.all([
      this.db<CoverageMeasurementRow>('coverage_measurements')
        .whereIn('coverage_name', names)
        .orderBy([{ column: 'band_order' }, { column: 'band_name' }]),
      this.db<CoverageAcquisitionRow>('coverage_acquisitions')
        .whereIn('coverage_name', names)
        .orderBy('acquired_at'),
    ]);
    const measurements = _.groupBy(measurementRows, 'coverage_name');
    const acquisitions = _.groupBy(acquisitionRows, 'coverage_name');

    const descriptors: CoverageDescriptor[] = [];
    for (const row of rows) {
      const bands = measurements[row.name] ?? [];
      if (bands.length === 0) {
        this.logger.warn(`Coverage ${row.name} has no measurements and will not be offered`);
        continue;
      }
      descriptors.push({
        name: row.name,
        label: row.label,
        description: row.description,
        spatialExtent: {
          minLatitude: row.min_latitude,
          maxLatitude: row.max_latitude,
          minLongitude: row.min_longitude,
          maxLongitude: row.max_longitude,
        },
        temporalExtent: {
          start: toDate(row.start_time),
          end: toDate(row.end_time),
          acquisitions: (acquisitions[row.name] ?? []).map((a) => toDate(a.acquired_at)),
        },
        nativeCrs: row.native_crs,
        requestCrs: [...this.config.requestCrs],
        responseCrs: [...this.config.responseCrs],
        formats: [...this.config.formats],
        measurements: bands.map((b) => ({ name: b.band_name, nullValue: b.null_value })),
      });
    }
    return descriptors;
  }
}
