import { CoverageDescriptor, Measurement } from '../models/coverage';

/**
 * Read-only lookup of coverage offerings. Implementations may be backed by a database or
 * any other store; the request pipeline never mutates the catalog.
 */
export interface CoverageCatalog {
  /**
   * Returns the coverage with exactly the given name, or undefined if there is none
   */
  get(name: string): Promise<CoverageDescriptor | undefined>;

  /**
   * Returns every coverage offering, ordered by name
   */
  listAll(): Promise<CoverageDescriptor[]>;

  /**
   * Returns the measurements of the named coverage in band order, or an empty list if the
   * coverage does not exist
   */
  measurementsOf(name: string): Promise<Measurement[]>;
}
