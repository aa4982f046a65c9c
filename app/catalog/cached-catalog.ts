import { LRUCache } from 'lru-cache';
import { CoverageCatalog } from './coverage-catalog';
import { CoverageDescriptor, Measurement } from '../models/coverage';

interface CachedCatalogOptions {
  maxSize: number; // Maximum number of coverages held
  ttl: number; // TTL in milliseconds
}

const allCoveragesKey = 'all';

/**
 * Read-through cache in front of another catalog. The catalog only changes when it is
 * refreshed out of band, so entries simply expire after the configured TTL.
 */
export default class CachedCoverageCatalog implements CoverageCatalog {
  private catalog: CoverageCatalog;

  private coverages: LRUCache<string, CoverageDescriptor>;

  private listing: LRUCache<string, CoverageDescriptor[]>;

  /**
   * Wraps the given catalog
   *
   * @param catalog - the catalog holding the data
   * @param options - cache size and expiry
   */
  constructor(catalog: CoverageCatalog, options: CachedCatalogOptions) {
    this.catalog = catalog;
    this.coverages = new LRUCache<string, CoverageDescriptor>({
      max: options.maxSize,
      ttl: options.ttl,
      fetchMethod: async (name: string): Promise<CoverageDescriptor | undefined> => this.catalog.get(name),
    });
    this.listing = new LRUCache<string, CoverageDescriptor[]>({
      max: 1,
      ttl: options.ttl,
      fetchMethod: async (): Promise<CoverageDescriptor[]> => this.catalog.listAll(),
    });
  }

  async get(name: string): Promise<CoverageDescriptor | undefined> {
    return this.coverages.fetch(name);
  }

  async listAll(): Promise<CoverageDescriptor[]> {
    return (await this.listing.fetch(allCoveragesKey)) ?? [];
  }

  async measurementsOf(name: string): Promise<Measurement[]> {
    const coverage = await this.get(name);
    return coverage ? coverage.measurements : [];
  }

  /**
   * Drops every cached entry
   */
  clear(): void {
    this.coverages.clear();
    this.listing.clear();
  }
}
