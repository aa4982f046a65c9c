import { CoverageCatalog } from './coverage-catalog';
import { CoverageDescriptor } from '../models/coverage';
import { Outcome, WcsExceptionCode, fail, succeed } from '../util/errors';

/**
 * Resolves coverage names requested by clients against the catalog
 */
export default class CoverageResolver {
  private catalog: CoverageCatalog;

  /**
   * Creates a resolver over the given catalog
   *
   * @param catalog - the coverage catalog
   */
  constructor(catalog: CoverageCatalog) {
    this.catalog = catalog;
  }

  /**
   * Resolves a single coverage name
   *
   * @param name - the exact coverage name
   * @returns the coverage, or a CoverageNotDefined failure
   */
  async resolve(name: string): Promise<Outcome<CoverageDescriptor>> {
    const coverage = await this.catalog.get(name);
    if (!coverage) {
      return fail(WcsExceptionCode.CoverageNotDefined, ['COVERAGE'], `Coverage "${name}" is not defined`);
    }
    return succeed(coverage);
  }

  /**
   * Resolves every name in order. If any name is unknown the whole request fails; there
   * is no partial result.
   *
   * @param names - the coverage names, in the order requested
   * @returns the coverages in the same order, or a CoverageNotDefined failure naming the
   * first unknown coverage
   */
  async resolveMany(names: string[]): Promise<Outcome<CoverageDescriptor[]>> {
    const coverages = await Promise.all(names.map((name) => this.catalog.get(name)));
    const result: CoverageDescriptor[] = [];
    for (const [i, coverage] of coverages.entries()) {
      if (!coverage) {
        return fail(WcsExceptionCode.CoverageNotDefined, ['COVERAGE'], `Coverage "${names[i]}" is not defined`);
      }
      result.push(coverage);
    }
    return succeed(result);
  }

  /**
   * Returns every coverage in the catalog
   */
  async all(): Promise<CoverageDescriptor[]> {
    return this.catalog.listAll();
  }
}
