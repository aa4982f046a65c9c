import { CoverageDescriptor } from '../../models/coverage';
import { toISODateTime } from '../../util/date';

export interface CoverageView {
  name: string;
  label: string;
  description: string;
  minLongitude: number;
  minLatitude: number;
  maxLongitude: number;
  maxLatitude: number;
  start: string;
  end: string;
}

/**
 * Flattens a coverage into the values the capabilities and description templates use
 *
 * @param coverage - the coverage
 */
export function coverageView(coverage: CoverageDescriptor): CoverageView {
  const { spatialExtent: e, temporalExtent: t } = coverage;
  return {
    name: coverage.name,
    label: coverage.label,
    description: coverage.description,
    minLongitude: e.minLongitude,
    minLatitude: e.minLatitude,
    maxLongitude: e.maxLongitude,
    maxLatitude: e.maxLatitude,
    start: toISODateTime(t.start),
    end: toISODateTime(t.end),
  };
}
