import CoverageResolver from '../catalog/coverage-resolver';
import { DataEngine } from '../data/data-engine';
import SubsetValidator from '../validation/subset-validator';
import { WcsConfig } from './service-config';

/**
 * The collaborators shared by every WCS request handler
 */
export default interface WcsServices {
  config: WcsConfig;
  resolver: CoverageResolver;
  validator: SubsetValidator;
  dataEngine: DataEngine;
}
