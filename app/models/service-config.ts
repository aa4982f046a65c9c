import { TemporalReduction, WcsEnv } from '../util/env';

/**
 * WCS 1.0.0 interpolation method names mapped to the resampling token understood by the
 * data engine. Methods the engine has no equivalent for fall back to nearest neighbour.
 */
export const interpolationMethods: ReadonlyMap<string, string> = new Map([
  ['nearest neighbor', 'nearest'],
  ['bilinear', 'bilinear'],
  ['bicubic', 'cubic'],
  ['lost area', 'nearest'],
  ['barycentric', 'nearest'],
]);

export const defaultInterpolationMethod = 'nearest neighbor';

/**
 * Immutable service-wide configuration shared by the frontend, the catalog and the
 * subset validator
 */
export interface WcsConfig {
  readonly service: Readonly<{ name: string; label: string; description: string }>;
  readonly updateSequence: string;
  readonly requestCrs: readonly string[];
  readonly responseCrs: readonly string[];
  readonly formats: readonly string[];
  readonly interpolationMethods: ReadonlyMap<string, string>;
  readonly defaultInterpolation: string;
  readonly instantWindowSeconds: number;
  readonly temporalReduction: TemporalReduction;
}

/**
 * Builds the service configuration from the environment
 *
 * @param env - the validated environment
 * @returns the frozen configuration
 */
export function buildServiceConfig(env: WcsEnv): WcsConfig {
  return Object.freeze({
    service: Object.freeze({
      name: env.serviceName,
      label: env.serviceLabel,
      description: env.serviceDescription ?? '',
    }),
    updateSequence: env.updateSequence,
    requestCrs: Object.freeze([...env.requestCrs]),
    responseCrs: Object.freeze([...env.responseCrs]),
    formats: Object.freeze([...env.supportedFormats]),
    interpolationMethods,
    defaultInterpolation: defaultInterpolationMethod,
    instantWindowSeconds: env.instantWindowSeconds,
    temporalReduction: env.temporalReduction,
  });
}
