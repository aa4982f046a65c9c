import CoverageResolver from '../catalog/coverage-resolver';
import { CoverageDescriptor } from '../models/coverage';
import { WcsConfig } from '../models/service-config';
import {
  NumericRange, Resolution, TimeSelection, ValidatedSubsetRequest,
} from '../models/subset-request';
import { Outcome, ServerError, WcsExceptionCode, fail, succeed } from '../util/errors';
import { RawRequestParameters } from '../util/object';
import {
  ParameterParseError, parseInteger, parseMultiValueParameter, parseNumber,
} from '../util/parameter-parsing';
import { Conjunction, listToText } from '../util/string';
import { coverageExtent, parseBoundingBox } from './bbox';
import { fullTemporalExtent, parseTimeSelection } from './time';

/**
 * What the gates have established about the request so far
 */
export interface GateState {
  coverage: CoverageDescriptor;
  crs?: string;
  responseCrs?: string;
  latitude?: NumericRange;
  longitude?: NumericRange;
  time?: TimeSelection;
  resolution?: Resolution;
  measurements?: string[];
  resampling?: string;
  format?: string;
}

/**
 * A single validation step. Returns the fields it establishes, or the failure that
 * stops validation.
 */
export interface SubsetGate {
  name: string;
  run(params: RawRequestParameters, state: GateState, config: WcsConfig): Outcome<Partial<GateState>>;
}

/**
 * Returns a value a previous gate was required to set
 *
 * @param value - the state value
 * @param field - the name of the state field, for the error message
 * @throws ServerError - if the gate ordering is broken
 */
function established<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new ServerError(`Subset validation reached a gate before ${field} was established`);
  }
  return value;
}

/**
 * Returns true if the parameter is present with a non-empty value
 */
function present(params: RawRequestParameters, name: string): boolean {
  return (params[name] ?? '') !== '';
}

/**
 * Builds a message for a value that must be one of the allowed values
 *
 * @param name - the parameter name
 * @param allowed - the allowed values
 */
function oneOfMessage(name: string, allowed: readonly string[]): string {
  const quoted = allowed.map((a) => `"${a}"`);
  return `${name} must be one of ${listToText(quoted, Conjunction.OR)}`;
}

const crsGate: SubsetGate = {
  name: 'crs',
  run(params, { coverage }) {
    if (!present(params, 'CRS')) {
      return fail(WcsExceptionCode.MissingParameterValue, ['CRS'], 'CRS is required');
    }
    const crs = params.CRS;
    if (!coverage.requestCrs.includes(crs)) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['CRS'], oneOfMessage('CRS', coverage.requestCrs));
    }
    const responseCrs = present(params, 'RESPONSE_CRS') ? params.RESPONSE_CRS : crs;
    if (!coverage.responseCrs.includes(responseCrs)) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['RESPONSE_CRS'],
        oneOfMessage('RESPONSE_CRS', coverage.responseCrs));
    }
    return succeed({ crs, responseCrs });
  },
};

const bboxGate: SubsetGate = {
  name: 'bbox',
  run(params, { coverage }) {
    if (!present(params, 'BBOX') && !present(params, 'TIME')) {
      return fail(WcsExceptionCode.MissingParameterValue, ['BBOX', 'TIME'], 'One of BBOX or TIME is required');
    }
    if (!present(params, 'BBOX')) {
      return succeed(coverageExtent(coverage));
    }
    return parseBoundingBox(params.BBOX, coverage);
  },
};

const timeGate: SubsetGate = {
  name: 'time',
  run(params, { coverage }) {
    if (!present(params, 'TIME')) {
      return succeed({ time: fullTemporalExtent(coverage) });
    }
    const time = parseTimeSelection(params.TIME, coverage);
    return time.ok ? succeed({ time: time.value }) : time;
  },
};

/**
 * Parses every named parameter with the given parser, returning undefined if any of them
 * does not parse
 */
function parseAll(
  params: RawRequestParameters,
  names: string[],
  parser: (name: string, value: string) => number,
): number[] | undefined {
  try {
    return names.map((name) => parser(name, params[name]));
  } catch (e) {
    if (e instanceof ParameterParseError) return undefined;
    throw e;
  }
}

const gridGate: SubsetGate = {
  name: 'grid',
  run(params, state) {
    if (present(params, 'RESX') && present(params, 'RESY')) {
      const parsed = parseAll(params, ['RESX', 'RESY'], parseNumber);
      if (!parsed || parsed[0] < 0 || parsed[1] > 0) {
        return fail(WcsExceptionCode.InvalidParameterValue, ['RESX', 'RESY'],
          'RESX must be a non-negative number and RESY a non-positive number');
      }
      return succeed({ resolution: { resx: parsed[0], resy: parsed[1] } });
    }
    if (present(params, 'WIDTH') && present(params, 'HEIGHT')) {
      const parsed = parseAll(params, ['WIDTH', 'HEIGHT'], parseInteger);
      if (!parsed || parsed[0] < 0 || parsed[1] < 0) {
        return fail(WcsExceptionCode.InvalidParameterValue, ['WIDTH', 'HEIGHT'],
          'WIDTH and HEIGHT must be non-negative integers');
      }
      // A zero size counts as one cell across the box
      const [width, height] = parsed;
      const [lonMin, lonMax] = established(state.longitude, 'longitude');
      const [latMin, latMax] = established(state.latitude, 'latitude');
      return succeed({
        resolution: {
          resx: (lonMax - lonMin) / Math.max(width, 1),
          resy: -(latMax - latMin) / Math.max(height, 1),
        },
      });
    }
    return fail(WcsExceptionCode.MissingParameterValue, ['RESX', 'RESY', 'WIDTH', 'HEIGHT'],
      'Either RESX and RESY or WIDTH and HEIGHT are required');
  },
};

const measurementsGate: SubsetGate = {
  name: 'measurements',
  run(params, { coverage }) {
    const available = coverage.measurements.map((m) => m.name);
    if (!present(params, 'MEASUREMENTS')) {
      return succeed({ measurements: available });
    }
    const requested = parseMultiValueParameter(params.MEASUREMENTS);
    const unknown = requested.filter((m) => !available.includes(m));
    if (unknown.length > 0) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['MEASUREMENTS'],
        `Coverage "${coverage.name}" has no measurement named ${listToText(unknown.map((u) => `"${u}"`))}`);
    }
    return succeed({ measurements: requested });
  },
};

const interpolationGate: SubsetGate = {
  name: 'interpolation',
  run(params, _state, config) {
    const method = present(params, 'INTERPOLATION') ? params.INTERPOLATION : config.defaultInterpolation;
    const resampling = config.interpolationMethods.get(method);
    if (resampling === undefined) {
      return fail(WcsExceptionCode.InvalidParameterValue, ['INTERPOLATION'],
        oneOfMessage('INTERPOLATION', [...config.interpolationMethods.keys()]));
    }
    return succeed({ resampling });
  },
};

const formatGate: SubsetGate = {
  name: 'format',
  run(params, { coverage }) {
    if (!present(params, 'FORMAT') || !coverage.formats.includes(params.FORMAT)) {
      return fail(WcsExceptionCode.InvalidFormat, ['FORMAT'], oneOfMessage('FORMAT', coverage.formats));
    }
    return succeed({ format: params.FORMAT });
  },
};

/**
 * The gates run after the coverage has been resolved, in order. The first failure wins.
 */
export const subsetGates: readonly SubsetGate[] = Object.freeze([
  crsGate,
  bboxGate,
  timeGate,
  gridGate,
  measurementsGate,
  interpolationGate,
  formatGate,
]);

/**
 * Returns a frozen copy of the range
 */
function frozenRange(range: NumericRange): NumericRange {
  const copy: [number, number] = [range[0], range[1]];
  Object.freeze(copy);
  return copy;
}

/**
 * Assembles the frozen request once every gate has passed
 *
 * @param state - the final gate state
 */
function freezeRequest(state: GateState): ValidatedSubsetRequest {
  const resolution = established(state.resolution, 'resolution');
  return Object.freeze({
    coverage: state.coverage,
    crs: established(state.crs, 'crs'),
    responseCrs: established(state.responseCrs, 'responseCrs'),
    latitude: frozenRange(established(state.latitude, 'latitude')),
    longitude: frozenRange(established(state.longitude, 'longitude')),
    time: Object.freeze(established(state.time, 'time')),
    resolution: Object.freeze({ ...resolution }),
    resampling: established(state.resampling, 'resampling'),
    format: established(state.format, 'format'),
    measurements: Object.freeze([...established(state.measurements, 'measurements')]),
  });
}

/**
 * Validates GetCoverage parameters into a single self-consistent subset request
 */
export default class SubsetValidator {
  private resolver: CoverageResolver;

  private config: WcsConfig;

  private gates: readonly SubsetGate[];

  /**
   * Creates the validator
   *
   * @param resolver - resolves the COVERAGE parameter
   * @param config - service configuration
   * @param gates - the gates to run after the coverage is resolved
   */
  constructor(resolver: CoverageResolver, config: WcsConfig, gates: readonly SubsetGate[] = subsetGates) {
    this.resolver = resolver;
    this.config = config;
    this.gates = gates;
  }

  /**
   * Runs the coverage gate and then every subset gate in order, stopping at the first
   * failure
   *
   * @param params - the normalized request parameters
   * @returns the validated request, or the first failure
   */
  async validate(params: RawRequestParameters): Promise<Outcome<ValidatedSubsetRequest>> {
    if (!present(params, 'COVERAGE')) {
      return fail(WcsExceptionCode.MissingParameterValue, ['COVERAGE'], 'COVERAGE is required');
    }
    const coverage = await this.resolver.resolve(params.COVERAGE);
    if (!coverage.ok) return coverage;

    let state: GateState = { coverage: coverage.value };
    for (const gate of this.gates) {
      const result = gate.run(params, state, this.config);
      if (!result.ok) return result;
      state = { ...state, ...result.value };
    }
    return succeed(freezeRequest(state));
  }
}
