import 'reflect-metadata';
import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import {
  ArrayNotEmpty, IsBoolean, IsIn, IsInt, IsNotEmpty, IsNumber, IsUrl, Max, Min, ValidationError, validateSync,
} from 'class-validator';
import { isBoolean, isFloat, isInteger, parseBoolean } from './string';

const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Sets up the configuration of the WCS server from env-defaults, an optional .env file
// and the process environment, in increasing order of precedence
//

// Save the original process.env so we can re-use it to override
export const originalEnv = _.cloneDeep(process.env);

export type TemporalReduction = 'mean' | 'latest';

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
function makeConfigVar(stringValue: string): number | string | boolean {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  } else {
    return stringValue;
  }
}

/**
 * Splits a comma-separated setting into its trimmed, non-empty entries
 *
 * @param value - the raw setting
 */
function parseList(value = ''): string[] {
  return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
  Get any errors from validating the environment - leave out the env object itself
  from the output to avoid showing secrets.
  @param env - the WcsEnv instance, including constraints
  @returns An array of `ValidationError`s
*/
export function getValidationErrors(env: WcsEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

/**
 * Returns an object containing environment config properties, with CONSTANT_CASE keys.
 * Loads the properties from the env-defaults file, a .env file (outside of tests), and
 * process.env.
 *
 * @param envDefaultsPath - the path to the env-defaults file
 * @param dotEnvPath - path to the .env file
 * @returns all environment variables keyed by their CONSTANT_CASE name
 */
function loadEnvFromFiles(envDefaultsPath: string, dotEnvPath: string): Record<string, string> {
  let envOverrides = {};
  if (process.env.NODE_ENV !== 'test') {
    try {
      envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
    } catch (e) {
      logger.warn('Could not parse environment overrides from .env file');
      logger.warn(e instanceof Error ? e.message : String(e));
    }
  }
  const envDefaults = dotenv.parse(fs.readFileSync(envDefaultsPath));
  const processEnv = _.pickBy(originalEnv, (v): v is string => v !== undefined);
  return { ...envDefaults, ...envOverrides, ...processEnv };
}

const hostRegexWhitelist = { require_tld: false };

export class WcsEnv {
  @IsNotEmpty()
  nodeEnv!: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  port!: number;

  @IsNotEmpty()
  hostBinding!: string;

  @IsNotEmpty()
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @IsNotEmpty()
  clientId!: string;

  @IsIn(['postgres', 'sqlite'])
  databaseType!: string;

  databaseUrl!: string;

  @IsNotEmpty()
  serviceName!: string;

  @IsNotEmpty()
  serviceLabel!: string;

  serviceDescription!: string;

  @IsNotEmpty()
  updateSequence!: string;

  @ArrayNotEmpty()
  requestCrs!: string[];

  @ArrayNotEmpty()
  responseCrs!: string[];

  @ArrayNotEmpty()
  supportedFormats!: string[];

  @IsUrl(hostRegexWhitelist)
  dataEngineUrl!: string;

  @IsInt()
  @Min(1)
  dataEngineTimeoutMs!: number;

  @IsNumber()
  @Min(0)
  instantWindowSeconds!: number;

  @IsIn(['mean', 'latest'])
  temporalReduction!: TemporalReduction;

  @IsInt()
  @Min(1)
  catalogCacheSize!: number;

  @IsInt()
  @Min(1)
  catalogCacheTtlMs!: number;

  /**
  * Validate a set of env vars.
  * @throws Error on constraint violation
  */
  validate(): void {
    if (process.env.SKIP_ENV_VALIDATION !== 'true') {
      const errors = getValidationErrors(this);

      if (errors.length > 0) {
        for (const err of errors) {
          logger.error(err);
        }
        throw (new Error('BAD ENVIRONMENT'));
      }
    }
  }

  /**
   * Constructs the WcsEnv instance.
   * @param envDefaultsPath - path to the env-defaults file
   * @param dotEnvPath - path to the .env file
   */
  constructor(envDefaultsPath: string, dotEnvPath = '.env') {
    const env = loadEnvFromFiles(envDefaultsPath, dotEnvPath); // { CONFIG_NAME: '0', ... }
    const parsed: Record<string, number | string | boolean> = {};
    for (const k of Object.keys(env)) {
      parsed[_.camelCase(k)] = makeConfigVar(env[k]); // { configName: 0, ... }
      // for existing env vars this is redundant (but doesn't hurt), but this allows us
      // to add new env vars to the process as needed
      process.env[k] = env[k];
    }
    Object.assign(this, parsed, {
      // special cases that must not be coerced to numbers or that hold lists
      updateSequence: env.UPDATE_SEQUENCE,
      requestCrs: parseList(env.REQUEST_CRS),
      responseCrs: parseList(env.RESPONSE_CRS),
      supportedFormats: parseList(env.SUPPORTED_FORMATS),
    });
  }
}

const envObj = new WcsEnv(path.resolve(__dirname, '../../env-defaults'));
envObj.validate();

export default envObj;
