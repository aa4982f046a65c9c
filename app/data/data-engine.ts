import axios, { AxiosInstance } from 'axios';
import { Logger } from 'winston';
import { TimeRange } from '../models/subset-request';
import { ServerError } from '../util/errors';
import { LoadResult, TimeSlice } from './dataset';
import { DataQuery } from './translator';

/**
 * Loads and resamples pixels for a subset of a product
 */
export interface DataEngine {
  /**
   * Loads every slice of the query's product acquired within the time range (inclusive)
   *
   * @param query - the spatial subset, measurements, resolution and resampling
   * @param time - the time window
   * @param logger - the request logger
   */
  load(query: DataQuery, time: TimeRange, logger: Logger): Promise<LoadResult>;
}

/**
 * Returns true if the value is an array of finite numbers
 */
function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

/**
 * Returns true if the value is a plain object
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates and converts the body returned by the data engine's load endpoint:
 * `{ latitude: number[], longitude: number[], slices: [{ time: string, values: { band: number[] } }] }`
 *
 * @param body - the parsed JSON body
 * @returns the load result
 * @throws ServerError - if the body does not have the expected shape
 */
export function parseLoadResponse(body: unknown): LoadResult {
  if (!isRecord(body) || !isNumberArray(body.latitude) || !isNumberArray(body.longitude)
    || !Array.isArray(body.slices)) {
    throw new ServerError('The data engine returned an unexpected response');
  }
  const pixels = body.latitude.length * body.longitude.length;
  const slices: TimeSlice[] = body.slices.map((slice: unknown) => {
    if (!isRecord(slice) || typeof slice.time !== 'string' || !isRecord(slice.values)) {
      throw new ServerError('The data engine returned an unexpected time slice');
    }
    const time = new Date(slice.time);
    const values: Record<string, Float64Array> = {};
    for (const [band, data] of Object.entries(slice.values)) {
      if (!isNumberArray(data) || data.length !== pixels) {
        throw new ServerError(`The data engine returned malformed pixels for ${band}`);
      }
      values[band] = Float64Array.from(data);
    }
    if (Number.isNaN(time.getTime())) {
      throw new ServerError(`The data engine returned an invalid time "${slice.time}"`);
    }
    return { time, values };
  });
  return { latitude: body.latitude, longitude: body.longitude, slices };
}

/**
 * Data engine reached over HTTP. Loads are POSTed as JSON to `<baseUrl>/load`.
 */
export class HttpDataEngine implements DataEngine {
  private client: AxiosInstance;

  /**
   * Creates the client
   *
   * @param baseUrl - the base URL of the data engine
   * @param timeoutMs - time allowed for a single load
   */
  constructor(baseUrl: string, timeoutMs: number) {
    this.client = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async load(query: DataQuery, time: TimeRange, logger: Logger): Promise<LoadResult> {
    const startTime = new Date().getTime();
    try {
      const response = await this.client.post('/load', {
        ...query,
        time: [time.start.toISOString(), time.end.toISOString()],
      }, {
        headers: { 'Content-type': 'application/json' },
      });
      return parseLoadResponse(response.data);
    } catch (e) {
      if (e instanceof ServerError) throw e;
      if (axios.isAxiosError(e)) {
        logger.error(`Data engine load failed: ${e.code ?? ''} ${e.message}`);
        if (e.response) {
          logger.error(`Data engine status: ${e.response.status}`);
        }
        throw new ServerError('The data engine failed to load the requested coverage');
      }
      throw e;
    } finally {
      const durationMs = new Date().getTime() - startTime;
      logger.debug('timing.data-engine.load.end', { durationMs });
    }
  }
}
