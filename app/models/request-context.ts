import { Logger } from 'winston';
import { RawRequestParameters } from '../util/object';

/**
 * Contains additional information about a request
 */
export default class RequestContext {
  id: string;

  logger: Logger;

  /**
   * The query parameters keyed by canonical (upper-case) name, once normalized
   */
  parameters: RawRequestParameters = {};

  /**
   * The WCS operation being served, once routed
   */
  operation?: string;

  /**
   * Creates an instance of RequestContext.
   *
   * @param id - request identifier
   * @param logger - logger carrying the request identifier
   */
  constructor(id: string, logger: Logger) {
    this.id = id;
    this.logger = logger;
  }
}
