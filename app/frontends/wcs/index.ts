import { NextFunction, RequestHandler, Response } from 'express';
import WcsRequest from '../../models/wcs-request';
import WcsServices from '../../models/wcs-services';
import { unwrap } from '../../util/errors';
import { keysToUpperCase } from '../../util/object';
import describeCoverage from './describe-coverage';
import getCapabilities from './get-capabilities';
import getCoverage from './get-coverage';
import { WcsRequestType, routeRequest } from './request-router';

type WcsHandler = (req: WcsRequest, res: Response, services: WcsServices) => Promise<void>;

const handlers: Record<WcsRequestType, WcsHandler> = {
  GetCapabilities: getCapabilities,
  DescribeCoverage: describeCoverage,
  GetCoverage: getCoverage,
};

/**
 * Returns the Express handler for WCS 1.0.0 key-value-pair requests. Parameter names are
 * case-insensitive; the request is routed on SERVICE and REQUEST and any failure is passed
 * on to the error handler.
 *
 * @param services - The WCS collaborators
 * @returns the request handler
 */
export default function buildWcsFrontend(services: WcsServices): RequestHandler {
  return async function wcsFrontend(req: WcsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const parameters = keysToUpperCase(req.query);
      req.context.parameters = parameters;
      const requestType = unwrap(routeRequest(parameters));
      req.context.operation = requestType;
      req.context.logger.info(`Handling WCS ${requestType}`);
      await handlers[requestType](req, res, services);
    } catch (e) {
      next(e);
    }
  };
}
