import { Response, NextFunction } from 'express';
import { renderToTemplate } from '../frontends/wcs/render';
import { exceptionFormat } from '../frontends/wcs/request-router';
import WcsRequest from '../models/wcs-request';
import { HttpError, WcsException } from '../util/errors';

/**
 * Returns the appropriate http status code for the provided error
 * @param err - The error that occured
 */
function getHttpStatusCode(err: Error): number {
  let code = err instanceof HttpError ? +err.code || 500 : 500;
  if (code < 400 || code >= 600) {
    // Need to check that the provided code is in a valid range due to some errors
    // providing a non-http code.
    code = 500;
  }
  return code;
}

/**
 * Builds the ServiceException values for an error. Server faults carry no code and a
 * generic message.
 *
 * @param err - The error that occurred
 * @param statusCode - The HTTP status being returned
 */
export function serviceException(err: Error, statusCode: number): { code: string; locator: string; message: string } {
  if (err instanceof WcsException) {
    return { code: err.exceptionCode, locator: err.locator, message: err.message };
  }
  if (statusCode >= 500) {
    return { code: '', locator: '', message: 'An unexpected error occurred while processing the request' };
  }
  return { code: '', locator: '', message: err.message };
}

/**
 * Express.js middleware catching errors that escape WCS request handling and sending them
 * to clients as a ServiceExceptionReport
 *
 * @param err - The error that occurred
 * @param req - The client request
 * @param res - The client response
 * @param next - The next function in the middleware chain
 */
export default async function errorHandler(
  err: Error, req: WcsRequest, res: Response, next: NextFunction,
): Promise<void> {
  if (res.headersSent) {
    // If the server has started writing the response, delegate to the
    // default error handler, which closes the connection and fails the
    // request
    next(err);
    return;
  }
  const statusCode = getHttpStatusCode(err);
  const exception = serviceException(err, statusCode);
  const { logger } = req.context;
  if (statusCode >= 500) {
    logger.error(err.message, { stack: err.stack });
  } else {
    logger.info(`WCS exception ${exception.code || statusCode}: ${err.message}`, { locator: exception.locator });
  }

  try {
    const report = await renderToTemplate('ServiceExceptionReport', exception);
    res.status(statusCode).type(exceptionFormat).send(report);
  } catch (e) {
    next(e);
  }
}
