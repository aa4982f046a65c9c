import express, { RequestHandler } from 'express';
import buildWcsFrontend from '../frontends/wcs';
import WcsServices from '../models/wcs-services';
import { NotFoundError } from '../util/errors';

/**
 * Given an Express.js middleware handler function, returns another
 * Express.js handler that wraps the input function with logging
 * information and ensures the logger accessed by the input function
 * describes the middleware that produced it.
 *
 * @param fn - The middleware handler to wrap with logging
 * @returns The handler wrapped with logging information
 */
export function logged(fn: RequestHandler): RequestHandler {
  const scope = `middleware.${fn.name}`;
  return async (req, res, next): Promise<void> => {
    const { logger } = req.context;
    const child = logger.child({ component: scope });
    req.context.logger = child;
    const startTime = new Date().getTime();
    try {
      child.debug('Invoking middleware');
      await fn(req, res, next);
    } finally {
      const msTaken = new Date().getTime() - startTime;
      child.debug('Completed middleware', { durationMs: msTaken });
      if (req.context.logger === child) {
        // Other middlewares may have changed the logger
        req.context.logger = logger;
      }
    }
  };
}

/**
 * Creates and returns an express.Router instance that serves WCS 1.0.0 requests
 *
 * @param services - The WCS collaborators
 * @returns A router which can respond to WCS requests
 */
export default function router(services: WcsServices): express.Router {
  const result = express.Router();

  result.get('/wcs', logged(buildWcsFrontend(services)));
  result.get('/', (req, res) => res.redirect('/wcs?SERVICE=WCS&REQUEST=GetCapabilities'));

  result.use((req, res, next) => next(new NotFoundError(`No route matches ${req.method} ${req.path}`)));
  return result;
}
