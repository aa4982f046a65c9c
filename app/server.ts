import express, { Express, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuid } from 'uuid';
import expressWinston from 'express-winston';
import { promisify } from 'util';
import { Server } from 'http';
import { Knex } from 'knex';
import { Logger } from 'winston';
import CachedCoverageCatalog from './catalog/cached-catalog';
import CoverageResolver from './catalog/coverage-resolver';
import DatabaseCoverageCatalog from './catalog/database-catalog';
import { DataEngine, HttpDataEngine } from './data/data-engine';
import { availableFormats } from './formatters';
import errorHandler from './middleware/error-handler';
import RequestContext from './models/request-context';
import { buildServiceConfig } from './models/service-config';
import WcsRequest from './models/wcs-request';
import WcsServices from './models/wcs-services';
import router from './routers/router';
import db from './util/db';
import env, { WcsEnv } from './util/env';
import logger from './util/log';
import SubsetValidator from './validation/subset-validator';

/**
 * Returns middleware to add a request specific logger
 *
 * @param appLogger - Request specific application logger
 */
function addRequestLogger(appLogger: Logger): RequestHandler {
  return expressWinston.logger({
    winstonInstance: appLogger,
    dynamicMeta(req: WcsRequest) { return { requestId: req.context.id }; },
  });
}

/**
 * Returns middleware to set a requestID for a request. Also adds requestUrl to the logger
 * info object.
 *
 * @param appLogger - Request specific application logger
 */
function addRequestId(appLogger: Logger): RequestHandler {
  return (req: WcsRequest, res: Response, next: NextFunction): void => {
    const requestId = uuid();
    const requestUrl = req.url;
    req.context = new RequestContext(requestId, appLogger.child({ requestId, requestUrl }));
    next();
  };
}

/**
 * Wires the catalog, validator and data engine from the environment
 *
 * @param envVars - The validated environment
 * @param database - The knex instance holding the coverage catalog
 * @param appLogger - The application logger
 * @param dataEngine - The data engine, defaulting to the HTTP engine at DATA_ENGINE_URL
 * @returns the services shared by every request
 */
export function buildServices(
  envVars: WcsEnv,
  database: Knex,
  appLogger: Logger,
  dataEngine: DataEngine = new HttpDataEngine(envVars.dataEngineUrl, envVars.dataEngineTimeoutMs),
): WcsServices {
  const config = buildServiceConfig(envVars);
  const unsupported = config.formats.filter((f) => !availableFormats().includes(f));
  if (unsupported.length > 0) {
    appLogger.warn(`No encoder is available for configured format(s) ${unsupported.join(', ')}`);
  }
  const catalog = new CachedCoverageCatalog(
    new DatabaseCoverageCatalog(database, config, appLogger.child({ component: 'catalog' })),
    { maxSize: envVars.catalogCacheSize, ttl: envVars.catalogCacheTtlMs },
  );
  const resolver = new CoverageResolver(catalog);
  return {
    config,
    resolver,
    validator: new SubsetValidator(resolver, config),
    dataEngine,
  };
}

/**
 * Builds the express application serving WCS requests
 *
 * @param services - The WCS collaborators
 * @param appLogger - The application logger
 * @returns the application, not yet listening
 */
export function createApp(services: WcsServices, appLogger: Logger = logger.child({ application: 'wcs' })): Express {
  const app = express();
  // Repeated parameters arrive as arrays; nothing is parsed into nested objects
  app.set('query parser', 'simple');
  app.use(addRequestId(appLogger));
  app.use(addRequestLogger(appLogger));
  app.use('/', router(services));
  // Error handlers need to be mounted at the top level, not on a child router, or they
  // get skipped.
  app.use(errorHandler);
  return app;
}

/**
 * Starts the WCS server
 *
 * @param envVars - The validated environment
 * @returns The running http.Server
 */
export function start(envVars: WcsEnv = env): { server: Server } {
  // Log unhandled promise rejections and do not crash the node process
  process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });

  const appLogger = logger.child({ application: 'wcs' });
  const app = createApp(buildServices(envVars, db, appLogger), appLogger);
  const server = app.listen(envVars.port, envVars.hostBinding,
    () => appLogger.info(`Web Coverage Service listening on ${envVars.hostBinding} on port ${envVars.port}`));

  // Allow time for large data engine loads
  server.setTimeout(envVars.dataEngineTimeoutMs + 60000);
  return { server };
}

/**
 * Stops the express server created and returned by the start() method
 *
 * @param server - http.Server object as returned by start()
 * @returns A promise that completes when the server closes
 */
export async function stop({ server }: { server: Server }): Promise<void> {
  await promisify(server.close.bind(server))();
  await db.destroy();
}

if (require.main === module) {
  start();
}
