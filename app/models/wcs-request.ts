import { Request } from 'express';
import RequestContext from './request-context';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      // Set for every request by the request id middleware in server.ts
      context: RequestContext;
    }
  }
}

/**
 * An Express request that has been through the WCS request id middleware
 */
type WcsRequest = Request;

export default WcsRequest;
