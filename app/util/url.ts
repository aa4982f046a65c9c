import * as url from 'url';
import { Request } from 'express';

/**
 * Returns the protocol (http or https) depending on whether using localhost or not
 *
 * @param req - The incoming request whose URL should be gleaned
 * @returns The protocol (http or https) to use for public service URLs
 */
function _getProtocol(req: Request): string {
  const host = req.get('host') ?? '';
  return (host.startsWith('localhost')
    || host.startsWith('127.0.0.1')) ? 'http' : req.protocol;
}

/**
 * Returns the full string URL being accessed by a http.IncomingMessage, "req" object,
 * without its query string
 *
 * @param req - The incoming request whose URL should be gleaned
 * @returns The URL the incoming request is requesting
 */
export function getRequestUrl(req: Request): string {
  return url.format({
    protocol: _getProtocol(req),
    host: req.get('host'),
    pathname: req.originalUrl.split('?')[0],
  });
}
