import { Response } from 'express';
import { translateSubsetRequest } from '../../data/translator';
import { fetchAndStack } from '../../data/stack';
import { formatResponse } from '../../formatters';
import WcsRequest from '../../models/wcs-request';
import WcsServices from '../../models/wcs-services';
import { unwrap } from '../../util/errors';
import { checkVersion } from './request-router';

/**
 * Responds with the requested subset of a coverage, encoded in the requested format
 *
 * SERVICE=WCS&REQUEST=GetCoverage&VERSION=1.0.0&COVERAGE=ls8_usgs_sr_scene&CRS=EPSG:4326
 *   &BBOX=120,-30,121,-29&RESX=0.1&RESY=-0.1&FORMAT=GeoTIFF
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param services - The WCS collaborators
 * @throws WcsException - if any parameter fails validation
 */
export default async function getCoverage(
  req: WcsRequest, res: Response, services: WcsServices,
): Promise<void> {
  const { parameters, logger } = req.context;
  unwrap(checkVersion(parameters));

  const request = unwrap(await services.validator.validate(parameters));
  const { query, instants, ranges } = translateSubsetRequest(request);
  logger.info(`Fetching ${query.measurements.join(',')} of ${query.product} for ${instants.length} instant(s) and ${ranges.length} range(s)`);

  // Requested order, with each measurement's null value
  const measurements = request.measurements.flatMap(
    (name) => request.coverage.measurements.filter((m) => m.name === name),
  );
  const dataset = await fetchAndStack(services.dataEngine, query, instants, ranges, {
    instantWindowSeconds: services.config.instantWindowSeconds,
    reduction: services.config.temporalReduction,
    measurements,
    logger,
  });

  const encoded = formatResponse(dataset, request.format, request.responseCrs, request.coverage.name);
  res.status(200);
  res.attachment(encoded.filename);
  res.set('Content-Type', encoded.contentType);
  res.send(encoded.body);
}
