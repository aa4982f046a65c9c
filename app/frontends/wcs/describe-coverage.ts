import { Response } from 'express';
import { CoverageDescriptor } from '../../models/coverage';
import WcsRequest from '../../models/wcs-request';
import WcsServices from '../../models/wcs-services';
import { toISODateTime } from '../../util/date';
import { unwrap } from '../../util/errors';
import { parseMultiValueParameter } from '../../util/parameter-parsing';
import { coverageView } from './coverage-view';
import { checkVersion } from './request-router';
import { renderToTemplate } from './render';

/**
 * Builds the template values for one CoverageOffering
 *
 * @param coverage - the coverage
 * @param services - supplies the interpolation methods
 */
function coverageOffering(coverage: CoverageDescriptor, services: WcsServices): object {
  const { config } = services;
  return {
    ...coverageView(coverage),
    nativeCrs: coverage.nativeCrs,
    acquisitions: coverage.temporalExtent.acquisitions.map(toISODateTime),
    measurements: coverage.measurements,
    requestCrs: coverage.requestCrs,
    responseCrs: coverage.responseCrs,
    formats: coverage.formats,
    defaultInterpolation: config.defaultInterpolation,
    interpolations: [...config.interpolationMethods.keys()],
  };
}

/**
 * Responds with the description of the requested coverages, or of every coverage when
 * COVERAGE is absent
 *
 * SERVICE=WCS&REQUEST=DescribeCoverage&VERSION=1.0.0&COVERAGE=ls8_usgs_sr_scene
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param services - The WCS collaborators
 * @throws WcsException - if VERSION is missing or unsupported, or a coverage is unknown
 */
export default async function describeCoverage(
  req: WcsRequest, res: Response, services: WcsServices,
): Promise<void> {
  const { parameters } = req.context;
  unwrap(checkVersion(parameters));

  const requested = (parameters.COVERAGE ?? '') === ''
    ? undefined
    : parseMultiValueParameter(parameters.COVERAGE);
  const coverages = requested
    ? unwrap(await services.resolver.resolveMany(requested))
    : await services.resolver.all();

  res.status(200);
  res.set('Content-Type', 'text/xml');
  res.send(await renderToTemplate('DescribeCoverage', {
    coverages: coverages.map((c) => coverageOffering(c, services)),
  }));
}
