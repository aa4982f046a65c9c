import { Response } from 'express';
import WcsRequest from '../../models/wcs-request';
import WcsServices from '../../models/wcs-services';
import { Outcome, WcsExceptionCode, fail, succeed, unwrap } from '../../util/errors';
import { RawRequestParameters } from '../../util/object';
import { compareUpdateSequence } from '../../util/update-sequence';
import { getRequestUrl } from '../../util/url';
import { coverageView } from './coverage-view';
import { renderToTemplate } from './render';

export enum CapabilitiesSection {
  Service = 'WCS_Capabilities/Service',
  Capability = 'WCS_Capabilities/Capability',
  ContentMetadata = 'WCS_Capabilities/ContentMetadata',
}

const allSections = Object.values(CapabilitiesSection);

/**
 * Parses the optional SECTION parameter. `/` or an absent value selects every section;
 * the leading slash of a section path may be omitted.
 *
 * @param params - the normalized request parameters
 * @returns the sections to include
 */
export function parseSection(params: RawRequestParameters): Outcome<CapabilitiesSection[]> {
  const value = (params.SECTION ?? '').replace(/^\//, '');
  if (value === '') return succeed(allSections);
  const section = allSections.find((s) => s === value);
  if (!section) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['SECTION'],
      `SECTION must be one of "/", ${allSections.map((s) => `"/${s}"`).join(', ')}`);
  }
  return succeed([section]);
}

/**
 * Checks the client's UPDATESEQUENCE against the server's
 *
 * @param params - the normalized request parameters
 * @param current - the server's update sequence
 */
export function checkUpdateSequence(params: RawRequestParameters, current: string): Outcome<void> {
  const requested = params.UPDATESEQUENCE;
  if (requested === undefined || requested === '') return succeed(undefined);
  const comparison = compareUpdateSequence(requested, current);
  if (comparison === 0) {
    return fail(WcsExceptionCode.CurrentUpdateSequence, ['UPDATESEQUENCE'],
      `The capabilities document is already at update sequence ${current}`);
  }
  if (comparison > 0) {
    return fail(WcsExceptionCode.InvalidUpdateSequence, ['UPDATESEQUENCE'],
      `UPDATESEQUENCE ${requested} is greater than the current update sequence ${current}`);
  }
  return succeed(undefined);
}

/**
 * Responds with the WCS 1.0.0 capabilities document. Any VERSION negotiates to 1.0.0.
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param services - The WCS collaborators
 * @throws WcsException - if SECTION or UPDATESEQUENCE is rejected
 */
export default async function getCapabilities(
  req: WcsRequest, res: Response, services: WcsServices,
): Promise<void> {
  const { parameters } = req.context;
  const { config } = services;
  const sections = unwrap(parseSection(parameters));
  unwrap(checkUpdateSequence(parameters, config.updateSequence));

  const includes = (section: CapabilitiesSection): boolean => sections.includes(section);
  const coverages = includes(CapabilitiesSection.ContentMetadata)
    ? (await services.resolver.all()).map(coverageView)
    : [];

  const capabilities = {
    updateSequence: config.updateSequence,
    url: `${getRequestUrl(req)}?`,
    service: includes(CapabilitiesSection.Service) ? config.service : false,
    capability: includes(CapabilitiesSection.Capability),
    contentMetadata: includes(CapabilitiesSection.ContentMetadata),
    coverages,
  };

  res.status(200);
  res.set('Content-Type', 'text/xml');
  res.send(await renderToTemplate('GetCapabilities', capabilities));
}
