import { Outcome, WcsExceptionCode, fail, succeed } from '../../util/errors';
import { RawRequestParameters } from '../../util/object';

export const wcsVersion = '1.0.0';

export const exceptionFormat = 'application/vnd.ogc.se_xml';

export const requestTypes = ['GetCapabilities', 'DescribeCoverage', 'GetCoverage'] as const;

export type WcsRequestType = typeof requestTypes[number];

function isRequestType(value: string): value is WcsRequestType {
  return requestTypes.some((t) => t === value);
}

/**
 * Determines which WCS operation the request is for. SERVICE and REQUEST values are
 * case-sensitive; unknown parameters are ignored.
 *
 * @param params - the normalized request parameters
 * @returns the request type, or an InvalidParameterValue failure
 */
export function routeRequest(params: RawRequestParameters): Outcome<WcsRequestType> {
  if (params.SERVICE !== 'WCS') {
    return fail(WcsExceptionCode.InvalidParameterValue, ['SERVICE'], 'SERVICE must be "WCS"');
  }
  const request = params.REQUEST ?? '';
  if (!isRequestType(request)) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['REQUEST'],
      'REQUEST must be one of "GetCapabilities", "DescribeCoverage", or "GetCoverage"');
  }
  if (params.EXCEPTIONS !== undefined && params.EXCEPTIONS !== exceptionFormat) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['EXCEPTIONS'], `EXCEPTIONS must be "${exceptionFormat}"`);
  }
  return succeed(request);
}

/**
 * Checks the VERSION parameter of DescribeCoverage and GetCoverage requests, which is
 * required and must be 1.0.0
 *
 * @param params - the normalized request parameters
 */
export function checkVersion(params: RawRequestParameters): Outcome<string> {
  if ((params.VERSION ?? '') === '') {
    return fail(WcsExceptionCode.MissingParameterValue, ['VERSION'], 'VERSION is required');
  }
  if (params.VERSION !== wcsVersion) {
    return fail(WcsExceptionCode.InvalidParameterValue, ['VERSION'],
      `WCS version "${params.VERSION}" is not supported. This server only supports ${wcsVersion}`);
  }
  return succeed(params.VERSION);
}
