import { describe, it } from 'mocha';
import { expect } from 'chai';
import { InMemoryCoverageCatalog, landsatCoverage, palsarCoverage } from '../../helpers/catalog';
import {
  bodyText, buildTestServices, hookWcsApp, hookWcsRequest, parseServiceException,
} from '../../helpers/wcs';

const describeCoverage = { SERVICE: 'WCS', REQUEST: 'DescribeCoverage', VERSION: '1.0.0' };

describe('WCS DescribeCoverage', function () {
  const undated = landsatCoverage({
    name: 'wofs_summary',
    temporalExtent: {
      start: new Date('1987-01-01T00:00:00Z'),
      end: new Date('2018-12-31T00:00:00Z'),
      acquisitions: [],
    },
  });
  hookWcsApp(() => buildTestServices(new InMemoryCoverageCatalog([landsatCoverage(), palsarCoverage(), undated])));

  describe('when a single coverage is requested', function () {
    hookWcsRequest({ ...describeCoverage, COVERAGE: 'ls8_usgs_sr_scene' });

    it('returns an XML document', function () {
      expect(this.res.status).to.equal(200);
      expect(this.res.headers['content-type']).to.match(/^text\/xml/);
    });

    it('describes only that coverage', function () {
      const body = bodyText(this.res);
      expect(body).to.include('<name>ls8_usgs_sr_scene</name>');
      expect(body).not.to.include('<name>alos_palsar_mosaic</name>');
    });

    it('gives the spatial domain in the native CRS', function () {
      expect(bodyText(this.res)).to.include('<gml:Envelope srsName="EPSG:4326">');
    });

    it('lists the acquisition times', function () {
      const body = bodyText(this.res);
      expect(body).to.include('<gml:timePosition>2020-02-01T10:30:00Z</gml:timePosition>');
      expect(body).not.to.include('<gml:TimePeriod>');
    });

    it('lists the measurements and their null values', function () {
      const body = bodyText(this.res);
      for (const band of ['red', 'green', 'blue']) {
        expect(body).to.include(`<singleValue>${band}</singleValue>`);
      }
      expect(body).to.include('<singleValue>-9999</singleValue>');
    });

    it('lists the supported CRSs and formats', function () {
      const body = bodyText(this.res);
      expect(body).to.include('<requestCRSs>EPSG:4326</requestCRSs>');
      expect(body).to.include('<responseCRSs>EPSG:4326</responseCRSs>');
      expect(body).to.include('<nativeCRSs>EPSG:4326</nativeCRSs>');
      expect(body).to.include('<formats>GeoTIFF</formats>');
      expect(body).not.to.include('<formats>NetCDF</formats>');
    });

    it('lists the interpolation methods with nearest neighbor as the default', function () {
      const body = bodyText(this.res);
      expect(body).to.include('<supportedInterpolations default="nearest neighbor">');
      expect(body).to.include('<interpolationMethod>bicubic</interpolationMethod>');
    });
  });

  describe('when no coverage is named', function () {
    hookWcsRequest(describeCoverage);

    it('describes every coverage', function () {
      const body = bodyText(this.res);
      expect(body.match(/<CoverageOffering>/g)?.length).to.equal(3);
    });
  });

  describe('when several coverages are named', function () {
    hookWcsRequest({ ...describeCoverage, COVERAGE: 'ls8_usgs_sr_scene,alos_palsar_mosaic' });

    it('describes them in the requested order', function () {
      const body = bodyText(this.res);
      expect(body.indexOf('<name>ls8_usgs_sr_scene</name>'))
        .to.be.lessThan(body.indexOf('<name>alos_palsar_mosaic</name>'));
    });
  });

  describe('when a coverage has no discrete acquisitions', function () {
    hookWcsRequest({ ...describeCoverage, COVERAGE: 'wofs_summary' });

    it('gives the temporal domain as a time period', function () {
      const body = bodyText(this.res);
      expect(body).to.include('<gml:beginPosition>1987-01-01T00:00:00Z</gml:beginPosition>');
      expect(body).to.include('<gml:endPosition>2018-12-31T00:00:00Z</gml:endPosition>');
    });
  });

  describe('when a named coverage does not exist', function () {
    hookWcsRequest({ ...describeCoverage, COVERAGE: 'ls8_usgs_sr_scene,ls9_usgs_sr_scene' });

    it('reports CoverageNotDefined located at COVERAGE', function () {
      expect(this.res.status).to.equal(400);
      expect(parseServiceException(bodyText(this.res))).to.eql({
        code: 'CoverageNotDefined',
        locator: 'COVERAGE',
        message: 'Coverage &quot;ls9_usgs_sr_scene&quot; is not defined',
      });
    });
  });

  describe('when VERSION is missing', function () {
    hookWcsRequest({ SERVICE: 'WCS', REQUEST: 'DescribeCoverage' });

    it('reports MissingParameterValue located at VERSION', function () {
      expect(parseServiceException(bodyText(this.res))).to.eql({
        code: 'MissingParameterValue',
        locator: 'VERSION',
        message: 'VERSION is required',
      });
    });
  });

  describe('when VERSION is unsupported', function () {
    hookWcsRequest({ ...describeCoverage, VERSION: '1.1.0' });

    it('reports InvalidParameterValue located at VERSION', function () {
      expect(parseServiceException(bodyText(this.res))).to.eql({
        code: 'InvalidParameterValue',
        locator: 'VERSION',
        message: 'WCS version &quot;1.1.0&quot; is not supported. This server only supports 1.0.0',
      });
    });
  });
});
