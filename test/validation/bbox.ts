import { describe, it } from 'mocha';
import { expect } from 'chai';
import { coverageExtent, intersects, parseBoundingBox } from '../../app/validation/bbox';
import { palsarCoverage } from '../helpers/catalog';

describe('bbox', function () {
  describe('intersects', function () {
    it('is true for overlapping intervals', function () {
      expect(intersects([0, 10], [5, 15])).to.be.true;
    });

    it('is true for intervals sharing only an end point', function () {
      expect(intersects([0, 10], [10, 20])).to.be.true;
    });

    it('is false for disjoint intervals', function () {
      expect(intersects([0, 10], [10.5, 20])).to.be.false;
    });

    it('is true when one interval contains the other', function () {
      expect(intersects([0, 100], [40, 60])).to.be.true;
    });
  });

  describe('coverageExtent', function () {
    it('returns the coverage extent as latitude and longitude ranges', function () {
      expect(coverageExtent(palsarCoverage())).to.eql({ latitude: [0, 10], longitude: [20, 30] });
    });
  });

  describe('parseBoundingBox', function () {
    it('reads x as longitude and y as latitude', function () {
      expect(parseBoundingBox('21,2,25,8', palsarCoverage())).to.eql({
        ok: true, value: { latitude: [2, 8], longitude: [21, 25] },
      });
    });

    it('tolerates whitespace around values', function () {
      expect(parseBoundingBox(' 21, 2 ,25 ,8', palsarCoverage())).to.eql({
        ok: true, value: { latitude: [2, 8], longitude: [21, 25] },
      });
    });

    it('accepts a degenerate box', function () {
      expect(parseBoundingBox('25,5,25,5', palsarCoverage()).ok).to.be.true;
    });

    it('rejects an empty value among the numbers', function () {
      expect(parseBoundingBox('21,,25,8', palsarCoverage())).to.eql({
        ok: false,
        failure: { code: 'InvalidParameterValue', fields: ['BBOX'], message: 'BBOX has an invalid numeric value ""' },
      });
    });

    it('rejects a box overlapping the extent in only one axis', function () {
      const outcome = parseBoundingBox('21,20,25,30', palsarCoverage());
      expect(outcome.ok).to.be.false;
    });
  });
});
