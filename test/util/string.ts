import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  Conjunction, isBoolean, isFloat, isInteger, listToText, parseBoolean,
} from '../../app/util/string';

describe('util/string', function () {
  describe('#listToText', function () {
    it('returns an empty string for no items', function () {
      expect(listToText([])).to.equal('');
    });

    it('returns a single item unchanged', function () {
      expect(listToText(['a'])).to.equal('a');
    });

    it('joins two items with the conjunction', function () {
      expect(listToText(['a', 'b'], Conjunction.OR)).to.equal('a or b');
    });

    it('uses an Oxford comma for three or more items', function () {
      expect(listToText(['a', 'b', 'c'])).to.equal('a, b, and c');
    });
  });

  describe('#isInteger', function () {
    it('accepts negative integers', function () {
      expect(isInteger('-42')).to.be.true;
    });

    it('rejects decimals', function () {
      expect(isInteger('4.2')).to.be.false;
    });
  });

  describe('#isFloat', function () {
    it('accepts decimals', function () {
      expect(isFloat('0.5')).to.be.true;
    });

    it('rejects integers', function () {
      expect(isFloat('5')).to.be.false;
    });
  });

  describe('#isBoolean and #parseBoolean', function () {
    it('accepts true and false in any case', function () {
      expect(isBoolean('TRUE')).to.be.true;
      expect(isBoolean('False')).to.be.true;
      expect(isBoolean('yes')).to.be.false;
    });

    it('parses true in any case', function () {
      expect(parseBoolean('True')).to.be.true;
      expect(parseBoolean('false')).to.be.false;
    });
  });
});
