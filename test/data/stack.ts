import { describe, it } from 'mocha';
import { expect } from 'chai';
import { fetchAndStack, fetchWindows, StackOptions } from '../../app/data/stack';
import { DataQuery } from '../../app/data/translator';
import { ServerError } from '../../app/util/errors';
import { StubDataEngine } from '../helpers/data-engine';
import { createLoggerForTest } from '../helpers/log';

const january = new Date('2020-01-01T00:00:00Z');
const february = new Date('2020-02-01T00:00:00Z');

const query: DataQuery = {
  product: 'ls8_usgs_sr_scene',
  latitude: [0, 2],
  longitude: [0, 2],
  measurements: ['red'],
  resolution: [-1, 1],
  crs: 'EPSG:4326',
  resampling: 'nearest',
};

const wholeYear = [{ start: new Date('2019-12-01T00:00:00Z'), end: new Date('2020-12-31T00:00:00Z') }];

/**
 * Returns a 2x2 engine with two acquisitions of red, the later one listed first
 */
function twoSliceEngine(): StubDataEngine {
  return new StubDataEngine([1.5, 0.5], [0.5, 1.5], [
    { time: february, values: { red: [3, -9999, -9999, 8] } },
    { time: january, values: { red: [1, 2, -9999, NaN] } },
  ]);
}

function options(overrides: Partial<StackOptions> = {}): StackOptions {
  return {
    instantWindowSeconds: 0,
    reduction: 'mean',
    measurements: [{ name: 'red', nullValue: -9999 }],
    logger: createLoggerForTest().testLogger,
    ...overrides,
  };
}

describe('stack', function () {
  describe('fetchWindows', function () {
    it('widens instants by the window and appends the ranges', function () {
      const range = { start: january, end: february };
      expect(fetchWindows([january], [range], 60)).to.eql([
        { start: new Date('2019-12-31T23:59:00Z'), end: new Date('2020-01-01T00:01:00Z') },
        range,
      ]);
    });

    it('returns no windows for no instants or ranges', function () {
      expect(fetchWindows([], [], 60)).to.eql([]);
    });
  });

  describe('fetchAndStack', function () {
    it('averages the valid pixels of every slice', async function () {
      const dataset = await fetchAndStack(twoSliceEngine(), query, [], wholeYear, options());
      expect(Array.from(dataset.bands[0].data)).to.eql([2, 2, -9999, 8]);
    });

    it('keeps the latest slice when reducing by latest', async function () {
      const dataset = await fetchAndStack(twoSliceEngine(), query, [], wholeYear, options({ reduction: 'latest' }));
      expect(Array.from(dataset.bands[0].data)).to.eql([3, -9999, -9999, 8]);
    });

    it('returns the engine grid and the requested resolution', async function () {
      const dataset = await fetchAndStack(twoSliceEngine(), query, [], wholeYear, options());
      expect(dataset.latitude).to.eql([1.5, 0.5]);
      expect(dataset.longitude).to.eql([0.5, 1.5]);
      expect(dataset.resolution).to.eql({ resx: 1, resy: -1 });
    });

    it('loads each instant within its window', async function () {
      const engine = twoSliceEngine();
      const dataset = await fetchAndStack(engine, query, [january], [], options());
      expect(engine.calls.map((c) => c.time)).to.eql([{ start: january, end: january }]);
      expect(Array.from(dataset.bands[0].data)).to.eql([1, 2, -9999, NaN]);
    });

    it('loads every instant and range', async function () {
      const engine = twoSliceEngine();
      await fetchAndStack(engine, query, [january, february], wholeYear, options());
      expect(engine.calls.length).to.equal(3);
      expect(engine.calls[0].query).to.eql(query);
    });

    it('fills measurements missing from every slice with the null value', async function () {
      const dataset = await fetchAndStack(twoSliceEngine(), query, [], wholeYear, options({
        measurements: [{ name: 'red', nullValue: -9999 }, { name: 'green', nullValue: 0 }],
      }));
      expect(dataset.bands.map((b) => b.name)).to.eql(['red', 'green']);
      expect(Array.from(dataset.bands[1].data)).to.eql([0, 0, 0, 0]);
    });

    it('returns a grid of null values when nothing was acquired', async function () {
      const nothing = [{ start: new Date('2021-01-01T00:00:00Z'), end: new Date('2021-02-01T00:00:00Z') }];
      const dataset = await fetchAndStack(twoSliceEngine(), query, [], nothing, options());
      expect(dataset.latitude).to.eql([1.5, 0.5]);
      expect(dataset.longitude).to.eql([0.5, 1.5]);
      expect(Array.from(dataset.bands[0].data)).to.eql([-9999, -9999, -9999, -9999]);
    });

    it('propagates data engine failures', async function () {
      const engine = twoSliceEngine();
      engine.error = new ServerError('The data engine failed to load the requested coverage');
      await expect(fetchAndStack(engine, query, [], wholeYear, options())).to.be.rejectedWith(ServerError);
    });
  });
});
