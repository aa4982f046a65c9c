import { describe, it } from 'mocha';
import { expect } from 'chai';
import CachedCoverageCatalog from '../../app/catalog/cached-catalog';
import { InMemoryCoverageCatalog, landsatCoverage, palsarCoverage } from '../helpers/catalog';

describe('CachedCoverageCatalog', function () {
  describe('when the same coverage is requested twice', function () {
    const source = new InMemoryCoverageCatalog([landsatCoverage(), palsarCoverage()]);
    const catalog = new CachedCoverageCatalog(source, { maxSize: 10, ttl: 60000 });

    it('reads the underlying catalog once', async function () {
      const first = await catalog.get('ls8_usgs_sr_scene');
      const second = await catalog.get('ls8_usgs_sr_scene');
      expect(second).to.equal(first);
      expect(source.calls).to.equal(1);
    });

    it('serves measurements from the cached coverage', async function () {
      expect((await catalog.measurementsOf('ls8_usgs_sr_scene')).map((m) => m.name)).to.eql(['red', 'green', 'blue']);
      expect(source.calls).to.equal(1);
    });

    it('reads the underlying catalog again once cleared', async function () {
      catalog.clear();
      await catalog.get('ls8_usgs_sr_scene');
      expect(source.calls).to.equal(2);
    });
  });

  describe('when listing every coverage', function () {
    const source = new InMemoryCoverageCatalog([landsatCoverage(), palsarCoverage()]);
    const catalog = new CachedCoverageCatalog(source, { maxSize: 10, ttl: 60000 });

    it('caches the listing', async function () {
      await catalog.listAll();
      const names = (await catalog.listAll()).map((c) => c.name);
      expect(names).to.eql(['alos_palsar_mosaic', 'ls8_usgs_sr_scene']);
      expect(source.calls).to.equal(1);
    });
  });

  describe('when a coverage does not exist', function () {
    const source = new InMemoryCoverageCatalog([]);
    const catalog = new CachedCoverageCatalog(source, { maxSize: 10, ttl: 60000 });

    it('returns undefined', async function () {
      expect(await catalog.get('unknown')).to.be.undefined;
    });

    it('returns no measurements', async function () {
      expect(await catalog.measurementsOf('unknown')).to.eql([]);
    });
  });
});
