/**
 * Hierarchical Lookup Tests
 */

import { jest } from '@jest/globals';
import { resolveWithinShow } from '../../../src/services/matching/hierarchicalLookup.js';
import type { ResolutionContext } from '../../../src/services/matching/resolutionPolicy.js';
import { RunStatistics } from '../../../src/services/run/RunStatistics.js';
import { FakeCatalogService, FakeEntity } from '../../helpers/fakeCatalog.js';
import { makeRecord, scalar } from '../../helpers/sidecars.js';

jest.mock('../../../src/middleware/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('resolveWithinShow', () => {
  let pilot: FakeEntity;
  let second: FakeEntity;
  let seasonOne: FakeEntity;
  let show: FakeEntity;
  let catalog: FakeCatalogService;
  let context: ResolutionContext;

  beforeEach(() => {
    pilot = new FakeEntity({
      ratingKey: '111',
      kind: 'episode',
      title: 'Pilot',
      index: 1,
      parentRatingKey: '11',
      grandparentRatingKey: '10',
    });
    second = new FakeEntity({
      ratingKey: '112',
      kind: 'episode',
      title: 'Cat in the Bag',
      index: 2,
      parentRatingKey: '11',
      grandparentRatingKey: '10',
    });
    seasonOne = new FakeEntity({
      ratingKey: '11',
      kind: 'season',
      title: 'Season 1',
      index: 1,
      parentRatingKey: '10',
      children: [pilot, second],
    });
    show = new FakeEntity({ ratingKey: '10', kind: 'show', title: 'Breaking Bad', children: [seasonOne] });
    catalog = new FakeCatalogService();
    context = { catalog, stats: new RunStatistics(), mode: { kind: 'unattended' } };
  });

  it('should reuse the show for a show sidecar', async () => {
    const record = makeRecord({ title: scalar('Breaking Bad') }, { mediaKind: 'show', rootTag: 'tvshow' });

    expect(await resolveWithinShow(record, show, context)).toBe(show);
    expect(show.calls).toEqual([]);
  });

  it('should address a season directly by number', async () => {
    const record = makeRecord({ title: scalar('Season 1') }, { mediaKind: 'season', seasonNumber: 1 });

    expect(await resolveWithinShow(record, show, context)).toBe(seasonOne);
    expect(show.calls).toEqual(['season:1']);
  });

  it('should resolve a season by title when the number is missing', async () => {
    const record = makeRecord({ title: scalar('Season 1') }, { mediaKind: 'season' });

    expect(await resolveWithinShow(record, show, context)).toBe(seasonOne);
    expect(show.calls).toEqual(['children']);
    expect(catalog.queries).toEqual([]);
  });

  it('should address an episode directly by season and episode number', async () => {
    const record = makeRecord(
      { title: scalar('Cat in the Bag') },
      { mediaKind: 'episode', seasonNumber: 1, episodeNumber: 2 }
    );

    expect(await resolveWithinShow(record, show, context)).toBe(second);
    expect(seasonOne.calls).toEqual(['episode:2']);
  });

  it('should scan the season when direct episode addressing fails', async () => {
    seasonOne.failOn.episode = new Error('404 Not Found');
    const record = makeRecord(
      { title: scalar('Cat in the Bag') },
      { mediaKind: 'episode', seasonNumber: 1, episodeNumber: 2 }
    );

    expect(await resolveWithinShow(record, show, context)).toBe(second);
    expect(seasonOne.calls).toEqual(['episode:2', 'children']);
  });

  it('should fall back to title resolution under the show when lookups fail', async () => {
    show.failOn.season = new Error('timeout');
    const record = makeRecord({ title: scalar('Pilot') }, { mediaKind: 'episode', seasonNumber: 1, episodeNumber: 1 });

    expect(await resolveWithinShow(record, show, context)).toBe(pilot);
    expect(show.calls).toEqual(['season:1', 'season:1', 'children']);
  });

  it('should return null and record a skip when nothing matches', async () => {
    const record = makeRecord(
      { title: scalar('Ozymandias') },
      { mediaKind: 'episode', seasonNumber: 5, episodeNumber: 14 }
    );

    expect(await resolveWithinShow(record, show, context)).toBeNull();
    expect(context.stats.snapshot().skipped).toEqual(['Ozymandias: No confident match (best score=30).']);
  });
});
