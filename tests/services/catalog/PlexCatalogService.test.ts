/**
 * PlexCatalogService Tests
 */

import { jest } from '@jest/globals';
import { PlexClient } from '../../../src/services/catalog/PlexClient.js';
import { PlexCatalogService } from '../../../src/services/catalog/PlexCatalogService.js';
import { CatalogConnectionError, InvalidStateError } from '../../../src/errors/index.js';
import { createFakePlexHttp, type FakePlexHttp } from '../../helpers/fakePlexHttp.js';

jest.mock('../../../src/middleware/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const BASE_URL = 'http://plex.local:32400';

function service(fake: FakePlexHttp): PlexCatalogService {
  return new PlexCatalogService(new PlexClient({ baseUrl: BASE_URL, token: 'test-token', httpClient: fake.http }));
}

describe('PlexCatalogService', () => {
  describe('connect', () => {
    it('should read the server identity', async () => {
      const fake = createFakePlexHttp({ 'GET /identity': { MediaContainer: { machineIdentifier: 'abc123' } } });

      await service(fake).connect();

      expect(fake.requests.map(request => request.url)).toEqual(['/identity']);
    });

    it('should wrap failures in CatalogConnectionError', async () => {
      const failure = service(createFakePlexHttp()).connect();

      await expect(failure).rejects.toBeInstanceOf(CatalogConnectionError);
      await expect(failure).rejects.toThrow(
        `Failed to connect to Plex at ${BASE_URL}: Plex GET ${BASE_URL}/identity failed with HTTP 404`
      );
    });
  });

  describe('search', () => {
    it('should flatten hub results and drop entries without a rating key', async () => {
      const fake = createFakePlexHttp({
        'GET /hubs/search': {
          MediaContainer: {
            Hub: [
              {
                type: 'movie',
                Metadata: [
                  { ratingKey: '1', type: 'movie', title: 'The Matrix', year: 1999 },
                  { title: 'Keanu Reeves', type: 'actor' },
                ],
              },
              { type: 'show' },
              { type: 'episode', Metadata: [{ ratingKey: 77, type: 'episode', title: 'The Matrix Revisited', index: 3 }] },
            ],
          },
        },
      });

      const results = await service(fake).search('The Matrix');

      expect(results.map(result => [result.ratingKey, result.kind, result.title])).toEqual([
        ['1', 'movie', 'The Matrix'],
        ['77', 'episode', 'The Matrix Revisited'],
      ]);
      expect(results[0].year).toBe(1999);
      expect(results[1].index).toBe(3);
      expect(fake.requests[0].query).toBe('query=The+Matrix&limit=50');
    });

    it('should report an unknown lock state for search hits', async () => {
      const fake = createFakePlexHttp({
        'GET /hubs/search': {
          MediaContainer: { Hub: [{ Metadata: [{ ratingKey: '1', type: 'movie', title: 'The Matrix' }] }] },
        },
      });

      const [hit] = await service(fake).search('The Matrix');

      expect(hit.lockState('summary')).toBe('unknown');
    });
  });

  describe('fetchEntity', () => {
    it('should fail when Plex returns no metadata', async () => {
      const fake = createFakePlexHttp({ 'GET /library/metadata/9': { MediaContainer: { Metadata: [] } } });

      await expect(service(fake).fetchEntity('9')).rejects.toBeInstanceOf(InvalidStateError);
    });
  });
});
