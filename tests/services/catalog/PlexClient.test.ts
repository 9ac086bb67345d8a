/**
 * PlexClient Tests
 */

import { jest } from '@jest/globals';
import { PlexClient, sanitizeUrlForLogs } from '../../../src/services/catalog/PlexClient.js';
import { plexIdentitySchema } from '../../../src/validation/plexSchemas.js';
import { CatalogRequestError, ErrorCode, OperationalError } from '../../../src/errors/index.js';
import { createFakePlexHttp } from '../../helpers/fakePlexHttp.js';

jest.mock('../../../src/middleware/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const BASE_URL = 'http://plex.local:32400';

describe('sanitizeUrlForLogs', () => {
  it('should redact the token query parameter', () => {
    expect(sanitizeUrlForLogs(`${BASE_URL}/library?X-Plex-Token=test-token&type=1`)).toBe(
      `${BASE_URL}/library?X-Plex-Token=REDACTED&type=1`
    );
    expect(sanitizeUrlForLogs(`${BASE_URL}/identity`)).toBe(`${BASE_URL}/identity`);
  });
});

describe('PlexClient', () => {
  it('should send the token header and return the validated body', async () => {
    const fake = createFakePlexHttp({
      'GET /identity': { MediaContainer: { machineIdentifier: 'abc123', version: '1.40.0' } },
    });
    const client = new PlexClient({ baseUrl: `${BASE_URL}/`, token: 'test-token', httpClient: fake.http });

    const identity = await client.get('/identity', plexIdentitySchema);

    expect(client.baseUrl).toBe(BASE_URL);
    expect(identity.MediaContainer.machineIdentifier).toBe('abc123');
    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0].token).toBe('test-token');
  });

  it('should reject a body that does not match the schema', async () => {
    const fake = createFakePlexHttp({ 'GET /identity': { MediaContainer: {} } });
    const client = new PlexClient({ baseUrl: BASE_URL, token: 'test-token', httpClient: fake.http });

    const failure = client.get('/identity', plexIdentitySchema);

    await expect(failure).rejects.toBeInstanceOf(OperationalError);
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.CATALOG_INVALID_RESPONSE });
  });

  it('should turn HTTP errors into CatalogRequestError', async () => {
    const fake = createFakePlexHttp();
    const client = new PlexClient({ baseUrl: BASE_URL, token: 'test-token', httpClient: fake.http });

    const failure = client.put('/library/metadata/1/refresh');

    await expect(failure).rejects.toBeInstanceOf(CatalogRequestError);
    await expect(failure).rejects.toMatchObject({
      message: `Plex PUT ${BASE_URL}/library/metadata/1/refresh failed with HTTP 404`,
      method: 'PUT',
      httpStatusCode: 404,
      code: ErrorCode.CATALOG_REQUEST_FAILED,
      retryable: false,
    });
  });

  it('should post binary bodies as octet-stream', async () => {
    const fake = createFakePlexHttp({ 'POST /library/metadata/1/posters': '' });
    const client = new PlexClient({ baseUrl: BASE_URL, token: 'test-token', httpClient: fake.http });

    await client.post('/library/metadata/1/posters', Buffer.from('poster-bytes'));

    expect(fake.requests[0].contentType).toBe('application/octet-stream');
    expect(fake.requests[0].data).toEqual(Buffer.from('poster-bytes'));
  });
});
