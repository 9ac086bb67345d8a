import { logger } from '../../middleware/logging.js';
import { CatalogConnectionError, InvalidStateError } from '../../errors/index.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import {
  plexHubSearchSchema,
  plexIdentitySchema,
  plexMetadataContainerSchema,
  plexMetadataSchema,
} from '../../validation/plexSchemas.js';
import type { CatalogEntity, CatalogService } from '../../types/catalog.js';
import { PlexClient } from './PlexClient.js';
import { PlexEntity } from './PlexEntity.js';

const SEARCH_LIMIT = 50;

/**
 * CatalogService backed by a Plex Media Server
 */
export class PlexCatalogService implements CatalogService {
  constructor(private readonly client: PlexClient) {}

  /**
   * Verify the server is reachable and the token is accepted
   *
   * @throws {CatalogConnectionError}
   */
  async connect(): Promise<void> {
    try {
      const identity = await this.client.get('/identity', plexIdentitySchema);
      logger.info('Connected to Plex', {
        baseUrl: this.client.baseUrl,
        machineIdentifier: identity.MediaContainer.machineIdentifier,
        version: identity.MediaContainer.version,
      });
    } catch (error) {
      throw new CatalogConnectionError(
        this.client.baseUrl,
        `Failed to connect to Plex at ${this.client.baseUrl}: ${getErrorMessage(error)}`,
        toError(error)
      );
    }
  }

  /**
   * Search every library, returning metadata hits in hub order
   */
  async search(query: string): Promise<CatalogEntity[]> {
    const response = await this.client.get('/hubs/search', plexHubSearchSchema, {
      query,
      limit: SEARCH_LIMIT,
    });

    const results: CatalogEntity[] = [];
    for (const hub of response.MediaContainer.Hub) {
      for (const raw of hub.Metadata) {
        const parsed = plexMetadataSchema.safeParse(raw);
        if (parsed.success) {
          results.push(new PlexEntity(this.client, parsed.data));
        }
      }
    }

    logger.debug(`Plex search "${query}" returned ${results.length} items`);
    return results;
  }

  async fetchEntity(ratingKey: string): Promise<CatalogEntity> {
    const response = await this.client.get(`/library/metadata/${ratingKey}`, plexMetadataContainerSchema);
    const [item] = response.MediaContainer.Metadata;

    if (!item) {
      throw new InvalidStateError('metadata', 'empty', `Plex returned no metadata for ${ratingKey}`);
    }

    return new PlexEntity(this.client, item, response.MediaContainer.librarySectionID);
  }
}
