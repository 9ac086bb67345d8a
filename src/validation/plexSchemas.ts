import { z } from 'zod';

/**
 * Plex Response Schemas
 *
 * Only the attributes the sync pipeline reads are declared; everything else
 * Plex sends is passed through untouched.
 */

/** Plex sends some identifiers as numbers and some as strings */
const idSchema = z.union([z.string(), z.number()]).transform(value => String(value));

const tagSchema = z
  .object({
    tag: z.union([z.string(), z.number()]).transform(value => String(value).trim()),
  })
  .passthrough();

const fieldLockSchema = z.object({
  name: z.string(),
  locked: z.union([z.boolean(), z.number()]).transform(value => value === true || value === 1),
});

export const plexMetadataSchema = z
  .object({
    ratingKey: idSchema,
    key: z.string().optional(),
    type: z.string().default('unknown'),
    title: z.string().default(''),
    originalTitle: z.string().optional(),
    summary: z.string().optional(),
    studio: z.string().optional(),
    originallyAvailableAt: z.string().optional(),
    year: z.number().optional(),
    contentRating: z.string().optional(),
    rating: z.number().optional(),
    index: z.number().optional(),
    parentRatingKey: idSchema.optional(),
    grandparentRatingKey: idSchema.optional(),
    parentTitle: z.string().optional(),
    grandparentTitle: z.string().optional(),
    librarySectionID: idSchema.optional(),
    librarySectionTitle: z.string().optional(),
    Genre: z.array(tagSchema).optional(),
    Country: z.array(tagSchema).optional(),
    Director: z.array(tagSchema).optional(),
    Writer: z.array(tagSchema).optional(),
    Role: z.array(tagSchema).optional(),
    Field: z.array(fieldLockSchema).optional(),
  })
  .passthrough();

export type PlexMetadata = z.infer<typeof plexMetadataSchema>;

export const plexMetadataContainerSchema = z.object({
  MediaContainer: z
    .object({
      librarySectionID: idSchema.optional(),
      librarySectionTitle: z.string().optional(),
      Metadata: z.array(plexMetadataSchema).default([]),
    })
    .passthrough(),
});

export type PlexMetadataContainer = z.infer<typeof plexMetadataContainerSchema>;

export const plexHubSearchSchema = z.object({
  MediaContainer: z
    .object({
      Hub: z
        .array(
          z
            .object({
              type: z.string().optional(),
              // validated per item, hubs can mix in entries without a ratingKey
              Metadata: z.array(z.unknown()).default([]),
            })
            .passthrough()
        )
        .default([]),
    })
    .passthrough(),
});

export const plexIdentitySchema = z.object({
  MediaContainer: z
    .object({
      machineIdentifier: z.string(),
      version: z.string().optional(),
    })
    .passthrough(),
});
