import { z, ZodError } from 'zod';
import { RunOptions } from '../config/types.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Run Options Validation Schema
 *
 * Validates the settings merged from environment config and CLI flags
 */

const extensionSchema = z
  .string()
  .trim()
  .min(1)
  .transform(ext => ext.toLowerCase().replace(/^\.+/, ''))
  .refine(ext => /^[a-z0-9]+$/.test(ext), 'Extension must be alphanumeric');

const dirNameSchema = z.string().trim().min(1).transform(dir => dir.toLowerCase());

export const runOptionsSchema = z.object({
  mode: z.enum(['unattended', 'interactive']),
  scanPath: z.string().trim().min(1, 'Scan path cannot be empty').optional(),
  dryRun: z.boolean(),
  allowUnlock: z.boolean(),
  updateArtwork: z.boolean(),
  alwaysUpdateArtwork: z.boolean(),
  delayMs: z.number().int().min(0).max(60000),
  artworkExtensions: z.array(extensionSchema),
  showRootDirs: z.array(dirNameSchema).min(1),
  movieRootDirs: z.array(dirNameSchema).min(1),
});

/**
 * Parse and normalize run options, raising ConfigurationError on the first problem
 */
export function parseRunOptions(input: unknown): RunOptions {
  try {
    const parsed = runOptionsSchema.parse(input);
    return {
      ...parsed,
      artworkExtensions: [...new Set(parsed.artworkExtensions)],
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const key = issue ? issue.path.join('.') : 'runOptions';
      throw new ConfigurationError(key, `Invalid option '${key}': ${issue?.message ?? error.message}`);
    }
    throw error;
  }
}
