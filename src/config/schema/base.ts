import { z } from 'zod';

/**
 * Base schema fragments shared by the top-level manifest and its environment overlays.
 * Keys match the raw document, not the typed model.
 */

/**
 * Empty strings are treated as "not set".
 */
export const optionalNonEmptyString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const targetKindSchema = z.enum(['javascript', 'rust', 'webpack']);

export const kvNamespaceSchema = z.object({
  id: z.string(),
  binding: z.string(),
  bucket: z.string().optional(),
});

/**
 * Site section. Strict: an unknown key here is an error, so that fields which
 * belong at the parent level are not silently swallowed.
 */
export const siteSchema = z
  .object({
    bucket: z.string().describe('Directory of static assets to upload'),
    'entry-point': z.string().optional().describe('Directory containing the site worker'),
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
  })
  .strict();

export type RawKvNamespace = z.infer<typeof kvNamespaceSchema>;
export type RawSite = z.infer<typeof siteSchema>;
