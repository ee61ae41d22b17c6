import { z } from 'zod';
import { kvNamespaceSchema, optionalNonEmptyString } from './base';

/**
 * Environment overlay schema. Overlays cannot declare a site; unknown keys are dropped.
 */
export const rawEnvironmentSchema = z.object({
  name: z.string().optional().describe('Explicit worker name for this environment'),
  account_id: z.string().optional(),
  zone_id: optionalNonEmptyString,
  workers_dev: z.boolean().optional(),
  route: optionalNonEmptyString,
  routes: z.array(z.string()).optional(),
  webpack_config: z.string().optional(),
  private: z.boolean().optional(),
  'kv-namespaces': z.array(kvNamespaceSchema).optional(),
});

export type RawEnvironment = z.infer<typeof rawEnvironmentSchema>;
