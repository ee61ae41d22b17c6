import { z } from 'zod';
import {
  kvNamespaceSchema,
  optionalNonEmptyString,
  siteSchema,
  targetKindSchema,
  RawKvNamespace,
  RawSite,
} from './base';
import { rawEnvironmentSchema, RawEnvironment } from './environment';
import { EnvironmentOverlay, KvNamespace, ManifestDocument, SiteConfig } from '../../types';

/**
 * Top-level manifest schema (raw document keys). Unknown top-level keys are dropped.
 */
export const rawManifestSchema = z.object({
  name: z.string().default(''),
  type: targetKindSchema,
  account_id: z.string().default(''),
  zone_id: optionalNonEmptyString,
  workers_dev: z.boolean().optional(),
  route: optionalNonEmptyString,
  routes: z.array(z.string()).optional(),
  webpack_config: z.string().optional(),
  private: z.boolean().optional(),
  site: siteSchema.optional(),
  'kv-namespaces': z.array(kvNamespaceSchema).optional(),
  env: z.record(z.string(), rawEnvironmentSchema).optional(),
});

export type RawManifest = z.infer<typeof rawManifestSchema>;

function toKvNamespace(raw: RawKvNamespace): KvNamespace {
  return {
    id: raw.id,
    binding: raw.binding,
    ...(raw.bucket !== undefined && { bucket: raw.bucket }),
  };
}

function toSite(raw: RawSite): SiteConfig {
  return {
    bucket: raw.bucket,
    ...(raw['entry-point'] !== undefined && { entryPoint: raw['entry-point'] }),
    ...(raw.include !== undefined && { include: raw.include }),
    ...(raw.exclude !== undefined && { exclude: raw.exclude }),
  };
}

function toEnvironment(raw: RawEnvironment): EnvironmentOverlay {
  const kvNamespaces = raw['kv-namespaces'];
  return {
    ...(raw.name !== undefined && { name: raw.name }),
    ...(raw.account_id !== undefined && { accountId: raw.account_id }),
    ...(raw.zone_id !== undefined && { zoneId: raw.zone_id }),
    ...(raw.workers_dev !== undefined && { workersDev: raw.workers_dev }),
    ...(raw.route !== undefined && { route: raw.route }),
    ...(raw.routes !== undefined && { routes: raw.routes }),
    ...(raw.webpack_config !== undefined && { webpackConfig: raw.webpack_config }),
    ...(raw.private !== undefined && { private: raw.private }),
    ...(kvNamespaces !== undefined && { kvNamespaces: kvNamespaces.map(toKvNamespace) }),
  };
}

export function toManifestDocument(raw: RawManifest): ManifestDocument {
  const kvNamespaces = raw['kv-namespaces'];
  const env = raw.env;
  return {
    name: raw.name,
    targetKind: raw.type,
    accountId: raw.account_id,
    ...(raw.zone_id !== undefined && { zoneId: raw.zone_id }),
    ...(raw.workers_dev !== undefined && { workersDev: raw.workers_dev }),
    ...(raw.route !== undefined && { route: raw.route }),
    ...(raw.routes !== undefined && { routes: raw.routes }),
    ...(raw.webpack_config !== undefined && { webpackConfig: raw.webpack_config }),
    ...(raw.private !== undefined && { private: raw.private }),
    ...(raw.site !== undefined && { site: toSite(raw.site) }),
    ...(kvNamespaces !== undefined && { kvNamespaces: kvNamespaces.map(toKvNamespace) }),
    ...(env !== undefined && {
      environments: Object.fromEntries(
        Object.entries(env).map(([envName, overlay]) => [envName, toEnvironment(overlay)])
      ),
    }),
  };
}

export const manifestDocumentSchema = rawManifestSchema.transform(toManifestDocument);
