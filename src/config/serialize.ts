import { EnvironmentOverlay, KvNamespace, ManifestDocument, SiteConfig } from '../types';

/**
 * Convert a typed manifest document back into the raw key/value tree it was
 * parsed from. Unset optional fields are omitted, as are an empty `name` and
 * `account_id`, so that parse and serialize are inverses.
 */

function serializeKvNamespace(kv: KvNamespace): Record<string, unknown> {
  return {
    id: kv.id,
    binding: kv.binding,
    ...(kv.bucket !== undefined && { bucket: kv.bucket }),
  };
}

function serializeSite(site: SiteConfig): Record<string, unknown> {
  return {
    bucket: site.bucket,
    ...(site.entryPoint !== undefined && { 'entry-point': site.entryPoint }),
    ...(site.include !== undefined && { include: [...site.include] }),
    ...(site.exclude !== undefined && { exclude: [...site.exclude] }),
  };
}

function serializeEnvironment(env: EnvironmentOverlay): Record<string, unknown> {
  return {
    ...(env.name !== undefined && { name: env.name }),
    ...(env.accountId !== undefined && { account_id: env.accountId }),
    ...(env.zoneId !== undefined && { zone_id: env.zoneId }),
    ...(env.workersDev !== undefined && { workers_dev: env.workersDev }),
    ...(env.route !== undefined && { route: env.route }),
    ...(env.routes !== undefined && { routes: [...env.routes] }),
    ...(env.webpackConfig !== undefined && { webpack_config: env.webpackConfig }),
    ...(env.private !== undefined && { private: env.private }),
    ...(env.kvNamespaces !== undefined && { 'kv-namespaces': env.kvNamespaces.map(serializeKvNamespace) }),
  };
}

export function serializeManifest(document: ManifestDocument): Record<string, unknown> {
  const environments = document.environments;
  return {
    ...(document.name !== '' && { name: document.name }),
    type: document.targetKind,
    ...(document.accountId !== '' && { account_id: document.accountId }),
    ...(document.zoneId !== undefined && { zone_id: document.zoneId }),
    ...(document.workersDev !== undefined && { workers_dev: document.workersDev }),
    ...(document.route !== undefined && { route: document.route }),
    ...(document.routes !== undefined && { routes: [...document.routes] }),
    ...(document.webpackConfig !== undefined && { webpack_config: document.webpackConfig }),
    ...(document.private !== undefined && { private: document.private }),
    ...(document.site !== undefined && { site: serializeSite(document.site) }),
    ...(document.kvNamespaces !== undefined && {
      'kv-namespaces': document.kvNamespaces.map(serializeKvNamespace),
    }),
    ...(environments !== undefined && {
      env: Object.fromEntries(
        Object.entries(environments).map(([envName, overlay]) => [envName, serializeEnvironment(overlay)])
      ),
    }),
  };
}
