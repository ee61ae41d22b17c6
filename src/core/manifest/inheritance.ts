/**
 * Inheritance Resolver
 *
 * Builds the effective target for one environment from the top-level manifest
 * and the selected overlay. Each target field has exactly one policy:
 *
 *   must-inherit      always the top-level value
 *   may-override      overlay value when set, otherwise the top-level value
 *   must-not-inherit  overlay value (possibly absent); never the top-level value
 *   top-level-only    only ever the top-level value; overlays cannot declare it
 *   computed          derived from both (the worker name)
 */

import { LookupError } from '../errors';
import { EffectiveTarget, EnvironmentOverlay, KvNamespace, ManifestDocument, SiteConfig } from '../../types';

export type InheritancePolicy = 'must-inherit' | 'may-override' | 'must-not-inherit' | 'top-level-only' | 'computed';

export const TARGET_FIELD_POLICY = {
  targetKind: 'must-inherit',
  accountId: 'may-override',
  webpackConfig: 'may-override',
  name: 'computed',
  kvNamespaces: 'must-not-inherit',
  site: 'top-level-only',
} as const satisfies Record<keyof EffectiveTarget, InheritancePolicy>;

export interface InheritanceContext {
  document: ManifestDocument;
  /**
   * Present only when an environment was requested and found.
   */
  environment?: { name: string; overlay: EnvironmentOverlay };
}

type FieldStrategy<K extends keyof EffectiveTarget> = (context: InheritanceContext) => EffectiveTarget[K];

/**
 * Look up an overlay by name. No name means "top level" and yields undefined.
 */
export function lookupEnvironment(
  document: ManifestDocument,
  environmentName: string | undefined
): EnvironmentOverlay | undefined {
  if (environmentName === undefined) {
    return undefined;
  }
  const environments = document.environments;
  if (environments === undefined || Object.keys(environments).length === 0) {
    throw new LookupError('NoEnvironmentsDefined', environmentName);
  }
  if (!Object.prototype.hasOwnProperty.call(environments, environmentName)) {
    throw new LookupError('UnknownEnvironment', environmentName);
  }
  return environments[environmentName];
}

export function computeWorkerName(document: ManifestDocument, environment?: InheritanceContext['environment']): string {
  if (!environment) {
    return document.name;
  }
  return environment.overlay.name ?? `${document.name}-${environment.name}`;
}

// Targets hand out copies so callers cannot reach into the document
function copyKvNamespaces(kvNamespaces: KvNamespace[] | undefined): KvNamespace[] | undefined {
  return kvNamespaces?.map((kv) => ({ ...kv }));
}

function copySite(site: SiteConfig | undefined): SiteConfig | undefined {
  if (site === undefined) {
    return undefined;
  }
  return {
    ...site,
    ...(site.include !== undefined && { include: [...site.include] }),
    ...(site.exclude !== undefined && { exclude: [...site.exclude] }),
  };
}

export const FIELD_STRATEGIES: { [K in keyof EffectiveTarget]-?: FieldStrategy<K> } = {
  // Site projects always build with webpack, whatever the manifest says
  targetKind: ({ document }) => (document.site !== undefined ? 'webpack' : document.targetKind),
  accountId: ({ document, environment }) => environment?.overlay.accountId ?? document.accountId,
  webpackConfig: ({ document, environment }) => environment?.overlay.webpackConfig ?? document.webpackConfig,
  name: ({ document, environment }) => computeWorkerName(document, environment),
  // Sharing namespaces between environments is not allowed
  kvNamespaces: ({ document, environment }) =>
    copyKvNamespaces(environment ? environment.overlay.kvNamespaces : document.kvNamespaces),
  site: ({ document }) => copySite(document.site),
};

export function resolveEffectiveTarget(document: ManifestDocument, environmentName?: string): EffectiveTarget {
  const overlay = lookupEnvironment(document, environmentName);
  const context: InheritanceContext = {
    document,
    ...(overlay !== undefined && environmentName !== undefined && {
      environment: { name: environmentName, overlay },
    }),
  };

  const webpackConfig = FIELD_STRATEGIES.webpackConfig(context);
  const kvNamespaces = FIELD_STRATEGIES.kvNamespaces(context);
  const site = FIELD_STRATEGIES.site(context);

  return {
    name: FIELD_STRATEGIES.name(context),
    targetKind: FIELD_STRATEGIES.targetKind(context),
    accountId: FIELD_STRATEGIES.accountId(context),
    ...(webpackConfig !== undefined && { webpackConfig }),
    ...(kvNamespaces !== undefined && { kvNamespaces }),
    ...(site !== undefined && { site }),
  };
}
