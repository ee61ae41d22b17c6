/**
 * Core type definitions for worker manifests
 */

export type TargetKind = 'javascript' | 'rust' | 'webpack';

export interface KvNamespace {
  id: string;
  binding: string;
  bucket?: string;
}

export interface SiteConfig {
  bucket: string;
  entryPoint?: string;
  include?: string[];
  exclude?: string[];
}

/**
 * Named partial override of the top-level manifest fields.
 */
export interface EnvironmentOverlay {
  name?: string;
  accountId?: string;
  zoneId?: string;
  workersDev?: boolean;
  route?: string;
  routes?: string[];
  webpackConfig?: string;
  private?: boolean;
  kvNamespaces?: KvNamespace[];
}

export interface ManifestDocument {
  name: string;
  targetKind: TargetKind;
  accountId: string;
  zoneId?: string;
  workersDev?: boolean;
  route?: string;
  routes?: string[];
  webpackConfig?: string;
  private?: boolean;
  site?: SiteConfig;
  kvNamespaces?: KvNamespace[];
  environments?: Record<string, EnvironmentOverlay>;
}

/**
 * Fully resolved build target for one environment (or the top level).
 */
export interface EffectiveTarget {
  name: string;
  targetKind: TargetKind;
  accountId: string;
  webpackConfig?: string;
  kvNamespaces?: KvNamespace[];
  site?: SiteConfig;
}

export interface RouteInputs {
  accountId?: string;
  zoneId?: string;
  workersDev?: boolean;
  route?: string;
  routes?: string[];
}

export interface ZonedDeployConfig {
  kind: 'zoned';
  accountId: string;
  zoneId: string;
  scriptName: string;
  routes: [string, ...string[]];
}

export interface ZonelessDeployConfig {
  kind: 'zoneless';
  accountId: string;
  scriptName: string;
  workersDev: boolean;
}

export type DeployConfig = ZonedDeployConfig | ZonelessDeployConfig;

export type NamePredicate = (name: string) => boolean;

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
