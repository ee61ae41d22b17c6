export * from './types';
export * from './core/errors';
export { Logger, logger, LogLevel, LogEntry } from './core/logger';
export { Manifest, ManifestOptions, ManifestTreeOptions } from './core/manifest/manifest';
export { findDuplicateNames, assertUniqueNames } from './core/manifest/unique-names';
export {
  resolveDeployConfig,
  topLevelRouteInputs,
  environmentRouteInputs,
  ResolveRouteOptions,
} from './core/manifest/route-resolver';
export {
  resolveEffectiveTarget,
  lookupEnvironment,
  computeWorkerName,
  TARGET_FIELD_POLICY,
  FIELD_STRATEGIES,
  InheritancePolicy,
} from './core/manifest/inheritance';
export { collectAccountInfoGaps, AccountInfoGaps, AccountInfoSources } from './core/manifest/account-info';
export { isValidWorkerName } from './core/manifest/worker-name';
export { parseManifestDocument, validateManifestDocument } from './config/schema';
export { serializeManifest } from './config/serialize';
export {
  EnvironmentOverlayProvider,
  prefixedEnvOverlay,
  noEnvOverlay,
  applyEnvOverlay,
  DEFAULT_ENV_PREFIX,
} from './config/env-overlay';
export { loadManifest, manifestFromString, DEFAULT_MANIFEST_FILE, LoadManifestOptions } from './config/loader';
