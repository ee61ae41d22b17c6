/**
 * Manifest Facade
 *
 * Holds one immutable manifest document and answers the per-environment
 * queries: effective worker name, effective build target, and deploy config.
 * Duplicate worker names are rejected once, at construction.
 */

import { applyEnvOverlay, EnvironmentOverlayProvider, noEnvOverlay } from '../../config/env-overlay';
import { parseManifestDocument } from '../../config/schema';
import { serializeManifest } from '../../config/serialize';
import { InvalidNameError, LookupError, RouteError } from '../errors';
import { logger } from '../logger';
import { computeWorkerName, lookupEnvironment, resolveEffectiveTarget } from './inheritance';
import { environmentRouteInputs, resolveDeployConfig, ResolveRouteOptions, topLevelRouteInputs } from './route-resolver';
import { assertUniqueNames } from './unique-names';
import { isValidWorkerName } from './worker-name';
import { assertNever, DeployConfig, EffectiveTarget, ManifestDocument, NamePredicate } from '../../types';

export interface ManifestOptions {
  /**
   * Worker name check applied before a deploy config is built.
   */
  isValidName?: NamePredicate;
}

export interface ManifestTreeOptions extends ManifestOptions {
  /**
   * Overrides for top-level scalar fields, applied before parsing.
   */
  envOverlay?: EnvironmentOverlayProvider;
}

export class Manifest {
  private readonly isValidName: NamePredicate;

  private constructor(
    public readonly document: Readonly<ManifestDocument>,
    options: ManifestOptions
  ) {
    this.isValidName = options.isValidName ?? isValidWorkerName;
  }

  /**
   * The manifest keeps its own copy of the document; later changes to the
   * caller's object are not seen.
   */
  static fromDocument(document: ManifestDocument, options: ManifestOptions = {}): Manifest {
    const owned = structuredClone(document);
    assertUniqueNames(owned);
    return new Manifest(owned, options);
  }

  /**
   * Parse a generic key/value tree (as produced by a YAML or JSON parser).
   */
  static fromTree(tree: unknown, options: ManifestTreeOptions = {}): Manifest {
    const merged = applyEnvOverlay(tree, options.envOverlay ?? noEnvOverlay);
    const document = parseManifestDocument(merged);
    logger.debug(
      `[Manifest] Parsed manifest "${document.name}" with ${Object.keys(document.environments ?? {}).length} environment(s)`
    );
    return Manifest.fromDocument(document, options);
  }

  /**
   * Effective worker name for an environment. Falls back to the top-level name
   * when the environment cannot be found.
   */
  effectiveName(environmentName?: string): string {
    try {
      const overlay = lookupEnvironment(this.document, environmentName);
      if (overlay === undefined || environmentName === undefined) {
        return this.document.name;
      }
      return computeWorkerName(this.document, { name: environmentName, overlay });
    } catch (error) {
      if (error instanceof LookupError) {
        logger.debug(`[Manifest] ${error.message}; using top-level name`);
        return this.document.name;
      }
      throw error;
    }
  }

  effectiveTarget(environmentName?: string): EffectiveTarget {
    return resolveEffectiveTarget(this.document, environmentName);
  }

  deployConfig(environmentName?: string, options: ResolveRouteOptions = {}): DeployConfig {
    const scriptName = this.effectiveName(environmentName);
    if (!this.isValidName(scriptName)) {
      throw new InvalidNameError(scriptName);
    }

    const overlay = lookupEnvironment(this.document, environmentName);
    const topLevelInputs = topLevelRouteInputs(this.document);

    if (overlay === undefined) {
      return resolveDeployConfig(scriptName, topLevelInputs, options);
    }

    const environmentInputs = environmentRouteInputs(overlay, this.document.accountId, this.document.zoneId);
    if (environmentInputs !== undefined) {
      logger.debug(`[Manifest] Using routing fields from environment "${environmentName}"`);
      return resolveDeployConfig(scriptName, environmentInputs, options);
    }

    // The overlay declares no routing; reuse the top level only when it is zoneless
    const topLevelConfig = resolveDeployConfig(scriptName, topLevelInputs, options);
    switch (topLevelConfig.kind) {
      case 'zoned':
        throw new RouteError('EnvironmentRouteRequired');
      case 'zoneless':
        return topLevelConfig;
      default:
        return assertNever(topLevelConfig);
    }
  }

  serialize(): Record<string, unknown> {
    return serializeManifest(this.document);
  }
}
