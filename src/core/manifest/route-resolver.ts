/**
 * Route Resolver
 *
 * Decides whether a set of routing fields describes a zoned deploy (bound to a
 * DNS zone through route patterns), a zoneless deploy (served from the
 * platform subdomain), or an invalid combination.
 *
 * Precedence:
 *   1. route and routes both set                     -> AmbiguousConfig
 *   2. workers_dev = true together with route(s)     -> AmbiguousConfig
 *   3. workers_dev = true                            -> zoneless
 *   4. route or non-empty routes                     -> zoned (needs zone_id and account_id)
 *   5. nothing                                       -> NoTarget, or dev-only zoneless if allowed
 */

import { RouteError } from '../errors';
import { DeployConfig, EnvironmentOverlay, ManifestDocument, RouteInputs } from '../../types';

export interface ResolveRouteOptions {
  /**
   * Accept a manifest with no deploy target as a zoneless config with
   * `workersDev: false` instead of failing with NoTarget.
   */
  allowDevOnly?: boolean;
}

export function topLevelRouteInputs(document: ManifestDocument): RouteInputs {
  return {
    accountId: document.accountId,
    zoneId: document.zoneId,
    workersDev: document.workersDev,
    route: document.route,
    routes: document.routes,
  };
}

/**
 * Routing inputs declared by an environment overlay, or undefined when the
 * overlay declares no routing field at all. Account and zone ids fall back to
 * the top-level values; the other routing fields never do.
 */
export function environmentRouteInputs(
  overlay: EnvironmentOverlay,
  fallbackAccountId: string,
  fallbackZoneId: string | undefined
): RouteInputs | undefined {
  if (overlay.workersDev === undefined && overlay.route === undefined && overlay.routes === undefined) {
    return undefined;
  }
  return {
    accountId: overlay.accountId ?? fallbackAccountId,
    zoneId: overlay.zoneId ?? fallbackZoneId,
    workersDev: overlay.workersDev,
    route: overlay.route,
    routes: overlay.routes,
  };
}

function routePatterns(inputs: RouteInputs): string[] {
  if (inputs.route !== undefined) {
    return [inputs.route];
  }
  return inputs.routes ?? [];
}

function requireAccountId(inputs: RouteInputs): string {
  if (inputs.accountId === undefined || inputs.accountId === '') {
    throw new RouteError('MissingAccountId');
  }
  return inputs.accountId;
}

export function resolveDeployConfig(
  scriptName: string,
  inputs: RouteInputs,
  options: ResolveRouteOptions = {}
): DeployConfig {
  if (inputs.route !== undefined && inputs.routes !== undefined) {
    throw new RouteError('AmbiguousConfig');
  }

  const [firstRoute, ...otherRoutes] = routePatterns(inputs);

  if (inputs.workersDev === true) {
    if (firstRoute !== undefined) {
      throw new RouteError('AmbiguousConfig');
    }
    return {
      kind: 'zoneless',
      accountId: requireAccountId(inputs),
      scriptName,
      workersDev: true,
    };
  }

  if (firstRoute !== undefined) {
    if (inputs.zoneId === undefined || inputs.zoneId === '') {
      throw new RouteError('MissingZoneId');
    }
    return {
      kind: 'zoned',
      accountId: requireAccountId(inputs),
      zoneId: inputs.zoneId,
      scriptName,
      routes: [firstRoute, ...otherRoutes],
    };
  }

  if (options.allowDevOnly) {
    return {
      kind: 'zoneless',
      accountId: inputs.accountId ?? '',
      scriptName,
      workersDev: false,
    };
  }

  throw new RouteError('NoTarget');
}
