/**
 * Environment overlay providers
 *
 * Scalar top-level manifest fields can be overridden from the process
 * environment, e.g. `CF_ACCOUNT_ID=abc` sets `account_id`. The resolution
 * core never reads process state; callers pass a provider instead.
 */

export interface EnvironmentOverlayProvider {
  /**
   * Raw top-level keys to override, keyed as they appear in the manifest.
   */
  overrides(): Record<string, unknown>;
}

export const DEFAULT_ENV_PREFIX = 'CF';

const OVERRIDABLE_KEYS = new Set([
  'name',
  'type',
  'account_id',
  'zone_id',
  'route',
  'workers_dev',
  'webpack_config',
  'private',
]);

const BOOLEAN_KEYS = new Set(['workers_dev', 'private']);

function coerceValue(key: string, value: string): unknown {
  if (BOOLEAN_KEYS.has(key)) {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return value;
}

/**
 * Provider reading `<PREFIX>_<KEY>` variables from the given environment map.
 * Variable names match in upper case only: `CF_ACCOUNT_ID`, not `cf_account_id`.
 */
export function prefixedEnvOverlay(
  env: Record<string, string | undefined>,
  prefix: string = DEFAULT_ENV_PREFIX
): EnvironmentOverlayProvider {
  const marker = `${prefix.toUpperCase()}_`;
  return {
    overrides(): Record<string, unknown> {
      const result: Record<string, unknown> = {};
      for (const [variable, value] of Object.entries(env)) {
        if (value === undefined || !variable.startsWith(marker)) {
          continue;
        }
        const suffix = variable.slice(marker.length);
        const key = suffix.toLowerCase();
        if (suffix === key.toUpperCase() && OVERRIDABLE_KEYS.has(key)) {
          result[key] = coerceValue(key, value);
        }
      }
      return result;
    },
  };
}

export const noEnvOverlay: EnvironmentOverlayProvider = {
  overrides: () => ({}),
};

/**
 * Apply a provider's overrides on top of a raw manifest tree. Non-object trees
 * are returned unchanged so the schema reports them.
 */
export function applyEnvOverlay(tree: unknown, provider: EnvironmentOverlayProvider): unknown {
  if (typeof tree !== 'object' || tree === null || Array.isArray(tree)) {
    return tree;
  }
  const overrides = provider.overrides();
  if (Object.keys(overrides).length === 0) {
    return tree;
  }
  return { ...tree, ...overrides };
}
