import { KvNamespace, ManifestDocument } from '../../types';

export interface AccountInfoSources {
  /** account_id is supplied through the environment (e.g. CF_ACCOUNT_ID) */
  accountIdFromEnv: boolean;
  /** zone_id is supplied through the environment (e.g. CF_ZONE_ID) */
  zoneIdFromEnv: boolean;
}

export interface AccountInfoGaps {
  topLevel: string[];
  environments: Record<string, string[]>;
}

function namespaceGaps(kvNamespaces: KvNamespace[] | undefined): string[] {
  return (kvNamespaces ?? []).map((kv) => `kv-namespace ${kv.binding} needs a namespace_id`);
}

/**
 * List the fields of a freshly scaffolded manifest that still need the user's
 * own account details before it can be deployed.
 */
export function collectAccountInfoGaps(document: ManifestDocument, sources: AccountInfoSources): AccountInfoGaps {
  const topLevel: string[] = [];
  if (!sources.accountIdFromEnv) {
    topLevel.push('account_id');
  }
  topLevel.push(...namespaceGaps(document.kvNamespaces));
  if (document.route !== undefined) {
    topLevel.push('route');
  }
  if (document.zoneId !== undefined && !sources.zoneIdFromEnv) {
    topLevel.push('zone_id');
  }

  const environments: Record<string, string[]> = {};
  for (const [envName, overlay] of Object.entries(document.environments ?? {})) {
    const fields: string[] = [];
    if (overlay.accountId !== undefined && !sources.accountIdFromEnv) {
      fields.push('account_id');
    }
    fields.push(...namespaceGaps(overlay.kvNamespaces));
    if (overlay.route !== undefined) {
      fields.push('route');
    }
    if (overlay.zoneId !== undefined && !sources.zoneIdFromEnv) {
      fields.push('zone_id');
    }
    if (fields.length > 0) {
      environments[envName] = fields;
    }
  }

  return { topLevel, environments };
}
