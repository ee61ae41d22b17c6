import { assertNever, DeployConfig, EffectiveTarget } from '../../types';

export function describeDeployConfig(config: DeployConfig): string[] {
  switch (config.kind) {
    case 'zoned':
      return [
        `Zoned deploy of ${config.scriptName}`,
        `  account_id: ${config.accountId}`,
        `  zone_id: ${config.zoneId}`,
        ...config.routes.map((route) => `  route: ${route}`),
      ];
    case 'zoneless':
      return [
        `Zoneless deploy of ${config.scriptName}`,
        `  account_id: ${config.accountId}`,
        `  workers_dev: ${config.workersDev}`,
      ];
    default:
      return assertNever(config);
  }
}

export function describeTarget(target: EffectiveTarget): string[] {
  const lines = [
    `name: ${target.name}`,
    `type: ${target.targetKind}`,
    `account_id: ${target.accountId || '(not set)'}`,
  ];
  if (target.webpackConfig !== undefined) {
    lines.push(`webpack_config: ${target.webpackConfig}`);
  }
  if (target.site !== undefined) {
    lines.push(`site bucket: ${target.site.bucket}`);
  }
  const kvNamespaces = target.kvNamespaces ?? [];
  lines.push(`kv-namespaces: ${kvNamespaces.length === 0 ? '(none)' : kvNamespaces.map((kv) => kv.binding).join(', ')}`);
  return lines;
}
