import chalk from 'chalk';
import { formatError } from '../../core/errors';
import { logger } from '../../core/logger';
import { collectAccountInfoGaps } from '../../core/manifest/account-info';
import { Manifest } from '../../core/manifest/manifest';
import { loadManifestForCommand, ManifestCommandOptions } from '../utils/manifest-options';

/**
 * Resolve the top level and every environment. With --template, also list the
 * fields a template leaves for the user to fill in.
 */
export async function checkCommand(options: ManifestCommandOptions & { template?: boolean }): Promise<void> {
  try {
    const manifest = await loadManifestForCommand(options);
    const environmentNames = [undefined, ...Object.keys(manifest.document.environments ?? {})];
    let failures = 0;

    for (const envName of environmentNames) {
      const label = envName ?? '(top level)';
      try {
        manifest.effectiveTarget(envName);
        manifest.deployConfig(envName);
        console.log(chalk.green(`✓ ${label}: ${manifest.effectiveName(envName)}`));
      } catch (error) {
        failures++;
        console.log(chalk.red(`✗ ${label}: ${formatError(error)}`));
      }
    }

    if (options.template) {
      reportAccountInfoGaps(manifest);
    }

    if (failures > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error(formatError(error));
    process.exitCode = 1;
  }
}

function reportAccountInfoGaps(manifest: Manifest): void {
  const gaps = collectAccountInfoGaps(manifest.document, {
    accountIdFromEnv: process.env.CF_ACCOUNT_ID !== undefined,
    zoneIdFromEnv: process.env.CF_ZONE_ID !== undefined,
  });
  const envGaps = Object.entries(gaps.environments);
  if (gaps.topLevel.length > 0 || envGaps.length > 0) {
    logger.warn('The following fields need your account details before deploying:');
    for (const field of gaps.topLevel) {
      console.log(`- ${field}`);
    }
    for (const [envName, fields] of envGaps) {
      console.log(`[env.${envName}]`);
      for (const field of fields) {
        console.log(`  - ${field}`);
      }
    }
  }
}
