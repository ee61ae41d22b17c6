import chalk from 'chalk';
import { formatError } from '../../core/errors';
import { logger } from '../../core/logger';
import { describeTarget } from '../utils/format';
import { loadManifestForCommand, ManifestCommandOptions } from '../utils/manifest-options';

export async function targetCommand(options: ManifestCommandOptions & { json?: boolean }): Promise<void> {
  try {
    const manifest = await loadManifestForCommand(options);
    const target = manifest.effectiveTarget(options.env);

    if (options.json) {
      console.log(JSON.stringify(target, null, 2));
      return;
    }

    console.log(chalk.bold(`\nEffective target${options.env ? ` (${options.env})` : ''}\n`));
    for (const line of describeTarget(target)) {
      console.log(`  ${line}`);
    }
  } catch (error) {
    logger.error(formatError(error));
    process.exitCode = 1;
  }
}
