import chalk from 'chalk';
import { formatError } from '../../core/errors';
import { logger } from '../../core/logger';
import { describeDeployConfig } from '../utils/format';
import { loadManifestForCommand, ManifestCommandOptions } from '../utils/manifest-options';

export async function deployConfigCommand(
  options: ManifestCommandOptions & { json?: boolean; allowDevOnly?: boolean }
): Promise<void> {
  try {
    const manifest = await loadManifestForCommand(options);
    const config = manifest.deployConfig(options.env, { allowDevOnly: options.allowDevOnly });

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    const [headline, ...details] = describeDeployConfig(config);
    console.log(chalk.green(`\n✓ ${headline}`));
    for (const line of details) {
      console.log(line);
    }
  } catch (error) {
    logger.error(formatError(error));
    process.exitCode = 1;
  }
}
