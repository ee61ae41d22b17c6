import { formatError } from '../../core/errors';
import { logger } from '../../core/logger';
import { loadManifestForCommand, ManifestCommandOptions } from '../utils/manifest-options';

export async function nameCommand(options: ManifestCommandOptions): Promise<void> {
  try {
    const manifest = await loadManifestForCommand(options);
    console.log(manifest.effectiveName(options.env));
  } catch (error) {
    logger.error(formatError(error));
    process.exitCode = 1;
  }
}
