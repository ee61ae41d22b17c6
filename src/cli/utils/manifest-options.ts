import { DEFAULT_ENV_PREFIX, prefixedEnvOverlay } from '../../config/env-overlay';
import { loadManifest } from '../../config/loader';
import { logger } from '../../core/logger';
import { Manifest } from '../../core/manifest/manifest';

export interface ManifestCommandOptions {
  config?: string;
  env?: string;
  debug?: boolean;
  logFile?: string;
}

/**
 * Load the manifest named by --config, with `CF_*` variables from the process
 * environment applied on top. --log-file also sends every log line, debug
 * included, to that file.
 */
export async function loadManifestForCommand(options: ManifestCommandOptions): Promise<Manifest> {
  logger.configure({ debug: options.debug, logPath: options.logFile });
  return loadManifest(options.config, {
    envOverlay: prefixedEnvOverlay(process.env, DEFAULT_ENV_PREFIX),
  });
}
