import * as fs from 'fs-extra';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { FormatError, formatError } from '../core/errors';
import { logger } from '../core/logger';
import { Manifest, ManifestTreeOptions } from '../core/manifest/manifest';

export const DEFAULT_MANIFEST_FILE = 'worker.yaml';

export type LoadManifestOptions = ManifestTreeOptions;

function parseYamlTree(source: string, origin: string): unknown {
  try {
    return parseYaml(source);
  } catch (error) {
    throw new FormatError(`Could not parse ${origin}: ${formatError(error)}`);
  }
}

/**
 * Read a manifest from disk. Supports .yaml/.yml and .json.
 */
export async function loadManifest(configPath?: string, options: LoadManifestOptions = {}): Promise<Manifest> {
  const configFile = configPath || path.join(process.cwd(), DEFAULT_MANIFEST_FILE);

  if (!(await fs.pathExists(configFile))) {
    throw new FormatError(`Manifest file not found: ${configFile}`);
  }

  let tree: unknown;
  const extension = path.extname(configFile).toLowerCase();

  if (extension === '.yaml' || extension === '.yml') {
    tree = parseYamlTree(await fs.readFile(configFile, 'utf8'), configFile);
  } else if (extension === '.json') {
    try {
      tree = await fs.readJson(configFile);
    } catch (error) {
      throw new FormatError(`Could not parse ${configFile}: ${formatError(error)}`);
    }
  } else {
    throw new FormatError(`Unsupported manifest file format: ${configFile}`);
  }

  logger.debug(`[Loader] Read manifest from ${configFile}`);
  return Manifest.fromTree(tree, options);
}

/**
 * Build a manifest from YAML text already in memory.
 */
export function manifestFromString(source: string, options: LoadManifestOptions = {}): Manifest {
  return Manifest.fromTree(parseYamlTree(source, 'manifest source'), options);
}

