/**
 * Logger Tests
 *
 * Buffered entries and the --log-file output of the command helpers.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../src/core/logger';
import { loadManifestForCommand } from '../src/cli/utils/manifest-options';

const fixture = (name: string): string => path.join(__dirname, 'fixtures', name);

describe('Logger', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'worker-manifest-log-'));
    logger.clearBuffer();
  });

  afterEach(async () => {
    logger.configure({});
    await fs.remove(tmpDir);
  });

  it('should buffer debug entries without a log file', async () => {
    logger.configure({});
    await loadManifestForCommand({ config: fixture('default.yaml') });

    expect(logger.getLogPath()).toBeNull();
    expect(logger.getBuffer().map((entry) => [entry.level, entry.message])).toEqual([
      ['debug', `[Loader] Read manifest from ${fixture('default.yaml')}`],
      ['debug', '[Manifest] Parsed manifest "test-worker" with 0 environment(s)'],
    ]);
  });

  it('should write loader and manifest debug lines to the --log-file path', async () => {
    const logFile = path.join(tmpDir, 'logs', 'worker-manifest.log');
    await loadManifestForCommand({ config: fixture('default.yaml'), logFile });

    expect(logger.getLogPath()).toBe(logFile);
    const lines = (await fs.readFile(logFile, 'utf8')).split('\n');
    expect(lines).toContain('Debug mode: false');
    expect(lines.some((line) => line.startsWith('worker-manifest session started: '))).toBe(true);
    expect(lines.some((line) => line.endsWith(`[DEBUG] [Loader] Read manifest from ${fixture('default.yaml')}`))).toBe(
      true
    );
    expect(
      lines.some((line) => line.endsWith('[DEBUG] [Manifest] Parsed manifest "test-worker" with 0 environment(s)'))
    ).toBe(true);
  });
});
