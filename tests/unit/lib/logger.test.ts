import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { Logger } from '../../../src/lib/logger.js';
import { ConfigWriteFailedError } from '../../../src/lib/errors/DocWikiErrors.js';
import { createTempDir, removeTempDir } from '../../helpers/temp-dir.js';

describe('Logger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const readEntries = (logDir: string): unknown[] =>
    readFileSync(join(logDir, 'docwiki.jsonl'), 'utf8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));

  it('creates the log directory on first write', () => {
    const logDir = join(dir, 'nested', 'logs');
    const logger = new Logger({ logDir, console: false });

    expect(existsSync(logDir)).toBe(false);
    logger.info('cache', 'Saved wiki cache', { bytes: 42 });

    expect(readEntries(logDir)).toEqual([
      expect.objectContaining({ level: 'info', type: 'cache', message: 'Saved wiki cache', context: { bytes: 42 } })
    ]);
  });

  it('records the code of typed errors', () => {
    const logger = new Logger({ logDir: dir, console: false });

    logger.error('config', 'Failed to update', new ConfigWriteFailedError('/tmp/embedder.json', 'EACCES'));

    expect(readEntries(dir)[0]).toMatchObject({
      level: 'error',
      error: {
        name: 'ConfigWriteFailedError',
        code: 'CONFIG_WRITE_FAILED',
        message: 'Failed to write embedding configuration /tmp/embedder.json: EACCES'
      }
    });
  });

  it('writes no file without a log directory', () => {
    const logger = new Logger({ console: false });

    logger.warn('switch', 'nothing to see');

    expect(logger.getLogFile()).toBeNull();
  });
});
