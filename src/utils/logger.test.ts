import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { createFileLogger, formatLogLine } from './logger.js';

const NOW = new Date('2026-02-03T04:05:06.000Z');

describe('formatLogLine', () => {
  test('prefixes timestamp and level', () => {
    assert.strictEqual(
      formatLogLine('WARN', 'Agent timed out', NOW),
      '[2026-02-03T04:05:06.000Z] [WARN] Agent timed out'
    );
  });
});

describe('createFileLogger', () => {
  let tempDir: string;
  let logFile: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'loopguard-log-'));
    logFile = join(tempDir, 'logs', 'loopguard.log');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('appends lines in order and creates the log directory', () => {
    const logger = createFileLogger({ logFile, now: () => NOW, echo: () => {} });
    logger.info('first');
    logger.error('second');

    assert.strictEqual(
      readFileSync(logFile, 'utf-8'),
      '[2026-02-03T04:05:06.000Z] [INFO] first\n[2026-02-03T04:05:06.000Z] [ERROR] second\n'
    );
  });

  test('echoes only when verbose', () => {
    const echoed: string[] = [];
    const quiet = createFileLogger({ logFile, now: () => NOW, echo: (l) => echoed.push(l) });
    quiet.info('hidden');
    const loud = createFileLogger({ logFile, verbose: true, now: () => NOW, echo: (l) => echoed.push(l) });
    loud.warn('shown');

    assert.deepStrictEqual(echoed, ['[WARN] shown']);
  });

  test('drops debug lines unless verbose', () => {
    const logger = createFileLogger({ logFile, now: () => NOW, echo: () => {} });
    logger.debug('noise');
    logger.info('kept');

    assert.strictEqual(readFileSync(logFile, 'utf-8'), '[2026-02-03T04:05:06.000Z] [INFO] kept\n');
  });
});
