import assert from 'node:assert';
import { existsSync, mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { createTracer } from './index.js';
import { createFileTracer } from './file-tracer.js';
import { createNoopTracer } from './noop-tracer.js';

describe('NoopTracer', () => {
  test('all methods are callable without error', async () => {
    const tracer = createNoopTracer();

    await tracer.init('run-1', 'PROMPT.md');
    await tracer.logAgentCall({
      iteration: 1,
      prompt: 'test',
      response: 'test',
      outcome: 'completed',
      durationMs: 1000,
    });
    tracer.logDecision('exit_policy', {}, 'continue', 'no exit condition met', 1);
    tracer.logStateTransition('init', 'running', 'Loop started');
    tracer.logError('boom', 1);
    await tracer.finalize();

    assert.ok(true, 'All methods completed without error');
  });
});

describe('FileTracer', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'loopguard-debug-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test('creates trace file on init', async () => {
    const tracer = createFileTracer(testDir);
    await tracer.init('run-123', '/path/to/PROMPT.md');

    const traceDir = join(testDir, 'debug', 'run-123');
    assert.ok(existsSync(join(traceDir, 'trace.json')), 'Trace file created');

    await tracer.finalize();
  });

  test('records decisions and transitions in order', async () => {
    const tracer = createFileTracer(testDir);
    await tracer.init('run-456', 'PROMPT.md');

    tracer.logStateTransition('init', 'running', 'Loop started');
    tracer.logDecision('circuit_breaker', { filesChangedCount: 0 }, 'CLOSED', 'No change', 1);

    await tracer.finalize();

    const trace = JSON.parse(await readFile(join(testDir, 'debug', 'run-456', 'trace.json'), 'utf-8'));

    assert.strictEqual(trace.runId, 'run-456');
    assert.strictEqual(trace.events.length, 2);
    assert.strictEqual(trace.events[0].type, 'state_transition');
    assert.strictEqual(trace.events[1].type, 'decision');
    assert.strictEqual(trace.events[1].outcome, 'CLOSED');
    assert.ok(trace.completedAt);
  });

  test('writes agent prompt and response to separate files', async () => {
    const tracer = createFileTracer(testDir);
    await tracer.init('run-789', 'PROMPT.md');

    await tracer.logAgentCall({
      iteration: 3,
      prompt: 'x'.repeat(10000),
      response: 'y'.repeat(10000),
      outcome: 'timedOut',
      durationMs: 5000,
    });

    await tracer.finalize();

    const outputsDir = join(testDir, 'debug', 'run-789', 'outputs');
    assert.deepStrictEqual(readdirSync(outputsDir).sort(), [
      'iter-0003-prompt.txt',
      'iter-0003-response.txt',
    ]);
  });
});

describe('createTracer', () => {
  test('returns a tracer that writes nothing when debug is off', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'loopguard-debug-off-'));
    const tracer = createTracer(false, dir);
    await tracer.init('run-x', 'PROMPT.md');
    await tracer.finalize();
    assert.strictEqual(existsSync(join(dir, 'debug')), false);
    rmSync(dir, { recursive: true, force: true });
  });
});
