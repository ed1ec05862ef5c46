import assert from 'node:assert';
import { tmpdir } from 'node:os';
import { describe, test } from 'node:test';
import { CliAgentRunner, buildAgentArgs } from './cli-runner.js';
import { createAgentRunner } from './index.js';

const cwd = tmpdir();

function nodeRunner(args: string[]): CliAgentRunner {
  return new CliAgentRunner({ command: process.execPath, args, killGraceMs: 200 });
}

describe('buildAgentArgs', () => {
  test('replaces the placeholder', () => {
    assert.deepStrictEqual(buildAgentArgs(['-p', '{prompt}', '--json'], 'do it'), ['-p', 'do it', '--json']);
  });

  test('appends the prompt when there is no placeholder', () => {
    assert.deepStrictEqual(buildAgentArgs(['--print'], 'do it'), ['--print', 'do it']);
  });
});

describe('CliAgentRunner', () => {
  test('captures stdout of a successful run', async () => {
    const runner = nodeRunner(['-e', '{prompt}']);
    const result = await runner.run({
      prompt: 'process.stdout.write("Created src/app.py")',
      timeoutMs: 30_000,
      cwd,
    });
    assert.deepStrictEqual(result.outcome, { kind: 'completed' });
    assert.strictEqual(result.output, 'Created src/app.py');
  });

  test('merges stderr into the output', async () => {
    const runner = nodeRunner(['-e', '{prompt}']);
    const result = await runner.run({ prompt: 'process.stderr.write("warned")', timeoutMs: 30_000, cwd });
    assert.strictEqual(result.output, 'warned');
  });

  test('reports a non-zero exit as failed with its code', async () => {
    const runner = nodeRunner(['-e', '{prompt}']);
    const result = await runner.run({
      prompt: 'process.stdout.write("Error: disk full"); process.exit(3)',
      timeoutMs: 30_000,
      cwd,
    });
    assert.deepStrictEqual(result.outcome, { kind: 'failed', exitCode: 3, error: undefined });
    assert.strictEqual(result.output, 'Error: disk full');
  });

  test('kills the agent at the deadline and reports timedOut', async () => {
    const runner = nodeRunner(['-e', '{prompt}']);
    const result = await runner.run({ prompt: 'setTimeout(() => {}, 60000)', timeoutMs: 300, cwd });
    assert.deepStrictEqual(result.outcome, { kind: 'timedOut' });
  });

  test('returns at the deadline even when the agent left a background process holding its output', async () => {
    const runner = new CliAgentRunner({ command: 'sh', args: ['-c', '{prompt}'], killGraceMs: 200 });
    const startedAt = Date.now();
    const result = await runner.run({ prompt: 'echo started; sleep 6 & wait', timeoutMs: 300, cwd });

    assert.deepStrictEqual(result.outcome, { kind: 'timedOut' });
    assert.strictEqual(result.output, 'started\n');
    assert.ok(Date.now() - startedAt < 3000, `took ${Date.now() - startedAt}ms`);
  });

  test('returns soon after the agent exits even if a background process still holds its output', async () => {
    const runner = new CliAgentRunner({ command: 'sh', args: ['-c', '{prompt}'], killGraceMs: 200 });
    const startedAt = Date.now();
    const result = await runner.run({ prompt: 'echo done; sleep 6 &', timeoutMs: 30_000, cwd });

    assert.deepStrictEqual(result.outcome, { kind: 'completed' });
    assert.strictEqual(result.output, 'done\n');
    assert.ok(Date.now() - startedAt < 3000, `took ${Date.now() - startedAt}ms`);
  });

  test('cancel kills the agent in flight', async () => {
    const runner = nodeRunner(['-e', '{prompt}']);
    const pending = runner.run({
      prompt: 'process.stdout.write("working"); setTimeout(() => {}, 60000)',
      timeoutMs: 30_000,
      cwd,
    });
    await new Promise((resolve) => setTimeout(resolve, 300));
    runner.cancel();
    const result = await pending;

    assert.deepStrictEqual(result.outcome, { kind: 'failed', exitCode: null, error: 'Terminated by SIGKILL' });
  });

  test('reports a missing command as failed without throwing', async () => {
    const runner = new CliAgentRunner({ command: 'loopguard-no-such-agent', args: [] });
    const result = await runner.run({ prompt: 'hi', timeoutMs: 30_000, cwd });
    assert.strictEqual(result.outcome.kind, 'failed');
    assert.ok(result.outcome.kind === 'failed' && /ENOENT/.test(result.outcome.error ?? ''));
  });
});

describe('createAgentRunner', () => {
  test('builds the runner named in settings', () => {
    assert.strictEqual(createAgentRunner({ runner: 'cli', command: 'claude', args: [] }).name, 'cli:claude');
    assert.strictEqual(createAgentRunner({ runner: 'sdk', command: 'claude', args: [] }).name, 'sdk');
  });
});
