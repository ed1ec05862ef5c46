import assert from 'node:assert';
import { describe, test } from 'node:test';
import type { Options } from '@anthropic-ai/claude-agent-sdk';
import type { SDKMessage } from '../types/index.js';
import { SdkAgentRunner } from './sdk-runner.js';

const request = { prompt: 'Build the feature', timeoutMs: 50, cwd: '/work' };

function waitForAbort(options?: Options): Promise<void> {
  const signal = options?.abortController?.signal;
  assert.ok(signal, 'runner must pass an abort controller');
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

describe('SdkAgentRunner', () => {
  test('passes the prompt, working directory and model to the query', async () => {
    const seen: Array<{ prompt: string; options?: Options }> = [];
    const runner = new SdkAgentRunner({
      model: 'claude-sonnet-4-5',
      query: async function* (params): AsyncGenerator<SDKMessage> {
        seen.push(params);
      },
    });

    const result = await runner.run({ ...request, timeoutMs: 30_000 });

    assert.deepStrictEqual(result.outcome, { kind: 'completed' });
    assert.strictEqual(result.output, '');
    assert.strictEqual(seen[0].prompt, 'Build the feature');
    assert.strictEqual(seen[0].options?.cwd, '/work');
    assert.strictEqual(seen[0].options?.model, 'claude-sonnet-4-5');
    assert.strictEqual(seen[0].options?.permissionMode, 'bypassPermissions');
  });

  test('reports timedOut when the query ends quietly after the deadline', async () => {
    const runner = new SdkAgentRunner({
      query: async function* (params): AsyncGenerator<SDKMessage> {
        await waitForAbort(params.options);
      },
    });

    const result = await runner.run(request);
    assert.deepStrictEqual(result.outcome, { kind: 'timedOut' });
  });

  test('reports timedOut when the query throws after the deadline', async () => {
    const runner = new SdkAgentRunner({
      query: async function* (params): AsyncGenerator<SDKMessage> {
        await waitForAbort(params.options);
        throw new Error('Operation aborted');
      },
    });

    const result = await runner.run(request);
    assert.deepStrictEqual(result.outcome, { kind: 'timedOut' });
  });

  test('reports a query error before the deadline as failed', async () => {
    const runner = new SdkAgentRunner({
      query: async function* (): AsyncGenerator<SDKMessage> {
        throw new Error('agent process exited with code 1');
      },
    });

    const result = await runner.run({ ...request, timeoutMs: 30_000 });
    assert.deepStrictEqual(result.outcome, {
      kind: 'failed',
      exitCode: null,
      error: 'agent process exited with code 1',
    });
  });

  test('cancel aborts the query in flight', async () => {
    let started: () => void = () => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    const runner = new SdkAgentRunner({
      query: async function* (params): AsyncGenerator<SDKMessage> {
        started();
        await waitForAbort(params.options);
      },
    });

    const pending = runner.run({ ...request, timeoutMs: 30_000 });
    await running;
    runner.cancel();
    const result = await pending;
    assert.deepStrictEqual(result.outcome, { kind: 'timedOut' });
  });
});
