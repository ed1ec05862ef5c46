import { type Options, query } from '@anthropic-ai/claude-agent-sdk';
import { isAssistantMessage, isResultMessage } from '../types/index.js';
import type { AgentOutcome, AgentRunRequest, AgentRunResult, AgentRunner, SDKMessage } from '../types/index.js';

export type QueryFn = (params: { prompt: string; options?: Options }) => AsyncIterable<SDKMessage>;

export interface SdkAgentRunnerOptions {
  model?: string;
  /** Emergency backstop; the deadline is the real limit */
  maxTurns?: number;
  query?: QueryFn;
}

/**
 * Runs the prompt in-process through the Claude Agent SDK. The transcript the
 * analyzer sees is the assistant's text blocks joined by newlines.
 */
export class SdkAgentRunner implements AgentRunner {
  readonly name = 'sdk';
  private readonly query: QueryFn;
  private active: AbortController | null = null;

  constructor(private readonly options: SdkAgentRunnerOptions = {}) {
    this.query = options.query ?? query;
  }

  cancel(): void {
    this.active?.abort();
  }

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    const startTime = Date.now();
    const abortController = new AbortController();
    this.active = abortController;
    const deadline = setTimeout(() => abortController.abort(), request.timeoutMs);
    const texts: string[] = [];
    let outcome: AgentOutcome = { kind: 'completed' };

    try {
      for await (const message of this.query({
        prompt: request.prompt,
        options: {
          cwd: request.cwd,
          model: this.options.model,
          maxTurns: this.options.maxTurns ?? 10_000,
          permissionMode: 'bypassPermissions',
          abortController,
        },
      })) {
        if (isAssistantMessage(message)) {
          for (const block of message.message.content) {
            if ('text' in block && typeof block.text === 'string') {
              texts.push(block.text);
            }
          }
        }
        if (isResultMessage(message) && message.subtype !== 'success') {
          outcome = { kind: 'failed', exitCode: null, error: message.subtype };
        }
      }
    } catch (err) {
      if (!abortController.signal.aborted) {
        outcome = { kind: 'failed', exitCode: null, error: err instanceof Error ? err.message : String(err) };
      }
    } finally {
      clearTimeout(deadline);
      if (this.active === abortController) this.active = null;
    }

    // The query may end quietly instead of throwing once aborted
    if (abortController.signal.aborted) {
      outcome = { kind: 'timedOut' };
    }

    return { outcome, output: texts.join('\n'), durationMs: Date.now() - startTime };
  }
}
