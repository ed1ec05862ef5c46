import { mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { LoopPhase } from '../types/index.js';
import type { AgentCallRecord, DebugEvent, DebugTracer, TraceFile } from './types.js';

class FileTracer implements DebugTracer {
  private stateDir: string;
  private debugDir = '';
  private outputsDir = '';
  private trace: TraceFile | null = null;
  private writePromise: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  async init(runId: string, promptPath: string): Promise<void> {
    this.debugDir = join(this.stateDir, 'debug', runId);
    this.outputsDir = join(this.debugDir, 'outputs');

    mkdirSync(this.outputsDir, { recursive: true });

    this.trace = {
      runId,
      promptPath,
      startedAt: new Date().toISOString(),
      completedAt: null,
      events: [],
    };

    await this.saveTrace();
  }

  async finalize(): Promise<void> {
    if (this.trace) {
      this.trace.completedAt = new Date().toISOString();
      await this.saveTrace();
    }
    if (this.writeError) {
      throw this.writeError;
    }
  }

  async logAgentCall(record: AgentCallRecord): Promise<void> {
    const prefix = `iter-${String(record.iteration).padStart(4, '0')}`;
    const promptFile = `${prefix}-prompt.txt`;
    const responseFile = `${prefix}-response.txt`;

    await writeFile(join(this.outputsDir, promptFile), record.prompt);
    await writeFile(join(this.outputsDir, responseFile), record.response);

    this.addEvent({
      type: 'agent_call',
      timestamp: new Date().toISOString(),
      iteration: record.iteration,
      promptFile: `outputs/${promptFile}`,
      responseFile: `outputs/${responseFile}`,
      outcome: record.outcome,
      durationMs: record.durationMs,
    });
  }

  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string,
    iteration?: number
  ): void {
    this.addEvent({
      type: 'decision',
      timestamp: new Date().toISOString(),
      category,
      iteration,
      input,
      outcome,
      reason,
    });
  }

  logStateTransition(from: LoopPhase, to: LoopPhase, reason: string): void {
    this.addEvent({
      type: 'state_transition',
      timestamp: new Date().toISOString(),
      from,
      to,
      reason,
    });
  }

  logError(error: string, iteration?: number, context?: Record<string, unknown>): void {
    this.addEvent({
      type: 'error',
      timestamp: new Date().toISOString(),
      error,
      iteration,
      context,
    });
  }

  private addEvent(event: DebugEvent): void {
    if (this.trace) {
      this.trace.events.push(event);
      // Save after each event for crash recovery; writes are serialized so the
      // file is never written by two writers at once. The first failure is
      // surfaced from finalize().
      this.writePromise = this.writePromise
        .then(() => this.doSaveTrace())
        .catch((err: unknown) => {
          this.writeError ??= err instanceof Error ? err : new Error(String(err));
        });
    }
  }

  private async saveTrace(): Promise<void> {
    await this.writePromise;
    await this.doSaveTrace();
  }

  private async doSaveTrace(): Promise<void> {
    if (this.trace) {
      await writeFile(join(this.debugDir, 'trace.json'), JSON.stringify(this.trace, null, 2));
    }
  }
}

export function createFileTracer(stateDir: string): DebugTracer {
  return new FileTracer(stateDir);
}
