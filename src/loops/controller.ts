import { randomUUID } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { analyzeResponseDetailed } from '../analysis/analyzer.js';
import type { CircuitBreaker } from '../breaker/circuit-breaker.js';
import type { Settings } from '../config/settings.js';
import type { IterationHistory, IterationRecord } from '../db/index.js';
import type { DebugTracer } from '../debug/index.js';
import { ConfigError } from '../errors.js';
import { evaluateExitPolicy } from '../exit/exit-policy.js';
import { readTaskProgress } from '../exit/task-list.js';
import type { StopSignal } from '../state/stop-signal.js';
import type { StatusStore } from '../state/store.js';
import {
  type AgentRunResult,
  type AgentRunner,
  type ControllerState,
  ExitReason,
  type LoopStatus,
  type TaskProgress,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { advanceCounters, initialCounters } from './counters.js';

export type LoopSettings = Pick<
  Settings,
  'workDir' | 'promptFile' | 'taskListFile' | 'logDir' | 'timeoutMinutes' | 'sleepSeconds' | 'exit'
>;

export interface LoopControllerOptions {
  settings: LoopSettings;
  runner: AgentRunner;
  breaker: CircuitBreaker;
  store: StatusStore;
  stopSignal: StopSignal;
  logger: Logger;
  tracer?: DebugTracer;
  history?: IterationHistory;
  runId?: string;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

type HaltPhase = Exclude<LoopStatus, 'running'>;

function outputFileName(now: Date, iteration: number): string {
  return `agent_output_${now.toISOString().replace(/[:.]/g, '-')}_${iteration}.log`;
}

/**
 * Drives the agent loop one iteration at a time. Each tick either halts the
 * loop (stop file, operator request, open breaker, exit policy) or runs the
 * agent once and feeds the analysis into the breaker and the counters.
 */
export class LoopController {
  private readonly settings: LoopSettings;
  private readonly runner: AgentRunner;
  private readonly breaker: CircuitBreaker;
  private readonly store: StatusStore;
  private readonly stopSignal: StopSignal;
  private readonly logger: Logger;
  private readonly tracer: DebugTracer | null;
  private readonly history: IterationHistory | null;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  readonly runId: string;

  private stopRequested = false;
  private lastPrompt: string | null = null;

  constructor(options: LoopControllerOptions) {
    this.settings = options.settings;
    this.runner = options.runner;
    this.breaker = options.breaker;
    this.store = options.store;
    this.stopSignal = options.stopSignal;
    this.logger = options.logger;
    this.tracer = options.tracer ?? null;
    this.history = options.history ?? null;
    this.runId = options.runId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Operator interrupt; honoured at the top of the next tick */
  requestStop(): void {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.logger.info('Stop requested, finishing after the current iteration');
    }
  }

  async start(): Promise<ControllerState> {
    await this.breaker.load();
    this.lastPrompt = await this.readPrompt();

    const state: ControllerState = {
      runId: this.runId,
      phase: 'running',
      counters: initialCounters(),
      lastAnalysis: null,
      exitReason: null,
    };

    const history = this.history;
    if (history) {
      this.absorbSync('start the run in the history', undefined, () =>
        history.startRun(this.runId, this.settings.promptFile, this.runner.name)
      );
    }
    this.tracer?.logStateTransition('init', 'running', 'Loop started');
    this.logger.info(`Loop started (run ${this.runId}, agent ${this.runner.name})`);
    await this.writeStatus(state, 'running', 'Loop started');
    return state;
  }

  async tick(state: ControllerState): Promise<ControllerState> {
    if (state.phase !== 'running') {
      return state;
    }

    if (this.stopSignal.isRequested()) {
      await this.absorb('remove the stop file', undefined, () => this.stopSignal.clear());
      return this.halt(state, 'stopped', ExitReason.STOP_FILE, 'Stop file detected');
    }

    if (this.stopRequested) {
      return this.halt(state, 'stopped', ExitReason.MANUAL, 'Stopped by operator');
    }

    if (!this.breaker.canExecute()) {
      const reason = this.breaker.current.lastTransitionReason;
      return this.halt(state, 'circuit_open', ExitReason.CIRCUIT_OPEN, `Circuit breaker open: ${reason}`);
    }

    const iteration = state.counters.loopCount + 1;
    const prompt = await this.refreshPrompt();

    this.logger.info(`Loop #${iteration} starting`);
    const result = await this.runAgent(prompt, iteration);
    await this.saveOutput(result.output, iteration);
    const tracer = this.tracer;
    if (tracer) {
      await this.absorb('trace the agent call', iteration, () =>
        tracer.logAgentCall({
          iteration,
          prompt,
          response: result.output,
          outcome: result.outcome.kind,
          durationMs: result.durationMs,
        })
      );
    }

    // Partial output from a timed-out or failed run is analyzed like any other
    const { result: analysis, evidence } = analyzeResponseDetailed(result.output);
    this.logger.info(
      `Analysis: ${analysis.filesChangedCount} files changed, error=${analysis.hasError}, ` +
        `testOnly=${analysis.isTestOnly}, doneSignals=${analysis.doneSignalCount}`
    );
    if (evidence.errorLines.length > 0) {
      this.logger.debug(`Error lines: ${evidence.errorLines.join(' | ')}`);
    }
    if (evidence.doneFamilies.length > 0) {
      this.logger.debug(`Done signals: ${evidence.doneFamilies.join(', ')}`);
    }
    await this.absorb('write analysis.json', iteration, () =>
      this.store.writeAnalysis({
        iteration,
        timestamp: this.now().toISOString(),
        ...analysis,
        changedFiles: [...evidence.changedFiles],
        errorLines: [...evidence.errorLines],
        doneFamilies: [...evidence.doneFamilies],
      })
    );

    // The breaker advances in memory even when persisting it fails
    const previousBreakerState = this.breaker.current.state;
    await this.absorb('persist the circuit breaker', iteration, async () => {
      await this.breaker.update(analysis, iteration);
    });
    const breakerState = this.breaker.current;
    if (breakerState.state !== previousBreakerState) {
      const message = `Circuit breaker ${previousBreakerState} -> ${breakerState.state}: ${breakerState.lastTransitionReason}`;
      if (breakerState.state === 'OPEN') {
        this.logger.warn(message);
      } else {
        this.logger.info(message);
      }
    }

    const counters = advanceCounters(state.counters, analysis);
    const tasks = await this.readTasks();
    const evaluation = evaluateExitPolicy(
      { analysis, counters, tasks, limits: this.settings.exit },
      this.tracer ?? undefined
    );
    const decision = evaluation.decision;

    this.recordHistory({
      runId: this.runId,
      iteration,
      outcome: result.outcome.kind,
      durationMs: result.durationMs,
      analysis,
      breakerState: breakerState.state,
      decision: decision.action === 'stop' ? decision.reason : 'continue',
    });

    const next: ControllerState = { ...state, counters, lastAnalysis: analysis };

    if (decision.action === 'stop') {
      this.logger.success(`Exiting: ${evaluation.reason}`);
      return this.halt(next, 'completed', decision.reason, `Exit reason: ${decision.reason}`);
    }

    await this.writeStatus(next, 'running', `Loop ${iteration} completed`);
    return next;
  }

  /**
   * Tick until the loop leaves the running phase, sleeping between iterations.
   * Iterations never overlap.
   */
  async run(): Promise<ControllerState> {
    let state = await this.start();
    while (state.phase === 'running') {
      state = await this.tick(state);
      if (state.phase === 'running') {
        await this.sleep(this.settings.sleepSeconds * 1000);
      }
    }
    const history = this.history;
    if (history) {
      const { phase, exitReason } = state;
      this.absorbSync('finish the run in the history', undefined, () => history.finishRun(this.runId, phase, exitReason));
    }
    return state;
  }

  private async halt(
    state: ControllerState,
    phase: HaltPhase,
    reason: ExitReason,
    message: string
  ): Promise<ControllerState> {
    const next: ControllerState = { ...state, phase, exitReason: reason };
    this.tracer?.logStateTransition(state.phase, phase, message);
    if (phase === 'circuit_open') {
      this.logger.warn(message);
    } else {
      this.logger.info(message);
    }
    await this.writeStatus(next, phase, message);
    return next;
  }

  private async writeStatus(state: ControllerState, status: LoopStatus, message: string): Promise<void> {
    await this.absorb('write status.json', undefined, () =>
      this.store.writeStatus({
        status,
        message,
        loopCount: state.counters.loopCount,
        consecutiveTestOnlyLoops: state.counters.consecutiveTestOnlyLoops,
        consecutiveDoneSignalLoops: state.counters.consecutiveDoneSignalLoops,
        timestamp: this.now().toISOString(),
        exitReason: state.exitReason,
      })
    );
  }

  /** Per-iteration side effects log their failure and let the loop go on */
  private async absorb(what: string, iteration: number | undefined, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      this.reportFailure(what, iteration, err);
    }
  }

  private absorbSync(what: string, iteration: number | undefined, action: () => void): void {
    try {
      action();
    } catch (err) {
      this.reportFailure(what, iteration, err);
    }
  }

  private reportFailure(what: string, iteration: number | undefined, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(`Could not ${what}: ${message}`);
    this.tracer?.logError(message, iteration, { step: what });
  }

  private async readPrompt(): Promise<string> {
    try {
      return await readFile(this.settings.promptFile, 'utf-8');
    } catch (err) {
      throw new ConfigError(
        `Cannot read prompt file ${this.settings.promptFile}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  /** Re-read the prompt so edits between iterations take effect */
  private async refreshPrompt(): Promise<string> {
    try {
      this.lastPrompt = await this.readPrompt();
      return this.lastPrompt;
    } catch (err) {
      if (this.lastPrompt === null) throw err;
      this.logger.warn(`${err instanceof Error ? err.message : String(err)}; reusing the previous prompt`);
      return this.lastPrompt;
    }
  }

  private async runAgent(prompt: string, iteration: number): Promise<AgentRunResult> {
    const timeoutMs = this.settings.timeoutMinutes * 60_000;
    let result: AgentRunResult;
    try {
      result = await this.runner.run({ prompt, timeoutMs, cwd: this.settings.workDir });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.tracer?.logError(message, iteration, { runner: this.runner.name });
      result = { outcome: { kind: 'failed', exitCode: null, error: message }, output: '', durationMs: 0 };
    }

    const seconds = (result.durationMs / 1000).toFixed(1);
    switch (result.outcome.kind) {
      case 'completed':
        this.logger.info(`Agent finished in ${seconds}s`);
        break;
      case 'timedOut':
        this.logger.warn(`Agent timed out after ${this.settings.timeoutMinutes} minutes`);
        break;
      case 'failed': {
        const code = result.outcome.exitCode === null ? '' : ` with exit code ${result.outcome.exitCode}`;
        const detail = result.outcome.error ? `: ${result.outcome.error}` : '';
        this.logger.error(`Agent failed${code}${detail}`);
        break;
      }
    }
    return result;
  }

  private async saveOutput(output: string, iteration: number): Promise<void> {
    const filePath = join(this.settings.logDir, outputFileName(this.now(), iteration));
    await this.absorb(`save agent output to ${filePath}`, iteration, async () => {
      await mkdir(this.settings.logDir, { recursive: true });
      await writeFile(filePath, output, 'utf-8');
    });
  }

  private async readTasks(): Promise<TaskProgress | null> {
    try {
      return await readTaskProgress(this.settings.taskListFile);
    } catch (err) {
      this.logger.warn(`Could not read task list: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  private recordHistory(record: IterationRecord): void {
    const history = this.history;
    if (!history) return;
    this.absorbSync('record iteration history', record.iteration, () => history.recordIteration(record));
  }
}

/** Process exit code for a finished run */
export function getExitCode(state: ControllerState): number {
  switch (state.phase) {
    case 'completed':
    case 'stopped':
      return 0;
    case 'circuit_open':
      return 2;
    default:
      return 1;
  }
}
