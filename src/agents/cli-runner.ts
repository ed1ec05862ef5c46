import { type ChildProcess, spawn } from 'node:child_process';
import type { AgentOutcome, AgentRunRequest, AgentRunResult, AgentRunner } from '../types/index.js';

export const PROMPT_PLACEHOLDER = '{prompt}';
const DEFAULT_KILL_GRACE_MS = 10_000;

export interface CliAgentRunnerOptions {
  command: string;
  /** Argument template; `{prompt}` is replaced by the prompt content, otherwise the prompt is appended */
  args: string[];
  /**
   * Time between SIGTERM at the deadline and SIGKILL, and how long to wait for
   * the output pipes to close once the agent itself has exited
   */
  killGraceMs?: number;
}

export function buildAgentArgs(template: readonly string[], prompt: string): string[] {
  if (!template.some((arg) => arg.includes(PROMPT_PLACEHOLDER))) {
    return [...template, prompt];
  }
  return template.map((arg) => arg.replaceAll(PROMPT_PLACEHOLDER, prompt));
}

/**
 * Signal the agent's whole process group, so processes it started in the
 * background go down with it.
 */
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    // No group left to signal; the child may still be alive on its own
    child.kill(signal);
  }
}

/**
 * Runs a non-interactive agent CLI as a child process. Stdout and stderr are
 * collected into one buffer in arrival order. Agent failures are reported
 * through the outcome, never thrown.
 *
 * The agent runs in its own process group: a terminal interrupt reaches only
 * the loop, and the deadline kills the agent along with anything it left running.
 */
export class CliAgentRunner implements AgentRunner {
  readonly name: string;
  private readonly killGraceMs: number;
  private active: ChildProcess | null = null;

  constructor(private readonly options: CliAgentRunnerOptions) {
    this.name = `cli:${options.command}`;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  /** Kill the agent in flight, if any */
  cancel(): void {
    if (this.active) {
      killGroup(this.active, 'SIGKILL');
    }
  }

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    const startTime = Date.now();
    const chunks: string[] = [];

    return new Promise<AgentRunResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;
      let drainTimer: ReturnType<typeof setTimeout> | null = null;

      const child = spawn(this.options.command, buildAgentArgs(this.options.args, request.prompt), {
        cwd: request.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
      this.active = child;

      const deadline = setTimeout(() => {
        timedOut = true;
        killGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => killGroup(child, 'SIGKILL'), this.killGraceMs);
      }, request.timeoutMs);

      const finish = (outcome: AgentOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        if (killTimer) clearTimeout(killTimer);
        if (drainTimer) clearTimeout(drainTimer);
        child.stdout.destroy();
        child.stderr.destroy();
        if (this.active === child) this.active = null;
        resolve({ outcome, output: chunks.join(''), durationMs: Date.now() - startTime });
      };

      const finishExited = (code: number | null, signal: NodeJS.Signals | null) => {
        if (timedOut) {
          finish({ kind: 'timedOut' });
        } else if (code === 0) {
          finish({ kind: 'completed' });
        } else {
          finish({
            kind: 'failed',
            exitCode: code,
            error: signal ? `Terminated by ${signal}` : undefined,
          });
        }
      };

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => chunks.push(chunk));
      child.stderr.on('data', (chunk: string) => chunks.push(chunk));

      child.on('error', (err) => {
        finish({ kind: 'failed', exitCode: null, error: err.message });
      });

      // Background processes inherit the pipes and can hold them open after the
      // agent exits; 'close' would then never come
      child.on('exit', (code, signal) => {
        drainTimer = setTimeout(() => {
          killGroup(child, 'SIGKILL');
          finishExited(code, signal);
        }, this.killGraceMs);
      });

      child.on('close', finishExited);
    });
  }
}
