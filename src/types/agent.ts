export type AgentOutcome =
  | { kind: 'completed' }
  | { kind: 'timedOut' }
  | { kind: 'failed'; exitCode: number | null; error?: string };

export interface AgentRunRequest {
  prompt: string;
  timeoutMs: number;
  cwd: string;
}

export interface AgentRunResult {
  outcome: AgentOutcome;
  /** Combined stdout/stderr (or assistant text), whatever was captured before the run ended */
  output: string;
  durationMs: number;
}

export interface AgentRunner {
  readonly name: string;
  run(request: AgentRunRequest): Promise<AgentRunResult>;
  /** Abandon the run in flight; its run() promise still resolves */
  cancel?(): void;
}
