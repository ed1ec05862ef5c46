// src/debug/types.ts
import type { AgentOutcome, LoopPhase } from '../types/index.js';

export interface TraceEvent {
  type: string;
  timestamp: string;
}

export interface AgentCallEvent extends TraceEvent {
  type: 'agent_call';
  iteration: number;
  promptFile: string;
  responseFile: string;
  outcome: AgentOutcome['kind'];
  durationMs: number;
}

export interface DecisionEvent extends TraceEvent {
  type: 'decision';
  category: string;
  iteration?: number;
  input: Record<string, unknown>;
  outcome: string;
  reason: string;
}

export interface StateTransitionEvent extends TraceEvent {
  type: 'state_transition';
  from: LoopPhase;
  to: LoopPhase;
  reason: string;
}

export interface ErrorEvent extends TraceEvent {
  type: 'error';
  error: string;
  iteration?: number;
  context?: Record<string, unknown>;
}

export type DebugEvent = AgentCallEvent | DecisionEvent | StateTransitionEvent | ErrorEvent;

export interface TraceFile {
  runId: string;
  promptPath: string;
  startedAt: string;
  completedAt: string | null;
  events: DebugEvent[];
}

export interface AgentCallRecord {
  iteration: number;
  prompt: string;
  response: string;
  outcome: AgentOutcome['kind'];
  durationMs: number;
}

export interface DebugTracer {
  init(runId: string, promptPath: string): Promise<void>;
  finalize(): Promise<void>;
  logAgentCall(record: AgentCallRecord): Promise<void>;
  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string,
    iteration?: number
  ): void;
  logStateTransition(from: LoopPhase, to: LoopPhase, reason: string): void;
  logError(error: string, iteration?: number, context?: Record<string, unknown>): void;
}
