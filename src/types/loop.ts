import type { AnalysisResult } from './analysis.js';

export enum ExitReason {
  TEST_LOOPS = 'test_loops',
  DONE_SIGNALS = 'done_signals',
  PROJECT_COMPLETE = 'project_complete',
  TASKS_COMPLETE = 'tasks_complete',
  CIRCUIT_OPEN = 'circuit_open',
  STOP_FILE = 'stop_file',
  MANUAL = 'manual',
}

export type ExitDecision = { action: 'continue' } | { action: 'stop'; reason: ExitReason };

export interface LoopCounters {
  loopCount: number;
  consecutiveTestOnlyLoops: number;
  consecutiveDoneSignalLoops: number;
}

export interface ExitLimits {
  maxTestLoops: number;
  maxDoneSignals: number;
}

export interface TaskProgress {
  total: number;
  completed: number;
}

export type LoopPhase = 'init' | 'running' | 'stopped' | 'circuit_open' | 'completed';

export type LoopStatus = 'running' | 'stopped' | 'circuit_open' | 'completed';

export interface StatusSnapshot {
  status: LoopStatus;
  message: string;
  loopCount: number;
  consecutiveTestOnlyLoops: number;
  consecutiveDoneSignalLoops: number;
  timestamp: string;
  exitReason: ExitReason | null;
}

export interface ControllerState {
  runId: string;
  phase: LoopPhase;
  counters: LoopCounters;
  lastAnalysis: AnalysisResult | null;
  exitReason: ExitReason | null;
}
