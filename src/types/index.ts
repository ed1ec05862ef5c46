export type { AgentOutcome, AgentRunRequest, AgentRunResult, AgentRunner } from './agent.js';
export type { AnalysisEvidence, AnalysisResult, DetailedAnalysis } from './analysis.js';
export type {
  BreakerSignal,
  BreakerStateName,
  BreakerThresholds,
  CircuitBreakerState,
} from './breaker.js';
export { ExitReason } from './loop.js';
export type {
  ControllerState,
  ExitDecision,
  ExitLimits,
  LoopCounters,
  LoopPhase,
  LoopStatus,
  StatusSnapshot,
  TaskProgress,
} from './loop.js';
export { isAssistantMessage, isResultMessage } from './sdk.js';
export type { SDKAssistantMessage, SDKMessage, SDKResultMessage } from './sdk.js';
