import type { LoopPhase } from '../types/index.js';
import type { AgentCallRecord, DebugTracer } from './types.js';

class NoopTracer implements DebugTracer {
  async init(_runId: string, _promptPath: string): Promise<void> {}
  async finalize(): Promise<void> {}
  async logAgentCall(_record: AgentCallRecord): Promise<void> {}
  logDecision(
    _category: string,
    _input: Record<string, unknown>,
    _outcome: string,
    _reason: string,
    _iteration?: number
  ): void {}
  logStateTransition(_from: LoopPhase, _to: LoopPhase, _reason: string): void {}
  logError(_error: string, _iteration?: number, _context?: Record<string, unknown>): void {}
}

export function createNoopTracer(): DebugTracer {
  return new NoopTracer();
}
