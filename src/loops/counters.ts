import type { AnalysisResult, LoopCounters } from '../types/index.js';
import { STRONG_DONE_SIGNALS } from '../exit/exit-policy.js';

export function initialCounters(): LoopCounters {
  return { loopCount: 0, consecutiveTestOnlyLoops: 0, consecutiveDoneSignalLoops: 0 };
}

/**
 * Counters after one completed iteration. Streaks reset as soon as an
 * iteration breaks them.
 */
export function advanceCounters(counters: LoopCounters, analysis: AnalysisResult): LoopCounters {
  return {
    loopCount: counters.loopCount + 1,
    consecutiveTestOnlyLoops: analysis.isTestOnly ? counters.consecutiveTestOnlyLoops + 1 : 0,
    consecutiveDoneSignalLoops:
      analysis.doneSignalCount >= STRONG_DONE_SIGNALS ? counters.consecutiveDoneSignalLoops + 1 : 0,
  };
}
