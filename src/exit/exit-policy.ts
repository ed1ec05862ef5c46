import type { DebugTracer } from '../debug/index.js';
import {
  type AnalysisResult,
  type ExitDecision,
  type ExitLimits,
  ExitReason,
  type LoopCounters,
  type TaskProgress,
} from '../types/index.js';

export const DEFAULT_EXIT_LIMITS: ExitLimits = {
  maxTestLoops: 3,
  maxDoneSignals: 2,
};

/** Done signals needed in one iteration for it to count as a strong completion claim */
export const STRONG_DONE_SIGNALS = 2;

export interface ExitPolicyInput {
  analysis: AnalysisResult;
  counters: LoopCounters;
  tasks: TaskProgress | null;
  limits?: ExitLimits;
}

export interface ExitEvaluation {
  decision: ExitDecision;
  reason: string;
}

/**
 * Decide whether the loop should stop after this iteration. Conditions are
 * checked in a fixed order and the first match wins: the consecutive-iteration
 * rules come before the single-iteration done-signal rule, so a loop that has
 * been flapping is reported as such rather than as a clean completion.
 */
export function evaluateExitPolicy(input: ExitPolicyInput, tracer?: DebugTracer): ExitEvaluation {
  const { analysis, counters, tasks } = input;
  const limits = input.limits ?? DEFAULT_EXIT_LIMITS;

  const evaluation = ((): ExitEvaluation => {
    if (counters.consecutiveTestOnlyLoops >= limits.maxTestLoops) {
      return {
        decision: { action: 'stop', reason: ExitReason.TEST_LOOPS },
        reason: `${counters.consecutiveTestOnlyLoops} consecutive test-only loops`,
      };
    }

    if (counters.consecutiveDoneSignalLoops >= limits.maxDoneSignals) {
      return {
        decision: { action: 'stop', reason: ExitReason.DONE_SIGNALS },
        reason: `${counters.consecutiveDoneSignalLoops} consecutive done signals`,
      };
    }

    if (analysis.doneSignalCount >= STRONG_DONE_SIGNALS) {
      return {
        decision: { action: 'stop', reason: ExitReason.PROJECT_COMPLETE },
        reason: `Strong completion indicators (${analysis.doneSignalCount})`,
      };
    }

    if (tasks && tasks.total > 0 && tasks.completed === tasks.total) {
      return {
        decision: { action: 'stop', reason: ExitReason.TASKS_COMPLETE },
        reason: `All ${tasks.total} tasks in the task list complete`,
      };
    }

    return { decision: { action: 'continue' }, reason: 'No exit condition met' };
  })();

  tracer?.logDecision(
    'exit_policy',
    {
      consecutiveTestOnlyLoops: counters.consecutiveTestOnlyLoops,
      consecutiveDoneSignalLoops: counters.consecutiveDoneSignalLoops,
      doneSignalCount: analysis.doneSignalCount,
      tasksTotal: tasks?.total ?? null,
      tasksCompleted: tasks?.completed ?? null,
    },
    evaluation.decision.action === 'stop' ? evaluation.decision.reason : 'continue',
    evaluation.reason,
    counters.loopCount
  );

  return evaluation;
}
