import { z } from 'zod';
import { ExitReason } from '../types/index.js';

export const BreakerStateSchema = z.object({
  state: z.enum(['CLOSED', 'HALF_OPEN', 'OPEN']),
  consecutiveNoProgress: z.number().int().nonnegative(),
  consecutiveErrors: z.number().int().nonnegative(),
  lastTransitionReason: z.string(),
  lastTransitionTime: z.string(),
  totalOpens: z.number().int().nonnegative().default(0),
});

export const StatusSnapshotSchema = z.object({
  status: z.enum(['running', 'stopped', 'circuit_open', 'completed']),
  message: z.string(),
  loopCount: z.number().int().nonnegative(),
  consecutiveTestOnlyLoops: z.number().int().nonnegative(),
  consecutiveDoneSignalLoops: z.number().int().nonnegative(),
  timestamp: z.string(),
  exitReason: z.nativeEnum(ExitReason).nullable().default(null),
});

export const AnalysisRecordSchema = z.object({
  iteration: z.number().int().positive(),
  timestamp: z.string(),
  filesChangedCount: z.number().int().nonnegative(),
  hasError: z.boolean(),
  isTestOnly: z.boolean(),
  doneSignalCount: z.number().int().min(0).max(4),
  changedFiles: z.array(z.string()),
  errorLines: z.array(z.string()),
  doneFamilies: z.array(z.string()),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;
