import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AgentOutcome, AnalysisResult, BreakerStateName, LoopPhase } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const HISTORY_DB_FILE = 'history.db';

let db: Database.Database | null = null;

export function createDatabase(dbPath: string): Database.Database {
  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  db.exec(schema);

  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call createDatabase first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function createRun(runId: string, promptPath: string, runner: string): void {
  getDatabase()
    .prepare('INSERT INTO runs (id, prompt_path, runner) VALUES (?, ?, ?)')
    .run(runId, promptPath, runner);
}

export function finishRun(runId: string, finalPhase: LoopPhase, exitReason: string | null): void {
  getDatabase()
    .prepare(`
      UPDATE runs SET finished_at = datetime('now'), final_phase = ?, exit_reason = ? WHERE id = ?
    `)
    .run(finalPhase, exitReason, runId);
}

export interface IterationRecord {
  runId: string;
  iteration: number;
  outcome: AgentOutcome['kind'];
  durationMs: number;
  analysis: AnalysisResult;
  breakerState: BreakerStateName;
  /** `continue` or the exit reason */
  decision: string;
}

export function recordIteration(record: IterationRecord): void {
  getDatabase()
    .prepare(`
      INSERT INTO iterations (
        run_id, iteration, outcome, duration_ms, files_changed, has_error,
        is_test_only, done_signals, breaker_state, decision
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      record.runId,
      record.iteration,
      record.outcome,
      record.durationMs,
      record.analysis.filesChangedCount,
      record.analysis.hasError ? 1 : 0,
      record.analysis.isTestOnly ? 1 : 0,
      record.analysis.doneSignalCount,
      record.breakerState,
      record.decision
    );
}

const IterationRowSchema = z.object({
  run_id: z.string(),
  iteration: z.number(),
  recorded_at: z.string(),
  outcome: z.string(),
  duration_ms: z.number(),
  files_changed: z.number(),
  has_error: z.number(),
  is_test_only: z.number(),
  done_signals: z.number(),
  breaker_state: z.string(),
  decision: z.string(),
});

export type IterationRow = z.infer<typeof IterationRowSchema>;

/** Most recent iterations across all runs, oldest first */
export function getRecentIterations(limit: number): IterationRow[] {
  const rows = getDatabase()
    .prepare('SELECT * FROM iterations ORDER BY id DESC LIMIT ?')
    .all(limit);
  return z.array(IterationRowSchema).parse(rows).reverse();
}

/**
 * Where the loop records what each iteration did. Optional for the
 * controller; the SQLite-backed implementation is below.
 */
export interface IterationHistory {
  startRun(runId: string, promptPath: string, runner: string): void;
  recordIteration(record: IterationRecord): void;
  finishRun(runId: string, finalPhase: LoopPhase, exitReason: string | null): void;
}

export const sqliteHistory: IterationHistory = {
  startRun: createRun,
  recordIteration,
  finishRun,
};
