import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { StateFileError } from '../errors.js';
import type { CircuitBreakerState, StatusSnapshot } from '../types/index.js';
import {
  type AnalysisRecord,
  AnalysisRecordSchema,
  BreakerStateSchema,
  StatusSnapshotSchema,
} from './schema.js';

export const STATUS_FILE = 'status.json';
export const BREAKER_FILE = 'circuit-breaker.json';
export const ANALYSIS_FILE = 'analysis.json';

/**
 * Where the circuit breaker persists its state. StatusStore is the file-backed
 * implementation; tests may supply an in-memory one.
 */
export interface BreakerStore {
  readBreakerState(): Promise<CircuitBreakerState | null>;
  writeBreakerState(state: CircuitBreakerState): Promise<void>;
}

/**
 * Serialize to a sibling temp file, then rename into place. Readers polling the
 * file see either the previous or the next snapshot, never a partial write.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Read and validate a JSON state file. Returns null when the file does not exist.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.output<S> | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StateFileError(
      `State file is not valid JSON: ${filePath}`,
      filePath,
      err instanceof Error ? err : undefined
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue: z.ZodIssue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StateFileError(`State file failed validation: ${filePath} (${issues})`, filePath);
  }
  return result.data;
}

/**
 * Owns the on-disk layout of the state directory. Every write replaces the
 * whole file; nothing is appended or merged.
 */
export class StatusStore implements BreakerStore {
  readonly statusPath: string;
  readonly breakerPath: string;
  readonly analysisPath: string;

  constructor(readonly stateDir: string) {
    this.statusPath = join(stateDir, STATUS_FILE);
    this.breakerPath = join(stateDir, BREAKER_FILE);
    this.analysisPath = join(stateDir, ANALYSIS_FILE);
  }

  async writeStatus(snapshot: StatusSnapshot): Promise<void> {
    await writeJsonAtomic(this.statusPath, snapshot);
  }

  async readStatus(): Promise<StatusSnapshot | null> {
    return readJsonFile(this.statusPath, StatusSnapshotSchema);
  }

  async writeBreakerState(state: CircuitBreakerState): Promise<void> {
    await writeJsonAtomic(this.breakerPath, state);
  }

  async readBreakerState(): Promise<CircuitBreakerState | null> {
    return readJsonFile(this.breakerPath, BreakerStateSchema);
  }

  async writeAnalysis(record: AnalysisRecord): Promise<void> {
    await writeJsonAtomic(this.analysisPath, record);
  }

  async readAnalysis(): Promise<AnalysisRecord | null> {
    return readJsonFile(this.analysisPath, AnalysisRecordSchema);
  }
}
