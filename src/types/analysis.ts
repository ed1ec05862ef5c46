export interface AnalysisResult {
  readonly filesChangedCount: number;
  readonly hasError: boolean;
  readonly isTestOnly: boolean;
  readonly doneSignalCount: number; // 0-4, one vote per done-signal family
}

/**
 * What each pass actually matched. Kept next to the result so log lines and
 * trace decisions can say why an iteration was classified the way it was.
 */
export interface AnalysisEvidence {
  readonly changedFiles: readonly string[];
  readonly errorLines: readonly string[];
  readonly doneFamilies: readonly string[];
}

export interface DetailedAnalysis {
  result: AnalysisResult;
  evidence: AnalysisEvidence;
}
