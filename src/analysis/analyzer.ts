import type { AnalysisResult, DetailedAnalysis } from '../types/index.js';
import {
  BENIGN_ERROR_RULES,
  DONE_SIGNAL_RULES,
  ERROR_CANDIDATE_RULE,
  FILE_CHANGE_RULE,
  IMPLEMENTATION_RULE,
  TEST_RUN_RULE,
  firstMatchingRule,
  matchesRule,
} from './rules.js';

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Distinct paths named on "<verb> ... <path>.<ext>" lines. A path that is
 * created and then modified in the same response counts once.
 */
export function findChangedFiles(lines: readonly string[]): string[] {
  const paths = new Set<string>();
  for (const line of lines) {
    const match = line.trimEnd().match(FILE_CHANGE_RULE.pattern);
    if (match?.[1]) {
      paths.add(match[1]);
    }
  }
  return [...paths];
}

/** Stage 1: every line using error vocabulary */
export function collectErrorCandidates(lines: readonly string[]): string[] {
  return lines.filter((line) => matchesRule(ERROR_CANDIDATE_RULE, line));
}

/** Stage 2: drop candidates matching a known-benign rule */
export function filterBenignErrors(candidates: readonly string[]): string[] {
  return candidates.filter((line) => firstMatchingRule(BENIGN_ERROR_RULES, line) === null);
}

export function isTestOnlyResponse(text: string): boolean {
  return matchesRule(TEST_RUN_RULE, text) && !matchesRule(IMPLEMENTATION_RULE, text);
}

/** Names of the done-signal families present in the text; each family votes once */
export function matchDoneFamilies(text: string): string[] {
  return DONE_SIGNAL_RULES.filter((rule) => matchesRule(rule, text)).map((rule) => rule.name);
}

export function analyzeResponseDetailed(rawText: string): DetailedAnalysis {
  const lines = splitLines(rawText);

  const changedFiles = findChangedFiles(lines);
  const errorLines = filterBenignErrors(collectErrorCandidates(lines));
  const doneFamilies = matchDoneFamilies(rawText);

  const result: AnalysisResult = Object.freeze({
    filesChangedCount: changedFiles.length,
    hasError: errorLines.length > 0,
    isTestOnly: isTestOnlyResponse(rawText),
    doneSignalCount: doneFamilies.length,
  });

  return {
    result,
    evidence: Object.freeze({
      changedFiles: Object.freeze(changedFiles),
      errorLines: Object.freeze(errorLines),
      doneFamilies: Object.freeze(doneFamilies),
    }),
  };
}

export function analyzeResponse(rawText: string): AnalysisResult {
  return analyzeResponseDetailed(rawText).result;
}
