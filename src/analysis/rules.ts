/**
 * Pattern rules used by the response analyzer.
 *
 * Each rule is a named predicate so a pass can be tested in isolation and the
 * matched names can be logged. `signal` rules mark something as present;
 * `benign` rules suppress an error candidate that would otherwise count.
 * None of the patterns use the g flag, since `RegExp.test` with g is stateful.
 */

export type RulePolarity = 'signal' | 'benign';

export interface PatternRule {
  name: string;
  pattern: RegExp;
  polarity: RulePolarity;
}

export function matchesRule(rule: PatternRule, text: string): boolean {
  return rule.pattern.test(text);
}

export function firstMatchingRule(rules: readonly PatternRule[], text: string): PatternRule | null {
  return rules.find((rule) => matchesRule(rule, text)) ?? null;
}

export const FILE_EXTENSIONS = [
  'py',
  'js',
  'jsx',
  'mjs',
  'cjs',
  'ts',
  'tsx',
  'php',
  'rb',
  'go',
  'rs',
  'java',
  'kt',
  'c',
  'h',
  'cpp',
  'cs',
  'swift',
  'sh',
  'sql',
  'md',
  'txt',
  'json',
  'yaml',
  'yml',
  'toml',
  'ini',
  'css',
  'scss',
  'html',
  'vue',
  'svelte',
] as const;

// Capture group 1 is the path at the end of the line
export const FILE_CHANGE_RULE: PatternRule = {
  name: 'file-mutation',
  pattern: new RegExp(
    `\\b(?:Created|Modified|Updated|Wrote|Deleted)\\b.*?(\\S+\\.(?:${FILE_EXTENSIONS.join('|')}))$`
  ),
  polarity: 'signal',
};

export const ERROR_CANDIDATE_RULE: PatternRule = {
  name: 'error-vocabulary',
  pattern: /error|failed|exception|traceback/i,
  polarity: 'signal',
};

export const BENIGN_ERROR_RULES: readonly PatternRule[] = [
  { name: 'json-error-field', pattern: /"error":|"is_error":/, polarity: 'benign' },
  { name: 'json-error-empty', pattern: /"error": (?:false|null|None)/, polarity: 'benign' },
  { name: 'error-log-file', pattern: /error_log|error\.log/, polarity: 'benign' },
  { name: 'error-handler-identifier', pattern: /error_handler|ErrorHandler|on_error/, polarity: 'benign' },
  { name: 'logger-error-call', pattern: /logger\.error|logging\.error/, polarity: 'benign' },
  { name: 'test-vocabulary', pattern: /test.*error|error.*test/, polarity: 'benign' },
  { name: 'traceback-header', pattern: /Traceback \(most recent/, polarity: 'benign' },
  { name: 'python-stack-frame', pattern: /File ".*", line/, polarity: 'benign' },
  { name: 'js-stack-frame', pattern: /^\s*at .+\(.+:\d+:\d+\)\s*$/, polarity: 'benign' },
  { name: 'pip-output', pattern: /pip.*error/, polarity: 'benign' },
  { name: 'warning-line', pattern: /WARNING.*error|npm WARN/, polarity: 'benign' },
];

export const TEST_RUN_RULE: PatternRule = {
  name: 'test-runner',
  pattern: /running tests|npm test|pytest|jest|vitest|mocha|phpunit|bats|cargo test|go test/i,
  polarity: 'signal',
};

export const IMPLEMENTATION_RULE: PatternRule = {
  name: 'implementation-activity',
  pattern: /implementing|creating|adding feature|building/i,
  polarity: 'signal',
};

export const DONE_SIGNAL_RULES: readonly PatternRule[] = [
  {
    name: 'all-work-complete',
    pattern: /all (?:tasks|items|features).*(?:complete|done|finished)/i,
    polarity: 'signal',
  },
  {
    name: 'project-complete',
    pattern: /(?:project|implementation).*(?:complete|ready|finished)/i,
    polarity: 'signal',
  },
  {
    name: 'nothing-left',
    pattern: /nothing (?:left|remaining|more) to/i,
    polarity: 'signal',
  },
  {
    name: 'no-remaining-work',
    pattern: /no (?:remaining|pending|outstanding) (?:tasks|items|work)/i,
    polarity: 'signal',
  },
];
