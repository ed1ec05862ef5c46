import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { YAMLParseError, parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_BREAKER_THRESHOLDS } from '../breaker/circuit-breaker.js';
import type { CliOptions } from '../cli.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_EXIT_LIMITS } from '../exit/exit-policy.js';
import type { BreakerThresholds, ExitLimits } from '../types/index.js';

export const DEFAULT_STATE_DIR = '.loopguard';
export const CONFIG_FILE = 'config.yaml';
export const MIN_TIMEOUT_MINUTES = 1;
export const MAX_TIMEOUT_MINUTES = 120;
export const DEFAULT_TIMEOUT_MINUTES = 15;
export const DEFAULT_SLEEP_SECONDS = 1;

export type RunnerKind = 'cli' | 'sdk';

export interface AgentSettings {
  runner: RunnerKind;
  command: string;
  /** `{prompt}` is replaced by the prompt content; without it the prompt is appended */
  args: string[];
  model?: string;
}

export const DEFAULT_AGENT: AgentSettings = {
  runner: 'cli',
  command: 'claude',
  args: ['-p', '{prompt}', '--permission-mode', 'bypassPermissions'],
};

export interface Settings {
  workDir: string;
  stateDir: string;
  promptFile: string;
  taskListFile: string;
  logDir: string;
  timeoutMinutes: number;
  sleepSeconds: number;
  verbose: boolean;
  debug: boolean;
  breaker: BreakerThresholds;
  exit: ExitLimits;
  agent: AgentSettings;
}

const TimeoutSchema = z
  .number()
  .int()
  .min(MIN_TIMEOUT_MINUTES)
  .max(MAX_TIMEOUT_MINUTES);

export const FileConfigSchema = z
  .object({
    promptFile: z.string().min(1).optional(),
    taskListFile: z.string().min(1).optional(),
    logDir: z.string().min(1).optional(),
    timeoutMinutes: TimeoutSchema.optional(),
    sleepSeconds: z.number().nonnegative().max(3600).optional(),
    breaker: z
      .object({
        noProgressThreshold: z.number().int().positive().optional(),
        errorThreshold: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    exit: z
      .object({
        maxTestLoops: z.number().int().positive().optional(),
        maxDoneSignals: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    agent: z
      .object({
        runner: z.enum(['cli', 'sdk']).optional(),
        command: z.string().min(1).optional(),
        args: z.array(z.string()).optional(),
        model: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseTimeoutMinutes(raw: string): number {
  const result = TimeoutSchema.safeParse(/^\d+$/.test(raw) ? Number(raw) : Number.NaN);
  if (!result.success) {
    throw new ConfigError(
      `Timeout must be a whole number of minutes between ${MIN_TIMEOUT_MINUTES} and ${MAX_TIMEOUT_MINUTES}`
    );
  }
  return result.data;
}

export function parseFileConfig(source: string, filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError(`Invalid YAML in ${filePath}: ${err.message}`);
    }
    throw err;
  }

  // An empty file parses to null
  const result = FileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load the config file. An explicitly named file must exist; the default
 * `<stateDir>/config.yaml` is optional.
 */
export async function loadFileConfig(filePath: string, required: boolean): Promise<FileConfig | null> {
  if (!existsSync(filePath)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return null;
  }
  return parseFileConfig(await readFile(filePath, 'utf-8'), filePath);
}

/**
 * Merge defaults, the config file and CLI flags, in increasing precedence.
 * Relative paths from either source resolve against the working directory.
 */
export function resolveSettings(cli: CliOptions, file: FileConfig | null, workDir: string): Settings {
  const stateDir = resolve(workDir, cli.stateDir);
  const fromFile: FileConfig = file ?? {};

  const promptFile = cli.prompt ?? fromFile.promptFile;
  const taskListFile = cli.taskList ?? fromFile.taskListFile;

  return {
    workDir,
    stateDir,
    promptFile: promptFile ? resolve(workDir, promptFile) : join(stateDir, 'PROMPT.md'),
    taskListFile: taskListFile ? resolve(workDir, taskListFile) : join(stateDir, 'fix_plan.md'),
    logDir: fromFile.logDir ? resolve(workDir, fromFile.logDir) : join(stateDir, 'logs'),
    timeoutMinutes: cli.timeout ?? fromFile.timeoutMinutes ?? DEFAULT_TIMEOUT_MINUTES,
    sleepSeconds: fromFile.sleepSeconds ?? DEFAULT_SLEEP_SECONDS,
    verbose: cli.verbose,
    debug: cli.debug,
    breaker: {
      noProgress: fromFile.breaker?.noProgressThreshold ?? DEFAULT_BREAKER_THRESHOLDS.noProgress,
      errors: fromFile.breaker?.errorThreshold ?? DEFAULT_BREAKER_THRESHOLDS.errors,
    },
    exit: {
      maxTestLoops: fromFile.exit?.maxTestLoops ?? DEFAULT_EXIT_LIMITS.maxTestLoops,
      maxDoneSignals: fromFile.exit?.maxDoneSignals ?? DEFAULT_EXIT_LIMITS.maxDoneSignals,
    },
    agent: {
      runner: cli.runner ?? fromFile.agent?.runner ?? DEFAULT_AGENT.runner,
      command: fromFile.agent?.command ?? DEFAULT_AGENT.command,
      args: fromFile.agent?.args ?? DEFAULT_AGENT.args,
      model: cli.model ?? fromFile.agent?.model,
    },
  };
}

/**
 * Everything that must hold before the loop may start.
 */
export function validateSettings(settings: Settings): void {
  if (!existsSync(settings.promptFile)) {
    throw new ConfigError(`Prompt file not found: ${settings.promptFile}`);
  }
  if (settings.agent.runner === 'cli' && settings.agent.command.trim() === '') {
    throw new ConfigError('Agent command must not be empty');
  }
}

export async function loadSettings(cli: CliOptions, workDir: string): Promise<Settings> {
  const stateDir = resolve(workDir, cli.stateDir);
  const configPath = cli.config ? resolve(workDir, cli.config) : join(stateDir, CONFIG_FILE);
  const file = await loadFileConfig(configPath, cli.config !== undefined);
  return resolveSettings(cli, file, workDir);
}
