import { execSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_STATE_DIR, type RunnerKind, parseTimeoutMinutes } from './config/settings.js';
import { ConfigError } from './errors.js';

// A type alias so it satisfies commander's OptionValues index signature
export type CliOptions = {
  prompt?: string;
  taskList?: string;
  stateDir: string;
  config?: string;
  verbose: boolean;
  timeout?: number;
  status: boolean;
  resetCircuit: boolean;
  halfOpenCircuit: boolean;
  circuitStatus: boolean;
  history?: number;
  runner?: RunnerKind;
  model?: string;
  debug: boolean;
};

export const DEFAULT_HISTORY_COUNT = 10;

function getGitCommitHash(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const repoRoot = join(__dirname, '..');
    return execSync('git rev-parse --short HEAD', {
      stdio: 'pipe',
      encoding: 'utf-8',
      cwd: repoRoot,
    }).trim();
  } catch {
    return 'unknown';
  }
}

function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const version =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : 'unknown';
    return `${version} (${getGitCommitHash()})`;
  } catch {
    return `unknown (${getGitCommitHash()})`;
  }
}

function parseTimeoutOption(value: string): number {
  try {
    return parseTimeoutMinutes(value);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

function parseCountOption(value: string): number {
  if (!/^[1-9]\d*$/.test(value)) {
    throw new InvalidArgumentError('Count must be a positive whole number');
  }
  return Number(value);
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('loopguard')
    .version(getVersion(), '-V, --version', 'Show version number and git commit')
    .description(
      'Run a coding agent in a supervised loop with a circuit breaker and completion detection'
    )
    .option('-p, --prompt <file>', 'Prompt file (default: <state-dir>/PROMPT.md)')
    .option('--task-list <file>', 'Checklist file used for completion (default: <state-dir>/fix_plan.md)')
    .option('--state-dir <path>', 'State directory', DEFAULT_STATE_DIR)
    .option('--config <file>', 'Config file (default: <state-dir>/config.yaml)')
    .option('-v, --verbose', 'Echo log lines to the console', false)
    .option('-t, --timeout <minutes>', 'Agent timeout per iteration, 1-120 minutes', parseTimeoutOption)
    .option('-s, --status', 'Show current status and exit', false)
    .option('--reset-circuit', 'Reset the circuit breaker to CLOSED and exit', false)
    .option('--half-open-circuit', 'Move the circuit breaker to HALF_OPEN and exit', false)
    .option('--circuit-status', 'Show circuit breaker status and exit', false)
    .addOption(
      new Option('--history [count]', 'Show the most recent recorded iterations and exit')
        .preset(String(DEFAULT_HISTORY_COUNT))
        .argParser(parseCountOption)
    )
    .addOption(new Option('--runner <kind>', 'Agent runner').choices(['cli', 'sdk']))
    .option('--model <id>', 'Model for the sdk runner')
    .option('--debug', 'Enable debug tracing to <state-dir>/debug/<runId>/', false);

  return program;
}

/**
 * Parse user arguments (no node/script prefix). Throws a CommanderError instead
 * of exiting on invalid input.
 */
export function parseArgs(argv: string[]): CliOptions {
  const program = createCLI().exitOverride();
  program.parse(argv, { from: 'user' });
  return program.opts<CliOptions>();
}
