#!/usr/bin/env node
import { existsSync, mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { createAgentRunner } from './agents/index.js';
import { CircuitBreaker } from './breaker/circuit-breaker.js';
import { type CliOptions, createCLI } from './cli.js';
import { loadSettings, validateSettings } from './config/settings.js';
import {
  HISTORY_DB_FILE,
  closeDatabase,
  createDatabase,
  getRecentIterations,
  sqliteHistory,
} from './db/index.js';
import { createTracer } from './debug/index.js';
import { ConfigError, StateFileError } from './errors.js';
import { LoopController, getExitCode } from './loops/controller.js';
import { StopSignal } from './state/stop-signal.js';
import { StatusStore } from './state/store.js';
import type { CircuitBreakerState } from './types/index.js';
import { createFileLogger } from './utils/logger.js';

const LOG_FILE = 'loopguard.log';

function printBreaker(state: CircuitBreakerState): void {
  console.log(`Circuit breaker: ${state.state}`);
  console.log(`  Consecutive loops without progress: ${state.consecutiveNoProgress}`);
  console.log(`  Consecutive loops with errors: ${state.consecutiveErrors}`);
  console.log(`  Times opened: ${state.totalOpens}`);
  console.log(`  Last transition: ${state.lastTransitionReason} (${state.lastTransitionTime})`);
}

async function showStatus(store: StatusStore): Promise<void> {
  const status = await store.readStatus();
  if (!status) {
    console.log(`No status found in ${store.stateDir}`);
    return;
  }
  console.log(JSON.stringify(status, null, 2));
}

async function showCircuitStatus(store: StatusStore): Promise<void> {
  const state = await store.readBreakerState();
  if (!state) {
    console.log('Circuit breaker: CLOSED (no state recorded yet)');
    return;
  }
  printBreaker(state);
}

function showHistory(stateDir: string, count: number): void {
  const dbPath = join(stateDir, HISTORY_DB_FILE);
  if (!existsSync(dbPath)) {
    console.log('No iteration history recorded yet');
    return;
  }
  createDatabase(dbPath);
  try {
    const rows = getRecentIterations(count);
    for (const row of rows) {
      console.log(
        `${row.recorded_at}  run ${row.run_id.slice(0, 8)}  #${row.iteration}  ${row.outcome.padEnd(9)}  ` +
          `files=${row.files_changed} error=${row.has_error === 1} testOnly=${row.is_test_only === 1} ` +
          `done=${row.done_signals}  breaker=${row.breaker_state}  -> ${row.decision}`
      );
    }
  } finally {
    closeDatabase();
  }
}

/**
 * Informational and administrative commands. Returns true when one ran, in
 * which case the loop does not start.
 */
async function runCommand(opts: CliOptions, stateDir: string): Promise<boolean> {
  const store = new StatusStore(stateDir);

  if (opts.status) {
    await showStatus(store);
    return true;
  }
  if (opts.circuitStatus) {
    await showCircuitStatus(store);
    return true;
  }
  if (opts.resetCircuit) {
    printBreaker(await new CircuitBreaker(store).reset('Manual reset via CLI'));
    return true;
  }
  if (opts.halfOpenCircuit) {
    printBreaker(await new CircuitBreaker(store).halfOpen('Manual half-open via CLI'));
    return true;
  }
  if (opts.history !== undefined) {
    showHistory(stateDir, opts.history);
    return true;
  }
  return false;
}

async function main(): Promise<number> {
  const program = createCLI();
  program.parse();
  const opts = program.opts<CliOptions>();
  const workDir = process.cwd();
  const stateDir = resolve(workDir, opts.stateDir);

  if (await runCommand(opts, stateDir)) {
    return 0;
  }

  const settings = await loadSettings(opts, workDir);
  validateSettings(settings);
  mkdirSync(settings.stateDir, { recursive: true });

  const logger = createFileLogger({ logFile: join(settings.logDir, LOG_FILE), verbose: settings.verbose });
  const tracer = createTracer(settings.debug, settings.stateDir);
  const store = new StatusStore(settings.stateDir);
  createDatabase(join(settings.stateDir, HISTORY_DB_FILE));

  const runner = createAgentRunner(settings.agent);
  const controller = new LoopController({
    settings,
    runner,
    breaker: new CircuitBreaker(store, { thresholds: settings.breaker, tracer }),
    store,
    stopSignal: new StopSignal(settings.stateDir),
    logger,
    tracer,
    history: sqliteHistory,
  });

  await tracer.init(controller.runId, settings.promptFile);
  if (settings.debug) {
    console.log(`Debug tracing enabled: ${settings.stateDir}/debug/${controller.runId}/`);
  }

  // First interrupt finishes the current iteration; a second one exits at once
  let interrupted = false;
  const handleShutdown = () => {
    if (interrupted) {
      tracer.logError('Second interrupt, exiting immediately');
      runner.cancel?.();
      closeDatabase();
      process.exit(130);
    }
    interrupted = true;
    console.log('\nInterrupted - stopping after the current iteration (interrupt again to exit now)');
    controller.requestStop();
  };
  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  console.log(`Running ${settings.promptFile} (log: ${join(settings.logDir, LOG_FILE)})`);

  try {
    const state = await controller.run();
    const exitCode = getExitCode(state);

    if (state.phase === 'completed') {
      console.log(`\n✓ Loop complete after ${state.counters.loopCount} iterations (${state.exitReason})`);
    } else if (state.phase === 'circuit_open') {
      console.log('\n⚠ Circuit breaker open - run with --reset-circuit once the cause is fixed');
    } else {
      console.log(`\nLoop stopped after ${state.counters.loopCount} iterations (${state.exitReason})`);
    }
    return exitCode;
  } finally {
    process.off('SIGINT', handleShutdown);
    process.off('SIGTERM', handleShutdown);
    await tracer.finalize();
    closeDatabase();
  }
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    if (err instanceof ConfigError || err instanceof StateFileError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exit(1);
  });
