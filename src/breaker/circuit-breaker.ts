import type { DebugTracer } from '../debug/index.js';
import type { BreakerStore } from '../state/store.js';
import type {
  BreakerSignal,
  BreakerThresholds,
  CircuitBreakerState,
} from '../types/index.js';

export const DEFAULT_BREAKER_THRESHOLDS: BreakerThresholds = {
  noProgress: 3,
  errors: 5,
};

export function initialBreakerState(now: Date, reason = 'Initialized'): CircuitBreakerState {
  return {
    state: 'CLOSED',
    consecutiveNoProgress: 0,
    consecutiveErrors: 0,
    lastTransitionReason: reason,
    lastTransitionTime: now.toISOString(),
    totalOpens: 0,
  };
}

/**
 * Advance the breaker by one iteration.
 *
 * The two counters are independent: progress resets the no-progress counter even
 * when the iteration also reported an error, and an error-free iteration resets
 * the error counter even when nothing changed.
 */
export function transitionBreaker(
  current: CircuitBreakerState,
  signal: BreakerSignal,
  thresholds: BreakerThresholds,
  now: Date
): CircuitBreakerState {
  const madeProgress = signal.filesChangedCount > 0;
  const consecutiveNoProgress = madeProgress ? 0 : current.consecutiveNoProgress + 1;
  const consecutiveErrors = signal.hasError ? current.consecutiveErrors + 1 : 0;
  const counters = { ...current, consecutiveNoProgress, consecutiveErrors };

  const open = (reason: string): CircuitBreakerState => ({
    ...counters,
    state: 'OPEN',
    lastTransitionReason: reason,
    lastTransitionTime: now.toISOString(),
    totalOpens: current.totalOpens + 1,
  });

  switch (current.state) {
    case 'OPEN':
      // Only reset() leaves OPEN
      return counters;

    case 'HALF_OPEN':
      if (!madeProgress) {
        return open('No progress while half-open');
      }
      if (signal.hasError) {
        return open('Error while half-open');
      }
      return {
        ...counters,
        state: 'CLOSED',
        lastTransitionReason: 'Progress detected while half-open',
        lastTransitionTime: now.toISOString(),
      };

    case 'CLOSED':
      if (consecutiveNoProgress >= thresholds.noProgress) {
        return open(`No progress in ${consecutiveNoProgress} consecutive loops`);
      }
      if (consecutiveErrors >= thresholds.errors) {
        return open(`Errors in ${consecutiveErrors} consecutive loops`);
      }
      return counters;
  }
}

export interface CircuitBreakerOptions {
  thresholds?: BreakerThresholds;
  tracer?: DebugTracer;
  now?: () => Date;
}

/**
 * Stagnation/failure safeguard for the loop. Owns CircuitBreakerState and
 * persists it through the store after every change.
 */
export class CircuitBreaker {
  private store: BreakerStore;
  private thresholds: BreakerThresholds;
  private tracer: DebugTracer | null;
  private now: () => Date;
  private state: CircuitBreakerState | null = null;

  constructor(store: BreakerStore, options: CircuitBreakerOptions = {}) {
    this.store = store;
    this.thresholds = options.thresholds ?? DEFAULT_BREAKER_THRESHOLDS;
    this.tracer = options.tracer ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted state, creating and persisting a CLOSED breaker on first run.
   */
  async load(): Promise<CircuitBreakerState> {
    const persisted = await this.store.readBreakerState();
    if (persisted) {
      this.state = persisted;
      return persisted;
    }
    const fresh = initialBreakerState(this.now());
    await this.persist(fresh);
    return fresh;
  }

  get current(): CircuitBreakerState {
    if (!this.state) {
      throw new Error('Circuit breaker not loaded. Call load() first.');
    }
    return this.state;
  }

  canExecute(): boolean {
    return this.current.state !== 'OPEN';
  }

  async update(signal: BreakerSignal, iteration?: number): Promise<CircuitBreakerState> {
    const before = this.current;
    const next = transitionBreaker(before, signal, this.thresholds, this.now());

    this.tracer?.logDecision(
      'circuit_breaker',
      {
        previousState: before.state,
        filesChangedCount: signal.filesChangedCount,
        hasError: signal.hasError,
        consecutiveNoProgress: next.consecutiveNoProgress,
        consecutiveErrors: next.consecutiveErrors,
        noProgressThreshold: this.thresholds.noProgress,
        errorThreshold: this.thresholds.errors,
      },
      next.state,
      next.state === before.state ? 'No state change' : next.lastTransitionReason,
      iteration
    );

    await this.persist(next);
    return next;
  }

  /**
   * Operator reset: CLOSED with both counters zeroed, from any state.
   */
  async reset(reason = 'Manual reset'): Promise<CircuitBreakerState> {
    const previous = this.state ?? (await this.store.readBreakerState());
    const next: CircuitBreakerState = {
      ...initialBreakerState(this.now(), reason),
      totalOpens: previous?.totalOpens ?? 0,
    };
    this.tracer?.logDecision('circuit_breaker', { previousState: previous?.state ?? null }, 'CLOSED', reason);
    await this.persist(next);
    return next;
  }

  /**
   * Administrative move to HALF_OPEN: the next iteration decides between CLOSED
   * and OPEN. Counters are kept so the status still shows what happened.
   */
  async halfOpen(reason = 'Manual half-open'): Promise<CircuitBreakerState> {
    const previous = this.state ?? (await this.load());
    const next: CircuitBreakerState = {
      ...previous,
      state: 'HALF_OPEN',
      lastTransitionReason: reason,
      lastTransitionTime: this.now().toISOString(),
    };
    this.tracer?.logDecision('circuit_breaker', { previousState: previous.state }, 'HALF_OPEN', reason);
    await this.persist(next);
    return next;
  }

  private async persist(next: CircuitBreakerState): Promise<void> {
    this.state = next;
    await this.store.writeBreakerState(next);
  }
}
