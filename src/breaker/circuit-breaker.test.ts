import assert from 'node:assert';
import { beforeEach, describe, test } from 'node:test';
import { MemoryBreakerStore } from '../testing/fakes.js';
import type { BreakerStateName, CircuitBreakerState } from '../types/index.js';
import {
  CircuitBreaker,
  DEFAULT_BREAKER_THRESHOLDS,
  initialBreakerState,
  transitionBreaker,
} from './circuit-breaker.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const progress = { filesChangedCount: 2, hasError: false };
const stalled = { filesChangedCount: 0, hasError: false };
const stalledWithError = { filesChangedCount: 0, hasError: true };
const progressWithError = { filesChangedCount: 1, hasError: true };

function stateWith(overrides: Partial<CircuitBreakerState>): CircuitBreakerState {
  return { ...initialBreakerState(NOW), ...overrides };
}

describe('transitionBreaker', () => {
  test('progress resets the no-progress counter even with an error', () => {
    const next = transitionBreaker(
      stateWith({ consecutiveNoProgress: 2, consecutiveErrors: 1 }),
      progressWithError,
      DEFAULT_BREAKER_THRESHOLDS,
      NOW
    );
    assert.strictEqual(next.consecutiveNoProgress, 0);
    assert.strictEqual(next.consecutiveErrors, 2);
    assert.strictEqual(next.state, 'CLOSED');
  });

  test('an error-free iteration resets the error counter even without progress', () => {
    const next = transitionBreaker(
      stateWith({ consecutiveErrors: 4 }),
      stalled,
      DEFAULT_BREAKER_THRESHOLDS,
      NOW
    );
    assert.strictEqual(next.consecutiveErrors, 0);
    assert.strictEqual(next.consecutiveNoProgress, 1);
  });

  test('opens after exactly the no-progress threshold, and not before', () => {
    let state = initialBreakerState(NOW);
    const seen: BreakerStateName[] = [];
    for (let i = 0; i < DEFAULT_BREAKER_THRESHOLDS.noProgress; i++) {
      state = transitionBreaker(state, stalled, DEFAULT_BREAKER_THRESHOLDS, NOW);
      seen.push(state.state);
    }
    assert.deepStrictEqual(seen, ['CLOSED', 'CLOSED', 'OPEN']);
    assert.strictEqual(state.lastTransitionReason, 'No progress in 3 consecutive loops');
    assert.strictEqual(state.totalOpens, 1);
  });

  test('opens after the error threshold when progress keeps happening', () => {
    let state = initialBreakerState(NOW);
    for (let i = 0; i < 4; i++) {
      state = transitionBreaker(state, progressWithError, DEFAULT_BREAKER_THRESHOLDS, NOW);
      assert.strictEqual(state.state, 'CLOSED');
    }
    state = transitionBreaker(state, progressWithError, DEFAULT_BREAKER_THRESHOLDS, NOW);
    assert.strictEqual(state.state, 'OPEN');
    assert.strictEqual(state.lastTransitionReason, 'Errors in 5 consecutive loops');
  });

  test('no-progress threshold wins when both are reached together', () => {
    const next = transitionBreaker(
      stateWith({ consecutiveNoProgress: 2, consecutiveErrors: 4 }),
      stalledWithError,
      DEFAULT_BREAKER_THRESHOLDS,
      NOW
    );
    assert.strictEqual(next.state, 'OPEN');
    assert.strictEqual(next.lastTransitionReason, 'No progress in 3 consecutive loops');
  });

  test('OPEN stays OPEN whatever the signal', () => {
    const open = stateWith({ state: 'OPEN', consecutiveNoProgress: 3 });
    const next = transitionBreaker(open, progress, DEFAULT_BREAKER_THRESHOLDS, NOW);
    assert.strictEqual(next.state, 'OPEN');
    assert.strictEqual(next.consecutiveNoProgress, 0);
  });

  test('HALF_OPEN closes on one good iteration', () => {
    const next = transitionBreaker(
      stateWith({ state: 'HALF_OPEN', consecutiveNoProgress: 3 }),
      progress,
      DEFAULT_BREAKER_THRESHOLDS,
      NOW
    );
    assert.strictEqual(next.state, 'CLOSED');
    assert.strictEqual(next.consecutiveNoProgress, 0);
  });

  test('HALF_OPEN reopens on a single no-progress iteration', () => {
    const next = transitionBreaker(stateWith({ state: 'HALF_OPEN' }), stalled, DEFAULT_BREAKER_THRESHOLDS, NOW);
    assert.strictEqual(next.state, 'OPEN');
    assert.strictEqual(next.lastTransitionReason, 'No progress while half-open');
  });

  test('HALF_OPEN reopens on an error even with progress', () => {
    const next = transitionBreaker(
      stateWith({ state: 'HALF_OPEN' }),
      progressWithError,
      DEFAULT_BREAKER_THRESHOLDS,
      NOW
    );
    assert.strictEqual(next.state, 'OPEN');
    assert.strictEqual(next.lastTransitionReason, 'Error while half-open');
  });

  test('honours custom thresholds', () => {
    const thresholds = { noProgress: 1, errors: 1 };
    const next = transitionBreaker(initialBreakerState(NOW), stalled, thresholds, NOW);
    assert.strictEqual(next.state, 'OPEN');
  });
});

describe('CircuitBreaker', () => {
  let store: MemoryBreakerStore;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    store = new MemoryBreakerStore();
    breaker = new CircuitBreaker(store, { now: () => NOW });
  });

  test('load creates and persists a CLOSED breaker on first run', async () => {
    const state = await breaker.load();
    assert.strictEqual(state.state, 'CLOSED');
    assert.strictEqual(store.writes.length, 1);
    assert.strictEqual(breaker.canExecute(), true);
  });

  test('load restores persisted state', async () => {
    store.state = stateWith({ state: 'OPEN', consecutiveNoProgress: 3 });
    await breaker.load();
    assert.strictEqual(breaker.canExecute(), false);
    assert.strictEqual(store.writes.length, 0);
  });

  test('current throws before load', () => {
    assert.throws(() => breaker.current, /not loaded/);
  });

  test('persists after every update', async () => {
    await breaker.load();
    await breaker.update(stalled);
    await breaker.update(progress);
    assert.strictEqual(store.writes.length, 3);
    assert.strictEqual(store.state?.consecutiveNoProgress, 0);
  });

  test('denies execution once OPEN', async () => {
    await breaker.load();
    for (let i = 0; i < 3; i++) {
      await breaker.update(stalled);
    }
    assert.strictEqual(breaker.canExecute(), false);
  });

  for (const from of ['CLOSED', 'HALF_OPEN', 'OPEN'] as const) {
    test(`reset from ${from} yields CLOSED with zeroed counters`, async () => {
      store.state = stateWith({ state: from, consecutiveNoProgress: 7, consecutiveErrors: 9, totalOpens: 2 });
      await breaker.load();
      const state = await breaker.reset();
      assert.strictEqual(state.state, 'CLOSED');
      assert.strictEqual(state.consecutiveNoProgress, 0);
      assert.strictEqual(state.consecutiveErrors, 0);
      assert.strictEqual(state.lastTransitionReason, 'Manual reset');
      assert.strictEqual(state.totalOpens, 2);
      assert.deepStrictEqual(store.state, state);
    });
  }

  test('reset works without a prior load', async () => {
    const state = await breaker.reset('Operator reset');
    assert.strictEqual(state.state, 'CLOSED');
    assert.strictEqual(breaker.canExecute(), true);
  });

  test('halfOpen keeps counters and allows execution', async () => {
    store.state = stateWith({ state: 'OPEN', consecutiveNoProgress: 3 });
    await breaker.load();
    const state = await breaker.halfOpen();
    assert.strictEqual(state.state, 'HALF_OPEN');
    assert.strictEqual(state.consecutiveNoProgress, 3);
    assert.strictEqual(breaker.canExecute(), true);
  });
});
