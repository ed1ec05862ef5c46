export type BreakerStateName = 'CLOSED' | 'HALF_OPEN' | 'OPEN';

export interface CircuitBreakerState {
  state: BreakerStateName;
  consecutiveNoProgress: number;
  consecutiveErrors: number;
  lastTransitionReason: string;
  lastTransitionTime: string; // ISO timestamp
  totalOpens: number;
}

export interface BreakerThresholds {
  noProgress: number;
  errors: number;
}

/** Per-iteration input to the breaker, taken from the analysis result */
export interface BreakerSignal {
  filesChangedCount: number;
  hasError: boolean;
}
