export type BreakerStateName = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type BreakerState =
  | { name: 'CLOSED'; failures: number; since: number }
  | { name: 'OPEN'; failures: number; since: number; cooldownMs: number }
  | { name: 'HALF_OPEN'; failures: number; since: number; cooldownMs: number; trialInFlight: boolean };

export type BreakerPolicy = {
  failureThreshold: number;
  cooldownMs: number;
  maxCooldownMs: number;
};

export function initialBreakerState(now: number): BreakerState {
  return { name: 'CLOSED', failures: 0, since: now };
}

/**
 * Admission decision. An OPEN breaker whose cool-down has elapsed moves to
 * HALF_OPEN and admits the caller as its single trial; further callers are
 * refused until that trial reports back.
 */
export function admit(state: BreakerState, now: number): { allowed: boolean; next: BreakerState } {
  switch (state.name) {
    case 'CLOSED':
      return { allowed: true, next: state };
    case 'OPEN':
      if (now - state.since < state.cooldownMs) return { allowed: false, next: state };
      return {
        allowed: true,
        next: { name: 'HALF_OPEN', failures: state.failures, since: now, cooldownMs: state.cooldownMs, trialInFlight: true }
      };
    case 'HALF_OPEN':
      if (state.trialInFlight) return { allowed: false, next: state };
      return { allowed: true, next: { ...state, trialInFlight: true } };
  }
}

/** Whether admit() would let a request through right now, without consuming the trial. */
export function isAvailable(state: BreakerState, now: number): boolean {
  switch (state.name) {
    case 'CLOSED':
      return true;
    case 'OPEN':
      return now - state.since >= state.cooldownMs;
    case 'HALF_OPEN':
      return !state.trialInFlight;
  }
}

export function onSuccess(state: BreakerState, now: number): BreakerState {
  if (state.name === 'CLOSED') return state.failures === 0 ? state : { ...state, failures: 0 };
  return { name: 'CLOSED', failures: 0, since: now };
}

export function onFailure(state: BreakerState, policy: BreakerPolicy, now: number): BreakerState {
  switch (state.name) {
    case 'CLOSED': {
      const failures = state.failures + 1;
      if (failures >= policy.failureThreshold) {
        return { name: 'OPEN', failures, since: now, cooldownMs: policy.cooldownMs };
      }
      return { ...state, failures };
    }
    case 'HALF_OPEN':
      return {
        name: 'OPEN',
        failures: state.failures + 1,
        since: now,
        cooldownMs: Math.min(state.cooldownMs * 2, policy.maxCooldownMs)
      };
    case 'OPEN':
      // Late result of a request admitted before the breaker opened.
      return { ...state, failures: state.failures + 1 };
  }
}

/** Gives back an admitted trial that never reached the server (e.g. pool wait timed out). */
export function abandonTrial(state: BreakerState): BreakerState {
  return state.name === 'HALF_OPEN' && state.trialInFlight ? { ...state, trialInFlight: false } : state;
}

export class CircuitBreaker {
  private current: BreakerState;

  constructor(
    private readonly policy: BreakerPolicy,
    private readonly onTransition: (from: BreakerStateName, to: BreakerStateName) => void = () => undefined,
    now = Date.now()
  ) {
    this.current = initialBreakerState(now);
  }

  get state(): BreakerState {
    return this.current;
  }

  tryAdmit(now = Date.now()): boolean {
    const { allowed, next } = admit(this.current, now);
    this.apply(next);
    return allowed;
  }

  available(now = Date.now()): boolean {
    return isAvailable(this.current, now);
  }

  recordSuccess(now = Date.now()): void {
    this.apply(onSuccess(this.current, now));
  }

  recordFailure(now = Date.now()): void {
    this.apply(onFailure(this.current, this.policy, now));
  }

  releaseTrial(): void {
    this.apply(abandonTrial(this.current));
  }

  private apply(next: BreakerState): void {
    const prev = this.current;
    this.current = next;
    if (prev.name !== next.name) this.onTransition(prev.name, next.name);
  }
}
