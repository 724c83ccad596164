import { RateBudgetExhaustedError, ScrapeCancelledError } from '../errors';

export interface RatePolicy {
  minDelayMs: number;
  maxDelayMs: number;
  maxRequests: number;
}

export interface RateLimiterOptions {
  /** Uniform [0, 1) source for delay jitter. */
  random?: () => number;
  now?: () => number;
}

interface SourceState {
  used: number;
  lastRequestAt: number | null;
  tail: Promise<void>;
}

/**
 * Resolves after `ms`, or rejects with ScrapeCancelledError once `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScrapeCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScrapeCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Per-source pacing and request budget.
 *
 * Calls for one source queue behind each other; calls for different sources
 * have separate queues and never wait on one another. Each granted request is
 * spaced from the previous one by a delay drawn uniformly from
 * [minDelayMs, maxDelayMs]. Once a source has used `maxRequests` the next
 * acquire fails instead of waiting.
 */
export class RateLimiter {
  private readonly policies: ReadonlyMap<string, RatePolicy>;
  private readonly random: () => number;
  private readonly now: () => number;
  private states = new Map<string, SourceState>();

  constructor(policies: Record<string, RatePolicy>, options: RateLimiterOptions = {}) {
    this.policies = new Map(Object.entries(policies));
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  acquire(sourceId: string, signal?: AbortSignal): Promise<void> {
    const state = this.stateFor(sourceId);
    const turn = state.tail.then(() => this.take(sourceId, state, signal));
    state.tail = turn.catch(() => undefined);
    return turn;
  }

  /** Requests granted to a source since the last reset. */
  used(sourceId: string): number {
    return this.states.get(sourceId)?.used ?? 0;
  }

  /** Start a new session: budgets and last-request times are forgotten. */
  reset(): void {
    this.states = new Map();
  }

  private stateFor(sourceId: string): SourceState {
    let state = this.states.get(sourceId);
    if (!state) {
      state = { used: 0, lastRequestAt: null, tail: Promise.resolve() };
      this.states.set(sourceId, state);
    }
    return state;
  }

  private policyFor(sourceId: string): RatePolicy {
    const policy = this.policies.get(sourceId);
    if (!policy) {
      throw new RangeError(`No rate policy for source: ${sourceId}`);
    }
    return policy;
  }

  private async take(sourceId: string, state: SourceState, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new ScrapeCancelledError();

    const policy = this.policyFor(sourceId);
    if (state.used >= policy.maxRequests) {
      throw new RateBudgetExhaustedError(sourceId, policy.maxRequests);
    }

    if (state.lastRequestAt !== null) {
      const spacing = policy.minDelayMs + this.random() * (policy.maxDelayMs - policy.minDelayMs);
      const wait = state.lastRequestAt + spacing - this.now();
      if (wait > 0) {
        await delay(Math.ceil(wait), signal);
      }
    }

    state.used++;
    state.lastRequestAt = this.now();
  }
}
