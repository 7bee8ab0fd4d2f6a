/**
 * Reconnect Policy
 *
 * Exponential backoff keyed off the persisted reconnect attempt count:
 *   delay = min(baseDelayMs * 2^attempts, maxDelayMs)
 * The attempt ceiling itself lives on the ConnectionState
 * (maxReconnectAttempts) so operators can change it per device.
 */

import { ConnectionState } from './types';
import { shouldReconnect } from './state-machine';

export interface ReconnectConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0..1, fraction of the delay that may be shaved off at random */
  jitter: number;
}

export const DEFAULT_RECONNECT: ReconnectConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: 0,
};

export type RetryDecision =
  | { retry: true; delayMs: number; attempt: number }
  | { retry: false; exhausted: boolean };

export class ReconnectPolicy {
  readonly config: ReconnectConfig;
  private random: () => number;

  constructor(config?: Partial<ReconnectConfig>, random: () => number = Math.random) {
    this.config = { ...DEFAULT_RECONNECT, ...config };
    this.random = random;
  }

  /** Backoff before the retry that follows `attempts` previous retries. */
  delayFor(attempts: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.config;
    const delay = Math.min(baseDelayMs * Math.pow(2, Math.max(0, attempts)), maxDelayMs);
    if (jitter <= 0) return delay;
    return Math.round(delay * (1 - Math.min(jitter, 1) * this.random()));
  }

  /**
   * Decide what to do with a failed connection. `exhausted` is only true for
   * a failure state whose retry budget is spent, not for stopped/connected.
   */
  decide(state: ConnectionState): RetryDecision {
    if (shouldReconnect(state)) {
      return {
        retry: true,
        delayMs: this.delayFor(state.reconnectAttempts),
        attempt: state.reconnectAttempts + 1,
      };
    }
    const failed = state.status === 'disconnected' || state.status === 'error';
    return { retry: false, exhausted: failed && state.reconnectAttempts >= state.maxReconnectAttempts };
  }
}
