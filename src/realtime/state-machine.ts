/**
 * Connection State Machine
 *
 *   disconnected ─▶ connecting ─▶ connected ─▶ disconnected | error
 *        ▲              │                            │
 *        └──────────────┴──────── retry ◀────────────┘
 *   any ─▶ stopped (explicit, terminal until markConnecting)
 *
 * Every transition is a pure function: it takes a state and returns a new
 * one. `now` is injectable so tests can pin timestamps. Persisting the
 * result is the caller's job (see ConnectionTracker).
 */

import { ConnectionState } from './types';

type Now = Date;

function touch(state: ConnectionState, now: Now, patch: Partial<ConnectionState>): ConnectionState {
  return { ...state, ...patch, updatedAt: now };
}

export function markConnecting(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, { status: 'connecting' });
}

/** Fresh, healthy session: all failure bookkeeping is wiped. */
export function markConnected(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, {
    status: 'connected',
    connectedAt: now,
    lastMessageAt: now,
    disconnectedAt: null,
    errorCount: 0,
    errorMessage: '',
    reconnectAttempts: 0,
  });
}

/**
 * A disconnect with a message counts as an error for accounting purposes.
 * A clean disconnect (no message) leaves the error counters alone.
 */
export function markDisconnected(
  state: ConnectionState,
  message?: string,
  now: Now = new Date(),
): ConnectionState {
  if (message) {
    return touch(state, now, {
      status: 'disconnected',
      disconnectedAt: now,
      errorMessage: message,
      errorCount: state.errorCount + 1,
      lastErrorAt: now,
    });
  }
  return touch(state, now, { status: 'disconnected', disconnectedAt: now });
}

export function markError(state: ConnectionState, message: string, now: Now = new Date()): ConnectionState {
  return touch(state, now, {
    status: 'error',
    errorMessage: message,
    errorCount: state.errorCount + 1,
    lastErrorAt: now,
  });
}

export function markStopped(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, { status: 'stopped', disconnectedAt: now });
}

/**
 * Any message proves the stream is alive, so a non-connected record gets the
 * full markConnected reset. This applies to `stopped` records too.
 */
export function receivedMessage(state: ConnectionState, now: Now = new Date()): ConnectionState {
  if (state.status !== 'connected') {
    return markConnected(state, now);
  }
  return touch(state, now, { lastMessageAt: now });
}

export function shouldReconnect(state: ConnectionState): boolean {
  return (
    (state.status === 'disconnected' || state.status === 'error') &&
    state.reconnectAttempts < state.maxReconnectAttempts
  );
}

export function incrementReconnectAttempt(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, { reconnectAttempts: state.reconnectAttempts + 1 });
}

/** Operator resume: clears the retry budget without touching status. */
export function resetReconnectAttempts(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, { reconnectAttempts: 0 });
}

/** Operator acknowledgement: zero the error counter, keep status and the last message. */
export function resetErrors(state: ConnectionState, now: Now = new Date()): ConnectionState {
  return touch(state, now, { errorCount: 0, lastErrorAt: null });
}

// --- Derived queries ---

export function isActive(state: ConnectionState): boolean {
  return state.status === 'connected';
}

/** Milliseconds since the last message, undefined if none was ever received. */
export function timeSinceLastMessage(state: ConnectionState, now: Now = new Date()): number | undefined {
  if (!state.lastMessageAt) return undefined;
  return now.getTime() - state.lastMessageAt.getTime();
}

/** Milliseconds the current session has been up, undefined unless connected. */
export function connectionDuration(state: ConnectionState, now: Now = new Date()): number | undefined {
  if (!state.connectedAt || state.status !== 'connected') return undefined;
  return now.getTime() - state.connectedAt.getTime();
}

/** Like connectionDuration, but also reports the length of a finished session. */
export function connectionUptime(state: ConnectionState, now: Now = new Date()): number | undefined {
  if (!state.connectedAt) return undefined;
  if (state.status === 'connected') return now.getTime() - state.connectedAt.getTime();
  if (state.disconnectedAt) return state.disconnectedAt.getTime() - state.connectedAt.getTime();
  return undefined;
}

export function isHealthy(state: ConnectionState, timeoutMs: number, now: Now = new Date()): boolean {
  if (state.status !== 'connected' || !state.lastMessageAt) return false;
  return now.getTime() - state.lastMessageAt.getTime() < timeoutMs;
}
