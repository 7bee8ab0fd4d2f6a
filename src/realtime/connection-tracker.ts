/**
 * Connection Tracker
 *
 * Owns the current ConnectionState for one device. Each operation runs the
 * matching pure transition, persists the result, then returns it. Operations
 * are queued: each transition starts from the state the previous one saved,
 * whoever called it.
 *
 * Emits:
 *   'stateChange' (state: ConnectionState, prevStatus: ConnectionStatus) on status changes
 */

import { EventEmitter } from 'events';
import { ConnectionState } from './types';
import { ConnectionStore } from './connection-store';
import * as sm from './state-machine';

export type Clock = () => Date;

export class ConnectionTracker extends EventEmitter {
  private _state: ConnectionState;
  private store: ConnectionStore;
  private clock: Clock;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(initial: ConnectionState, store: ConnectionStore, clock: Clock = () => new Date()) {
    super();
    this._state = initial;
    this.store = store;
    this.clock = clock;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get deviceId(): string {
    return this._state.deviceId;
  }

  markConnecting(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.markConnecting(s, now));
  }

  markConnected(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.markConnected(s, now));
  }

  markDisconnected(message?: string): Promise<ConnectionState> {
    return this.apply((s, now) => sm.markDisconnected(s, message, now));
  }

  markError(message: string): Promise<ConnectionState> {
    return this.apply((s, now) => sm.markError(s, message, now));
  }

  markStopped(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.markStopped(s, now));
  }

  receivedMessage(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.receivedMessage(s, now));
  }

  incrementReconnectAttempt(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.incrementReconnectAttempt(s, now));
  }

  resetReconnectAttempts(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.resetReconnectAttempts(s, now));
  }

  resetErrors(): Promise<ConnectionState> {
    return this.apply((s, now) => sm.resetErrors(s, now));
  }

  shouldReconnect(): boolean {
    return sm.shouldReconnect(this._state);
  }

  isActive(): boolean {
    return sm.isActive(this._state);
  }

  timeSinceLastMessage(): number | undefined {
    return sm.timeSinceLastMessage(this._state, this.clock());
  }

  connectionDuration(): number | undefined {
    return sm.connectionDuration(this._state, this.clock());
  }

  private apply(transition: (state: ConnectionState, now: Date) => ConnectionState): Promise<ConnectionState> {
    const result = this.queue.then(() => this.commit(transition));
    // A failed save rejects its own caller only; the next transition still runs.
    this.queue = Promise.allSettled([result]);
    return result;
  }

  private async commit(
    transition: (state: ConnectionState, now: Date) => ConnectionState,
  ): Promise<ConnectionState> {
    const prev = this._state;
    const next = transition(prev, this.clock());
    await this.store.save(next);
    this._state = next;
    if (next.status !== prev.status) {
      this.emit('stateChange', next, prev.status);
    }
    return next;
  }
}
