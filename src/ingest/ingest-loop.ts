/**
 * Telemetry Ingest Loop
 *
 * Owns the upstream stream for one device. Drives the connection state
 * machine from connect/receive/failure events, publishes every received
 * payload to the BroadcastHub, and retries with exponential backoff until
 * the device's reconnect budget runs out.
 *
 *   markConnecting ─▶ connect ─▶ markConnected ─▶ receive loop
 *        ▲                                           │ end / failure / stale
 *        │                                           ▼
 *   incrementReconnectAttempt ◀─ backoff ◀─ markDisconnected | markError
 *                                  │
 *                                  └─ budget spent: alert, exit (state stays failed)
 *
 * stop() aborts whichever suspension point is pending (connect, receive,
 * backoff), closes the upstream handle and marks the record stopped.
 *
 * Emits:
 *   'stateChange' (state: ConnectionState, prevStatus: ConnectionStatus)
 *   'message' (payload: unknown)
 *   'exhausted' (state: ConnectionState)
 *   'stopped' (state: ConnectionState)
 *   'failed' (err: Error) - internal failure (e.g. persistence) ended the loop
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'node:timers/promises';
import { ConnectionTracker } from '../realtime/connection-tracker';
import { ConnectionState, ConnectionStatus } from '../realtime/types';
import { ReconnectPolicy } from '../realtime/reconnect-policy';
import { BroadcastHub } from '../broadcast/hub';
import {
  DEVICE_UPDATES_TOPIC,
  STATUS_TOPIC,
  deviceTopic,
  deviceUpdate,
  statusMessage,
} from '../broadcast/messages';
import { AlertNotifier } from '../alerts/notifier';
import { StreamClient, StreamHandle, StreamEvent } from './stream-client';
import { AbortedError, StaleStreamError, errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('IngestLoop');

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface IngestLoopDeps<H extends StreamHandle = StreamHandle> {
  tracker: ConnectionTracker;
  address: string;
  client: StreamClient<H>;
  hub: BroadcastHub;
  alerts: AlertNotifier;
  policy: ReconnectPolicy;
  /** Treat the stream as dead when no message arrives for this long. 0 disables. */
  staleAfterMs?: number;
  sleep?: Sleep;
}

type ReceiveOutcome =
  | { kind: 'ended'; reason: string }
  | { kind: 'failed'; message: string }
  | { kind: 'aborted' };

export class TelemetryIngestLoop<H extends StreamHandle = StreamHandle> extends EventEmitter {
  readonly deviceId: string;
  readonly address: string;

  private tracker: ConnectionTracker;
  private client: StreamClient<H>;
  private hub: BroadcastHub;
  private alerts: AlertNotifier;
  private policy: ReconnectPolicy;
  private staleAfterMs: number;
  private sleep: Sleep;

  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private stopping: Promise<ConnectionState> | null = null;
  private stopPending = false;
  private stopRequests = 0;
  private _failure: Error | null = null;

  constructor(deps: IngestLoopDeps<H>) {
    super();
    this.tracker = deps.tracker;
    this.deviceId = deps.tracker.deviceId;
    this.address = deps.address;
    this.client = deps.client;
    this.hub = deps.hub;
    this.alerts = deps.alerts;
    this.policy = deps.policy;
    this.staleAfterMs = deps.staleAfterMs ?? 0;
    this.sleep = deps.sleep ?? defaultSleep;

    this.tracker.on('stateChange', (state: ConnectionState, prev: ConnectionStatus) => {
      this.emit('stateChange', state, prev);
    });
  }

  get state(): ConnectionState {
    return this.tracker.state;
  }

  /** Whether the loop task is currently running */
  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Whether a stop() teardown is still in progress */
  get isStopping(): boolean {
    return this.stopPending;
  }

  /** Set when an internal failure ended the loop; cleared by the next start. */
  get failure(): Error | null {
    return this._failure;
  }

  /**
   * Start the loop. Resolves when the loop exits (stopped, retries exhausted,
   * or failed). Calling start() on a running loop returns the same promise;
   * while a stop is still tearing down, start() does nothing.
   */
  start(): Promise<void> {
    if (this.running) return this.running;
    if (this.stopPending) return Promise.resolve();
    this.stopping = null;
    this._failure = null;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal).finally(() => {
      this.running = null;
      if (this.controller === controller) this.controller = null;
    });
    return this.running;
  }

  /** Stop monitoring. Idempotent; concurrent callers share one teardown. */
  stop(): Promise<ConnectionState> {
    this.stopRequests++;
    if (!this.stopping) {
      this.stopPending = true;
      this.stopping = this.teardown().finally(() => {
        this.stopPending = false;
      });
    }
    return this.stopping;
  }

  /**
   * Clear the retry budget ahead of an operator-initiated restart. Resolves
   * false when stop() was called after this call began; the caller must not
   * restart the loop then.
   */
  async resetForResume(): Promise<boolean> {
    const requests = this.stopRequests;
    if (this.stopping) await this.stopping;
    if (this.running) throw new Error(`Loop for ${this.deviceId} is still running`);
    await this.tracker.resetReconnectAttempts();
    return this.stopRequests === requests;
  }

  /** Operator acknowledgement of past errors; safe while the loop runs. */
  resetErrors(): Promise<ConnectionState> {
    return this.tracker.resetErrors();
  }

  private async teardown(): Promise<ConnectionState> {
    this.controller?.abort(new AbortedError('stopped'));
    if (this.running) await this.running;
    const state = await this.tracker.markStopped();
    log.info({ deviceId: this.deviceId }, 'Monitoring stopped');
    await this.hub.publish(STATUS_TOPIC, statusMessage(`${this.deviceId} stopped`));
    this.emit('stopped', state);
    return state;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      await this.tracker.markConnecting();

      while (!signal.aborted) {
        const outcome = await this.runSession(signal);
        if (outcome.kind === 'aborted' || signal.aborted) return;

        if (outcome.kind === 'ended') {
          await this.tracker.markDisconnected(outcome.reason);
        } else {
          await this.tracker.markError(outcome.message);
        }

        const decision = this.policy.decide(this.tracker.state);
        if (!decision.retry) {
          if (decision.exhausted) await this.onExhausted();
          return;
        }

        log.info(
          { deviceId: this.deviceId, attempt: decision.attempt, delayMs: decision.delayMs },
          'Scheduling reconnect',
        );
        try {
          await this.sleep(decision.delayMs, signal);
        } catch (err) {
          if (signal.aborted) return;
          throw err;
        }
        if (signal.aborted) return;

        await this.tracker.incrementReconnectAttempt();
        await this.tracker.markConnecting();
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      log.error({ deviceId: this.deviceId, error: error.message }, 'Ingest loop failed');
      this._failure = error;
      this.emit('failed', error);
    }
  }

  /** One connect + receive cycle. Never throws for upstream failures. */
  private async runSession(signal: AbortSignal): Promise<ReceiveOutcome> {
    let handle: H;
    try {
      handle = await this.client.connect(this.address, signal);
    } catch (err) {
      if (signal.aborted) return { kind: 'aborted' };
      log.warn({ deviceId: this.deviceId, error: errorMessage(err) }, 'Connect failed');
      return { kind: 'failed', message: errorMessage(err) };
    }

    try {
      if (signal.aborted) return { kind: 'aborted' };
      await this.tracker.markConnected();
      log.info({ deviceId: this.deviceId, transport: this.client.transport }, 'Stream connected');
      await this.hub.publish(STATUS_TOPIC, statusMessage(`${this.deviceId} connected`));
      return await this.receive(handle, signal);
    } finally {
      this.client.close(handle);
    }
  }

  private async receive(handle: H, signal: AbortSignal): Promise<ReceiveOutcome> {
    for (;;) {
      let event: StreamEvent;
      try {
        event = await this.nextEvent(handle, signal);
      } catch (err) {
        if (signal.aborted) return { kind: 'aborted' };
        log.warn({ deviceId: this.deviceId, error: errorMessage(err) }, 'Stream failed');
        return { kind: 'failed', message: errorMessage(err) };
      }

      if (event.kind === 'end') {
        const reason = event.reason ?? 'stream ended';
        log.warn({ deviceId: this.deviceId, reason }, 'Stream ended');
        await this.hub.publish(STATUS_TOPIC, statusMessage(`${this.deviceId} disconnected: ${reason}`));
        return { kind: 'ended', reason };
      }

      await this.tracker.receivedMessage();
      const update = deviceUpdate(this.deviceId, event.payload);
      await this.hub.publish(deviceTopic(this.deviceId), update);
      await this.hub.publish(DEVICE_UPDATES_TOPIC, update);
      this.emit('message', event.payload);
    }
  }

  /** nextMessage, cut short with StaleStreamError when the stream goes quiet. */
  private async nextEvent(handle: H, signal: AbortSignal): Promise<StreamEvent> {
    if (this.staleAfterMs <= 0) {
      return this.client.nextMessage(handle, signal);
    }

    const child = new AbortController();
    const forward = (): void => child.abort(signal.reason);
    if (signal.aborted) forward();
    signal.addEventListener('abort', forward, { once: true });
    const timer = setTimeout(() => child.abort(new StaleStreamError(this.staleAfterMs)), this.staleAfterMs);

    try {
      return await this.client.nextMessage(handle, child.signal);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', forward);
    }
  }

  private async onExhausted(): Promise<void> {
    const state = this.tracker.state;
    const reason =
      `reconnect attempts exhausted (${state.reconnectAttempts}/${state.maxReconnectAttempts}): ` +
      (state.errorMessage || state.status);
    log.error({ deviceId: this.deviceId, reason }, 'Giving up on device stream');
    try {
      await this.alerts.notify(this.deviceId, reason);
    } catch (err) {
      log.error({ deviceId: this.deviceId, error: errorMessage(err) }, 'Alert delivery failed');
    }
    this.emit('exhausted', state);
  }
}
