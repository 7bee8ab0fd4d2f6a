/**
 * Ingest Supervisor
 *
 * Registers monitored devices, creates their ConnectionState records on
 * first sight, and owns one TelemetryIngestLoop per device. Loops run
 * independently: stopping or resuming one device never touches another.
 */

import { BroadcastHub } from '../broadcast/hub';
import { AlertNotifier } from '../alerts/notifier';
import { ConnectionStore } from '../realtime/connection-store';
import { ConnectionTracker, Clock } from '../realtime/connection-tracker';
import { ReconnectPolicy } from '../realtime/reconnect-policy';
import { ConnectionState, ConnectionStatus, ConnectionType, createConnectionState } from '../realtime/types';
import { TelemetryIngestLoop, Sleep } from './ingest-loop';
import { StreamClient } from './stream-client';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('Supervisor');

export interface MonitoredDevice {
  deviceId: string;
  /** Vendor stream URL for this device */
  address: string;
  connectionType: ConnectionType;
  maxReconnectAttempts?: number;
}

export type StreamClientFactory = (type: ConnectionType) => StreamClient;

export interface SupervisorDeps {
  store: ConnectionStore;
  hub: BroadcastHub;
  alerts: AlertNotifier;
  policy: ReconnectPolicy;
  clientFor: StreamClientFactory;
  staleAfterMs?: number;
  clock?: Clock;
  sleep?: Sleep;
}

export class IngestSupervisor {
  private loops = new Map<string, TelemetryIngestLoop>();
  private deps: SupervisorDeps;

  constructor(deps: SupervisorDeps) {
    this.deps = deps;
  }

  /** Load or create the device's record and build its loop (not started). */
  async register(device: MonitoredDevice): Promise<TelemetryIngestLoop> {
    if (this.loops.has(device.deviceId)) {
      throw new Error(`Device already registered: ${device.deviceId}`);
    }

    const { store } = this.deps;
    let state = await store.load(device.deviceId);
    if (!state) {
      state = createConnectionState(device.deviceId, {
        connectionType: device.connectionType,
        maxReconnectAttempts: device.maxReconnectAttempts,
        now: this.deps.clock?.(),
      });
      await store.save(state);
      log.info({ deviceId: device.deviceId, type: device.connectionType }, 'Created connection record');
    } else if (
      state.connectionType !== device.connectionType ||
      (device.maxReconnectAttempts !== undefined && state.maxReconnectAttempts !== device.maxReconnectAttempts)
    ) {
      state = {
        ...state,
        connectionType: device.connectionType,
        maxReconnectAttempts: device.maxReconnectAttempts ?? state.maxReconnectAttempts,
      };
      await store.save(state);
    }

    const tracker = new ConnectionTracker(state, store, this.deps.clock);
    const loop = new TelemetryIngestLoop({
      tracker,
      address: device.address,
      client: this.deps.clientFor(device.connectionType),
      hub: this.deps.hub,
      alerts: this.deps.alerts,
      policy: this.deps.policy,
      staleAfterMs: this.deps.staleAfterMs,
      sleep: this.deps.sleep,
    });

    loop.on('stateChange', (next: ConnectionState, prev: ConnectionStatus) => {
      log.debug({ deviceId: next.deviceId, prev, status: next.status }, 'Connection state change');
    });
    loop.on('failed', (err: Error) => {
      this.deps.alerts.notify(device.deviceId, `ingest loop failed: ${err.message}`).catch((alertErr: unknown) => {
        log.error({ deviceId: device.deviceId, error: errorMessage(alertErr) }, 'Alert delivery failed');
      });
    });

    this.loops.set(device.deviceId, loop);
    return loop;
  }

  /** Start every registered loop that is not already running. */
  startAll(): void {
    for (const loop of this.loops.values()) {
      this.launch(loop);
    }
  }

  start(deviceId: string): boolean {
    const loop = this.loops.get(deviceId);
    if (!loop) return false;
    this.launch(loop);
    return true;
  }

  async stop(deviceId: string): Promise<ConnectionState | null> {
    const loop = this.loops.get(deviceId);
    if (!loop) return null;
    return loop.stop();
  }

  /**
   * Operator resume: clears the retry budget and restarts the loop, which
   * issues a fresh markConnecting. Works for stopped, exhausted and failed
   * devices. A stop that arrives while the reset is saved wins.
   */
  async resume(deviceId: string): Promise<ConnectionState | null> {
    const loop = this.loops.get(deviceId);
    if (!loop) return null;
    if (loop.isRunning && !loop.isStopping) return loop.state;
    if (!(await loop.resetForResume())) {
      log.info({ deviceId }, 'Resume cancelled by stop');
      return loop.state;
    }
    this.launch(loop);
    return loop.state;
  }

  resetErrors(deviceId: string): Promise<ConnectionState | null> {
    const loop = this.loops.get(deviceId);
    if (!loop) return Promise.resolve(null);
    return loop.resetErrors();
  }

  /** Stop a device and drop its record (device removed). */
  async remove(deviceId: string): Promise<boolean> {
    const loop = this.loops.get(deviceId);
    if (loop) {
      await loop.stop();
      loop.removeAllListeners();
      this.loops.delete(deviceId);
    }
    return this.deps.store.remove(deviceId);
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.loops.values()).map((loop) => loop.stop()));
  }

  getLoop(deviceId: string): TelemetryIngestLoop | undefined {
    return this.loops.get(deviceId);
  }

  getStates(): ConnectionState[] {
    return Array.from(this.loops.values()).map((loop) => loop.state);
  }

  /** Devices whose loop died on an internal failure and was not restarted. */
  getUnmonitored(): string[] {
    return Array.from(this.loops.values())
      .filter((loop) => !loop.isRunning && loop.failure !== null && loop.state.status !== 'stopped')
      .map((loop) => loop.deviceId);
  }

  get size(): number {
    return this.loops.size;
  }

  private launch(loop: TelemetryIngestLoop): void {
    if (loop.isRunning) return;
    // run() handles its own failures and reports them as 'failed'
    loop.start().catch((err: unknown) => {
      log.error({ deviceId: loop.deviceId, error: String(err) }, 'Loop exited unexpectedly');
    });
  }
}
