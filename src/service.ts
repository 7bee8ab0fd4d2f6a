/**
 * TelemetryService
 *
 * Wires the pieces together from a loaded config: connection store,
 * broadcast hub, alerting, one ingest loop per configured device, the
 * viewer WebSocket gateway and the HTTP API.
 */

import { AppConfig } from './config-schema';
import { BroadcastHub } from './broadcast/hub';
import { AlertNotifier, BroadcastAlertNotifier, CompositeAlertNotifier, LogAlertNotifier } from './alerts/notifier';
import { ConnectionStore, MemoryConnectionStore, YamlConnectionStore } from './realtime/connection-store';
import { ReconnectPolicy } from './realtime/reconnect-policy';
import { ConnectionState, ConnectionType } from './realtime/types';
import { IngestSupervisor, StreamClientFactory } from './ingest/supervisor';
import { StreamClient } from './ingest/stream-client';
import { SseStreamClient } from './ingest/sse-client';
import { WebSocketStreamClient } from './ingest/ws-client';
import { ViewerGateway } from './server/viewer-ws';
import { HttpServer } from './server/http-server';
import { ConnectionSummary, summarize } from './status-reporter';
import { getLogger } from './logger';

const log = getLogger('Service');

export interface ServiceOverrides {
  store?: ConnectionStore;
  clientFor?: StreamClientFactory;
  alerts?: AlertNotifier;
}

export function createStore(config: AppConfig): ConnectionStore {
  return config.storage.type === 'memory'
    ? new MemoryConnectionStore()
    : new YamlConnectionStore(config.storage.dataDir);
}

export function createClientFactory(config: AppConfig): StreamClientFactory {
  const sse = new SseStreamClient({ headers: config.vendor.headers });
  const ws = new WebSocketStreamClient({
    headers: config.vendor.headers,
    handshakeTimeoutMs: config.vendor.handshakeTimeoutMs,
  });
  return (type: ConnectionType): StreamClient => (type === 'sse' ? sse : ws);
}

export class TelemetryService {
  readonly hub: BroadcastHub;
  readonly supervisor: IngestSupervisor;
  private config: AppConfig;
  private gateway: ViewerGateway;
  private http: HttpServer;
  private startedAt = 0;

  constructor(config: AppConfig, overrides: ServiceOverrides = {}) {
    this.config = config;
    this.hub = new BroadcastHub();

    const alerts = overrides.alerts ?? new CompositeAlertNotifier([
      new LogAlertNotifier(),
      new BroadcastAlertNotifier(this.hub),
    ]);

    this.supervisor = new IngestSupervisor({
      store: overrides.store ?? createStore(config),
      hub: this.hub,
      alerts,
      policy: new ReconnectPolicy({
        baseDelayMs: config.reconnect.baseDelayMs,
        maxDelayMs: config.reconnect.maxDelayMs,
        jitter: config.reconnect.jitter,
      }),
      clientFor: overrides.clientFor ?? createClientFactory(config),
      staleAfterMs: config.staleAfterMs,
    });

    this.gateway = new ViewerGateway(this.hub);
    this.http = new HttpServer({
      getSummary: () => this.getSummary(),
      getStates: () => this.supervisor.getStates(),
      stopDevice: (id) => this.supervisor.stop(id),
      resumeDevice: (id) => this.supervisor.resume(id),
      resetDeviceErrors: (id) => this.supervisor.resetErrors(id),
      viewerGateway: this.gateway,
    });
  }

  /** Register configured devices, start the HTTP server and every loop. Resolves with the bound port. */
  async start(): Promise<number> {
    this.startedAt = Date.now();
    for (const device of this.config.devices) {
      await this.supervisor.register({
        deviceId: device.id,
        address: device.address,
        connectionType: device.type,
        maxReconnectAttempts: device.maxReconnectAttempts ?? this.config.reconnect.maxAttempts,
      });
    }

    const port = await this.http.start(this.config.server.port, this.config.server.host);
    this.supervisor.startAll();
    log.info({ devices: this.supervisor.size, port }, 'Telemetry service started');
    return port;
  }

  async stop(): Promise<void> {
    await this.supervisor.stopAll();
    await this.http.stop();
    this.hub.clear();
    log.info({ uptimeMs: Date.now() - this.startedAt }, 'Telemetry service stopped');
  }

  getStates(): ConnectionState[] {
    return this.supervisor.getStates();
  }

  getSummary(): ConnectionSummary {
    return summarize(
      this.supervisor.getStates(),
      this.config.staleAfterMs,
      new Date(),
      this.supervisor.getUnmonitored(),
    );
  }
}
