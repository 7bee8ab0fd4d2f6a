/**
 * Viewer WebSocket Gateway
 *
 * Upgrades on the HTTP server at /ws and turns each browser connection into
 * a ViewerSession subscribed to BroadcastHub topics:
 *   - always: 'status'
 *   - ws://host/ws?device=a&device=b  -> 'device:a', 'device:b'
 *   - ws://host/ws                    -> 'device-updates' (every device)
 *
 * Inbound commands (JSON text frames):
 *   { command: 'ping' }                      -> { type: 'pong' }
 *   { command: 'subscribe', device: 'a' }    -> add 'device:a', drop 'device-updates'
 *   { command: 'unsubscribe', device: 'a' }  -> drop 'device:a'
 * Anything else is ignored and the channel stays open.
 */

import * as http from 'http';
import { WebSocket, WebSocketServer, RawData } from 'ws';
import { BroadcastHub, Subscriber, SubscriptionHandle } from '../broadcast/hub';
import {
  DEVICE_UPDATES_TOPIC,
  STATUS_TOPIC,
  deviceTopic,
  parseViewerCommand,
  serializeMessage,
} from '../broadcast/messages';
import { getLogger } from '../logger';

const log = getLogger('ViewerWS');

export const VIEWER_PATH = '/ws';

/** One browser connection, registered on the hub as a Subscriber. */
export class ViewerSession implements Subscriber {
  readonly id: string;
  private ws: WebSocket;
  private hub: BroadcastHub;
  private handles = new Map<string, SubscriptionHandle>();

  constructor(id: string, ws: WebSocket, hub: BroadcastHub) {
    this.id = id;
    this.ws = ws;
    this.hub = hub;
  }

  send(payload: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`viewer ${this.id} is not open`));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(payload, (err?: Error) => (err ? reject(err) : resolve()));
    });
  }

  subscribe(topic: string): void {
    if (this.handles.has(topic)) return;
    this.handles.set(topic, this.hub.subscribe(topic, this));
  }

  unsubscribe(topic: string): void {
    const handle = this.handles.get(topic);
    if (!handle) return;
    this.hub.unsubscribe(handle);
    this.handles.delete(topic);
  }

  get topics(): string[] {
    return Array.from(this.handles.keys());
  }

  handleFrame(raw: string): void {
    const command = parseViewerCommand(raw);
    if (!command) {
      log.debug({ viewer: this.id }, 'Ignoring unrecognized viewer message');
      return;
    }
    switch (command.command) {
      case 'ping':
        if (this.ws.readyState === WebSocket.OPEN) {
          this.ws.send(serializeMessage({ type: 'pong' }));
        }
        break;
      case 'subscribe':
        // device-updates already carries this device's updates
        this.unsubscribe(DEVICE_UPDATES_TOPIC);
        this.subscribe(deviceTopic(command.device));
        break;
      case 'unsubscribe':
        this.unsubscribe(deviceTopic(command.device));
        break;
    }
  }

  /** Leave every topic. Safe to call more than once. */
  close(): void {
    for (const handle of this.handles.values()) {
      this.hub.unsubscribe(handle);
    }
    this.handles.clear();
  }
}

export class ViewerGateway {
  private wss: WebSocketServer | null = null;
  private hub: BroadcastHub;
  private sessions = new Set<ViewerSession>();
  private nextId = 1;

  constructor(hub: BroadcastHub) {
    this.hub = hub;
  }

  /** Attach to an existing HTTP server using upgrade */
  attach(server: http.Server): void {
    this.wss = new WebSocketServer({ server, path: VIEWER_PATH });

    this.wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
      const session = new ViewerSession(`viewer-${this.nextId++}`, ws, this.hub);
      this.sessions.add(session);

      session.subscribe(STATUS_TOPIC);
      const devices = requestedDevices(req.url);
      if (devices.length === 0) {
        session.subscribe(DEVICE_UPDATES_TOPIC);
      } else {
        for (const device of devices) session.subscribe(deviceTopic(device));
      }
      log.info({ viewer: session.id, topics: session.topics, total: this.sessions.size }, 'Viewer connected');

      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) return;
        session.handleFrame(data.toString());
      });

      ws.on('close', () => {
        session.close();
        this.sessions.delete(session);
        log.info({ viewer: session.id, total: this.sessions.size }, 'Viewer disconnected');
      });

      ws.on('error', (err: Error) => {
        log.warn({ viewer: session.id, error: err.message }, 'Viewer socket error');
      });
    });

    this.wss.on('error', (err: Error) => {
      log.error({ error: err.message }, 'WebSocket server error');
    });
  }

  /** Number of connected viewers */
  get clientCount(): number {
    return this.sessions.size;
  }

  stop(): void {
    for (const session of this.sessions) session.close();
    this.sessions.clear();
    if (this.wss) {
      for (const client of this.wss.clients) {
        client.close();
      }
      this.wss.close();
      this.wss = null;
    }
  }
}

/** Device ids from `?device=` query parameters. */
export function requestedDevices(url: string | undefined): string[] {
  if (!url) return [];
  const params = new URL(url, 'http://localhost').searchParams;
  return params.getAll('device').filter((d) => d.length > 0);
}
