/**
 * HTTP Server
 *
 * Operator and health endpoints, plus the viewer WebSocket upgrade:
 *   GET  /ping                          -> 'pong'
 *   GET  /health                        -> connection summary (503 when degraded)
 *   GET  /api/connections               -> every ConnectionState
 *   GET  /api/connections/:id           -> one ConnectionState
 *   POST /api/connections/:id/stop      -> stop monitoring the device
 *   POST /api/connections/:id/resume    -> reset retry budget and reconnect
 *   POST /api/connections/:id/reset-errors -> zero the error counter
 *   WS   /ws                            -> viewer sessions (see viewer-ws.ts)
 */

import * as http from 'http';
import { ConnectionState } from '../realtime/types';
import { ConnectionSummary } from '../status-reporter';
import { ViewerGateway } from './viewer-ws';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('HttpServer');

export interface HttpServerDeps {
  getSummary: () => ConnectionSummary;
  getStates: () => ConnectionState[];
  stopDevice: (deviceId: string) => Promise<ConnectionState | null>;
  resumeDevice: (deviceId: string) => Promise<ConnectionState | null>;
  resetDeviceErrors: (deviceId: string) => Promise<ConnectionState | null>;
  viewerGateway: ViewerGateway;
}

const CONNECTION_ACTION = /^\/api\/connections\/([^/]+)\/(stop|resume|reset-errors)$/;
const CONNECTION_ITEM = /^\/api\/connections\/([^/]+)$/;

export class HttpServer {
  private server?: http.Server;
  private deps: HttpServerDeps;

  constructor(deps: HttpServerDeps) {
    this.deps = deps;
  }

  /** Listen and resolve with the bound port (useful with port 0). */
  start(port: number, host = '0.0.0.0'): Promise<number> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error({ url: req.url, error: errorMessage(err) }, 'Request failed');
        if (!res.headersSent) sendJson(res, 500, { error: 'internal error' });
      });
    });
    this.server = server;
    this.deps.viewerGateway.attach(server);

    server.on('error', (err: NodeJS.ErrnoException) => {
      log.error({ error: err.message }, 'HTTP server error');
    });

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        const bound = address && typeof address === 'object' ? address.port : port;
        log.info({ port: bound }, 'HTTP server started');
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    this.deps.viewerGateway.stop();
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (method === 'GET' && pathname === '/ping') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('pong');
      return;
    }

    if (method === 'GET' && pathname === '/health') {
      const summary = this.deps.getSummary();
      sendJson(res, summary.status === 'ok' ? 200 : 503, summary);
      return;
    }

    if (method === 'GET' && pathname === '/api/connections') {
      sendJson(res, 200, this.deps.getStates());
      return;
    }

    const action = CONNECTION_ACTION.exec(pathname);
    if (action) {
      if (method !== 'POST') {
        sendJson(res, 405, { error: 'method not allowed' });
        return;
      }
      const deviceId = decodeURIComponent(action[1]);
      const state = await this.runAction(action[2], deviceId);
      if (!state) {
        sendJson(res, 404, { error: `unknown device: ${deviceId}` });
        return;
      }
      sendJson(res, 200, state);
      return;
    }

    const item = CONNECTION_ITEM.exec(pathname);
    if (method === 'GET' && item) {
      const deviceId = decodeURIComponent(item[1]);
      const state = this.deps.getStates().find((s) => s.deviceId === deviceId);
      if (!state) {
        sendJson(res, 404, { error: `unknown device: ${deviceId}` });
        return;
      }
      sendJson(res, 200, state);
      return;
    }

    sendJson(res, 404, { error: 'not found' });
  }

  private runAction(action: string, deviceId: string): Promise<ConnectionState | null> {
    switch (action) {
      case 'stop':
        return this.deps.stopDevice(deviceId);
      case 'resume':
        return this.deps.resumeDevice(deviceId);
      default:
        return this.deps.resetDeviceErrors(deviceId);
    }
  }
}

function sendJson(res: http.ServerResponse, code: number, body: unknown): void {
  res.writeHead(code, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body, null, 2));
}
