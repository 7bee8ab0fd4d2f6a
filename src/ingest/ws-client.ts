/**
 * WebSocket stream client
 *
 * Subscribes to a vendor WebSocket endpoint with the `ws` package. Every
 * JSON text frame becomes a message event; a close frame ends the stream
 * and a socket error after open fails it.
 */

import { WebSocket, RawData } from 'ws';
import { StreamClient, StreamEvent, StreamHandle, MessageInbox, abortReason } from './stream-client';
import { StreamConnectError, StreamReadError } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('WsClient');

export interface WsClientOptions {
  headers?: Record<string, string>;
  handshakeTimeoutMs?: number;
}

export interface WsHandle extends StreamHandle {
  readonly socket: WebSocket;
  readonly inbox: MessageInbox;
}

export class WebSocketStreamClient implements StreamClient<WsHandle> {
  readonly transport = 'websocket' as const;
  private options: WsClientOptions;

  constructor(options: WsClientOptions = {}) {
    this.options = options;
  }

  connect(address: string, signal: AbortSignal): Promise<WsHandle> {
    if (signal.aborted) return Promise.reject(abortReason(signal));

    return new Promise<WsHandle>((resolve, reject) => {
      const socket = new WebSocket(address, {
        headers: this.options.headers,
        handshakeTimeout: this.options.handshakeTimeoutMs ?? 10000,
      });
      const inbox = new MessageInbox();
      let opened = false;

      const onAbort = (): void => {
        socket.terminate();
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      socket.on('open', () => {
        opened = true;
        signal.removeEventListener('abort', onAbort);
        resolve({ address, openedAt: new Date(), socket, inbox });
      });

      socket.on('unexpected-response', (_req, res) => {
        signal.removeEventListener('abort', onAbort);
        socket.terminate();
        reject(new StreamConnectError(address, `WebSocket handshake rejected: HTTP ${res.statusCode ?? 0}`));
      });

      socket.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) return;
        let payload: unknown;
        try {
          payload = JSON.parse(data.toString());
        } catch {
          log.debug({ address }, 'Skipping non-JSON frame');
          return;
        }
        inbox.push({ kind: 'message', payload, receivedAt: new Date() });
      });

      socket.on('close', (code: number, reason: Buffer) => {
        const text = reason.toString();
        inbox.push({ kind: 'end', reason: text ? `closed (${code}): ${text}` : `closed (${code})` });
      });

      socket.on('error', (err: Error) => {
        if (!opened) {
          signal.removeEventListener('abort', onAbort);
          reject(new StreamConnectError(address, `WebSocket connect failed: ${err.message}`));
          return;
        }
        inbox.fail(new StreamReadError(err.message));
      });
    });
  }

  nextMessage(handle: WsHandle, signal: AbortSignal): Promise<StreamEvent> {
    return handle.inbox.next(signal);
  }

  close(handle: WsHandle): void {
    const state = handle.socket.readyState;
    if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
      handle.socket.terminate();
    }
  }
}
