/**
 * Vendor Stream Client Interface
 *
 * The ingest loop drives any upstream transport through these three calls.
 * Failures are thrown (StreamConnectError / StreamReadError); a clean end of
 * stream is a value, not an exception. Every suspending call takes the
 * loop's AbortSignal and must settle promptly once it fires.
 */

import { ConnectionType } from '../realtime/types';

export interface StreamHandle {
  readonly address: string;
  readonly openedAt: Date;
}

export type StreamEvent =
  | { kind: 'message'; payload: unknown; receivedAt: Date }
  | { kind: 'end'; reason?: string };

export interface StreamClient<H extends StreamHandle = StreamHandle> {
  readonly transport: ConnectionType;
  connect(address: string, signal: AbortSignal): Promise<H>;
  nextMessage(handle: H, signal: AbortSignal): Promise<StreamEvent>;
  close(handle: H): void;
}

/**
 * Pull-based buffer between a push-style transport (socket events, a parsed
 * byte stream) and nextMessage(). At most one pending reader at a time.
 */
export class MessageInbox {
  private queue: StreamEvent[] = [];
  private failure: Error | null = null;
  private waiter: {
    resolve: (event: StreamEvent) => void;
    reject: (err: Error) => void;
  } | null = null;

  push(event: StreamEvent): void {
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(event);
      return;
    }
    this.queue.push(event);
  }

  fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(err);
    }
  }

  next(signal: AbortSignal): Promise<StreamEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (signal.aborted) return Promise.reject(abortReason(signal));

    return new Promise<StreamEvent>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (event) => {
          signal.removeEventListener('abort', onAbort);
          resolve(event);
        },
        reject: (err) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
    });
  }

  get size(): number {
    return this.queue.length;
  }
}

/** The signal's reason as an Error. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new Error(typeof reason === 'string' ? reason : 'aborted');
}
