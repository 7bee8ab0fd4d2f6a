/**
 * Server-Sent Events stream client
 *
 * Opens a long-lived GET against the vendor subscription URL and turns
 * `data:` events into StreamEvents. Multi-line data fields are joined with
 * '\n' per the EventSource format; comment lines (':') are keep-alives.
 * Events whose data is not JSON are skipped.
 */

import { StreamClient, StreamEvent, StreamHandle, MessageInbox } from './stream-client';
import { StreamConnectError, StreamReadError, errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('SseClient');

export interface SseEvent {
  event: string;
  data: string;
  id?: string;
}

/** Incremental text/event-stream parser. Feed it decoded chunks. */
export class SseParser {
  private buffer = '';
  private dataLines: string[] = [];
  private eventName = '';
  private lastId: string | undefined;

  feed(chunk: string): SseEvent[] {
    this.buffer += chunk;
    const events: SseEvent[] = [];

    let newline = this.buffer.search(/\r\n|\r|\n/);
    while (newline !== -1) {
      // A trailing '\r' may be the first half of a '\r\n' split across chunks.
      if (newline === this.buffer.length - 1 && this.buffer.endsWith('\r')) break;
      const line = this.buffer.slice(0, newline);
      const sepLength = this.buffer.startsWith('\r\n', newline) ? 2 : 1;
      this.buffer = this.buffer.slice(newline + sepLength);

      const event = this.processLine(line);
      if (event) events.push(event);
      newline = this.buffer.search(/\r\n|\r|\n/);
    }
    return events;
  }

  private processLine(line: string): SseEvent | null {
    if (line === '') {
      if (this.dataLines.length === 0) {
        this.eventName = '';
        return null;
      }
      const event: SseEvent = {
        event: this.eventName || 'message',
        data: this.dataLines.join('\n'),
        id: this.lastId,
      };
      this.dataLines = [];
      this.eventName = '';
      return event;
    }
    if (line.startsWith(':')) return null;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        this.dataLines.push(value);
        break;
      case 'event':
        this.eventName = value;
        break;
      case 'id':
        this.lastId = value;
        break;
      default:
        // retry and unknown fields are not used
        break;
    }
    return null;
  }
}

export interface SseClientOptions {
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

export interface SseHandle extends StreamHandle {
  readonly controller: AbortController;
  readonly inbox: MessageInbox;
}

export class SseStreamClient implements StreamClient<SseHandle> {
  readonly transport = 'sse' as const;
  private headers: Record<string, string>;
  private fetchImpl: typeof fetch;

  constructor(options: SseClientOptions = {}) {
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async connect(address: string, signal: AbortSignal): Promise<SseHandle> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal.reason);
    if (signal.aborted) onAbort();
    signal.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(address, {
        headers: { Accept: 'text/event-stream', 'Cache-Control': 'no-cache', ...this.headers },
        signal: controller.signal,
      });
    } catch (err) {
      signal.removeEventListener('abort', onAbort);
      if (signal.aborted) throw err;
      throw new StreamConnectError(address, `SSE connect failed: ${errorMessage(err)}`);
    }

    if (!response.ok || !response.body) {
      signal.removeEventListener('abort', onAbort);
      controller.abort();
      throw new StreamConnectError(address, `SSE connect failed: HTTP ${response.status}`);
    }

    const handle: SseHandle = {
      address,
      openedAt: new Date(),
      controller,
      inbox: new MessageInbox(),
    };
    // The loop's signal keeps aborting the body read; detach once it closes.
    controller.signal.addEventListener('abort', () => signal.removeEventListener('abort', onAbort), { once: true });

    this.pump(handle, response.body).catch((err: unknown) => {
      handle.inbox.fail(new StreamReadError(errorMessage(err)));
    });
    return handle;
  }

  nextMessage(handle: SseHandle, signal: AbortSignal): Promise<StreamEvent> {
    return handle.inbox.next(signal);
  }

  close(handle: SseHandle): void {
    handle.controller.abort();
  }

  private async pump(handle: SseHandle, body: NonNullable<Response['body']>): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    const parser = new SseParser();

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          handle.inbox.push({ kind: 'end', reason: 'stream closed by server' });
          return;
        }
        for (const event of parser.feed(decoder.decode(value, { stream: true }))) {
          this.deliver(handle, event);
        }
      }
    } catch (err) {
      if (handle.controller.signal.aborted) {
        handle.inbox.push({ kind: 'end', reason: 'closed' });
        return;
      }
      throw err;
    } finally {
      reader.releaseLock();
    }
  }

  private deliver(handle: SseHandle, event: SseEvent): void {
    let payload: unknown;
    try {
      payload = JSON.parse(event.data);
    } catch {
      log.debug({ address: handle.address, event: event.event }, 'Skipping non-JSON SSE data');
      return;
    }
    handle.inbox.push({ kind: 'message', payload, receivedAt: new Date() });
  }
}
