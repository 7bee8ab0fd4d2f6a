/**
 * Error types shared across the ingest and config layers.
 */

/** Upstream connect attempt failed (refused, bad status, handshake error). */
export class StreamConnectError extends Error {
  readonly address: string;

  constructor(address: string, message: string) {
    super(message);
    this.name = 'StreamConnectError';
    this.address = address;
  }
}

/** An open upstream stream failed while reading. */
export class StreamReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamReadError';
  }
}

/** No message arrived within the configured staleness window. */
export class StaleStreamError extends Error {
  readonly silentForMs: number;

  constructor(silentForMs: number) {
    super(`stale stream: no message for ${silentForMs}ms`);
    this.name = 'StaleStreamError';
    this.silentForMs = silentForMs;
  }
}

/** Raised when a pending connect/receive/wait is cut short by stop(). */
export class AbortedError extends Error {
  constructor(message = 'aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Message text for anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
