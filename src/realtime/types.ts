/**
 * Real-time Connection Types
 *
 * Persisted per-device record of the upstream streaming connection
 * (SSE or WebSocket) and the settings that drive reconnection.
 */

export type ConnectionType = 'sse' | 'websocket';

/** Connection status. `stopped` is terminal until an explicit resume. */
export type ConnectionStatus = 'connecting' | 'connected' | 'disconnected' | 'error' | 'stopped';

export const CONNECTION_STATUSES: readonly ConnectionStatus[] = [
  'connecting',
  'connected',
  'disconnected',
  'error',
  'stopped',
];

export interface ConnectionState {
  readonly deviceId: string;
  readonly connectionType: ConnectionType;
  readonly status: ConnectionStatus;
  readonly connectedAt: Date | null;
  readonly lastMessageAt: Date | null;
  readonly disconnectedAt: Date | null;
  /** Last error text, '' when none */
  readonly errorMessage: string;
  /** Consecutive errors since the last successful connect */
  readonly errorCount: number;
  readonly lastErrorAt: Date | null;
  /** Retries issued since the last successful connect */
  readonly reconnectAttempts: number;
  readonly maxReconnectAttempts: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export const DEFAULT_MAX_RECONNECT_ATTEMPTS = 5;

export interface NewConnectionOptions {
  connectionType: ConnectionType;
  maxReconnectAttempts?: number;
  now?: Date;
}

/** A fresh record for a device newly registered for monitoring. */
export function createConnectionState(deviceId: string, options: NewConnectionOptions): ConnectionState {
  const now = options.now ?? new Date();
  return {
    deviceId,
    connectionType: options.connectionType,
    status: 'disconnected',
    connectedAt: null,
    lastMessageAt: null,
    disconnectedAt: null,
    errorMessage: '',
    errorCount: 0,
    lastErrorAt: null,
    reconnectAttempts: 0,
    maxReconnectAttempts: options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS,
    createdAt: now,
    updatedAt: now,
  };
}
