/**
 * Status Reporter
 *
 * Builds connection summaries for the /health endpoint and the
 * `--status` console report.
 */

import { ConnectionState, ConnectionStatus, CONNECTION_STATUSES } from './realtime/types';
import { connectionDuration, connectionUptime, isHealthy, timeSinceLastMessage } from './realtime/state-machine';

export interface ConnectionSummary {
  status: 'ok' | 'degraded';
  total: number;
  byStatus: Record<ConnectionStatus, number>;
  /** Connected, monitored and not stale, as a share of all connections */
  healthyPercentage: number;
  averageErrorCount: number | null;
  /** Connected devices with no message inside the staleness window */
  stale: string[];
  /** Devices whose ingest loop died on an internal failure */
  unmonitored: string[];
  generatedAt: string;
}

export function summarize(
  states: ConnectionState[],
  staleAfterMs: number,
  now: Date = new Date(),
  unmonitored: string[] = [],
): ConnectionSummary {
  const byStatus: Record<ConnectionStatus, number> = {
    connecting: 0,
    connected: 0,
    disconnected: 0,
    error: 0,
    stopped: 0,
  };
  let healthy = 0;
  let errorTotal = 0;
  const stale: string[] = [];

  for (const state of states) {
    byStatus[state.status]++;
    errorTotal += state.errorCount;
    if (state.status !== 'connected' || unmonitored.includes(state.deviceId)) continue;
    if (staleAfterMs <= 0 || isHealthy(state, staleAfterMs, now)) {
      healthy++;
    } else {
      stale.push(state.deviceId);
    }
  }

  const total = states.length;
  return {
    status: byStatus.error === 0 && stale.length === 0 && unmonitored.length === 0 ? 'ok' : 'degraded',
    total,
    byStatus,
    healthyPercentage: total === 0 ? 0 : (healthy / total) * 100,
    averageErrorCount: total === 0 ? null : errorTotal / total,
    stale,
    unmonitored,
    generatedAt: now.toISOString(),
  };
}

/** "1h 2m 3s" style duration */
export function formatDuration(ms: number): string {
  const totalSec = Math.floor(ms / 1000);
  const days = Math.floor(totalSec / 86400);
  const hours = Math.floor((totalSec % 86400) / 3600);
  const mins = Math.floor((totalSec % 3600) / 60);
  const secs = totalSec % 60;
  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (mins > 0) parts.push(`${mins}m`);
  parts.push(`${secs}s`);
  return parts.join(' ');
}

export function formatConsoleReport(
  summary: ConnectionSummary,
  states: ConnectionState[],
  verbose: boolean,
  now: Date = new Date(),
): string {
  const lines: string[] = [
    'Real-time connection status',
    '-'.repeat(40),
    `Total connections: ${summary.total}`,
  ];
  for (const status of CONNECTION_STATUSES) {
    lines.push(`  ${status.padEnd(12)} ${summary.byStatus[status]}`);
  }
  lines.push(`Healthy: ${summary.healthyPercentage.toFixed(1)}%`);
  if (summary.stale.length > 0) {
    lines.push(`Stale: ${summary.stale.join(', ')}`);
  }
  if (summary.unmonitored.length > 0) {
    lines.push(`Unmonitored: ${summary.unmonitored.join(', ')}`);
  }

  if (!verbose) return lines.join('\n');

  if (states.length === 0) {
    lines.push('', 'No connections found.');
    return lines.join('\n');
  }

  lines.push('', 'Connections', '-'.repeat(40));
  for (const state of states) {
    lines.push(`${state.deviceId} [${state.connectionType}]: ${state.status.toUpperCase()}`);
    if (state.connectedAt) lines.push(`  Connected: ${state.connectedAt.toISOString()}`);
    const sinceLast = timeSinceLastMessage(state, now);
    if (sinceLast !== undefined) lines.push(`  Last message: ${formatDuration(sinceLast)} ago`);
    const duration = connectionDuration(state, now);
    if (duration !== undefined) {
      lines.push(`  Duration: ${formatDuration(duration)}`);
    } else {
      const lastSession = connectionUptime(state, now);
      if (lastSession !== undefined) lines.push(`  Last session: ${formatDuration(lastSession)}`);
    }
    if (state.errorMessage) lines.push(`  Error (${state.errorCount}): ${state.errorMessage}`);
    if (state.reconnectAttempts > 0) {
      lines.push(`  Reconnect attempts: ${state.reconnectAttempts}/${state.maxReconnectAttempts}`);
    }
  }
  return lines.join('\n');
}
