/**
 * Broadcast Protocol
 *
 * Topic naming and the JSON envelopes delivered to viewer sessions:
 *   { type: 'device_update', deviceId, data }
 *   { type: 'status', message }
 *   { type: 'pong' }
 *
 * Inbound viewer commands are validated with zod; anything that does not
 * parse is reported as null and ignored by the session.
 */

import { z } from 'zod';

/** Catch-all topic carrying every device's updates */
export const DEVICE_UPDATES_TOPIC = 'device-updates';

/** Human-readable status/alert lines */
export const STATUS_TOPIC = 'status';

export function deviceTopic(deviceId: string): string {
  return `device:${deviceId}`;
}

export interface DeviceUpdateMessage {
  type: 'device_update';
  deviceId: string;
  data: unknown;
}

export interface StatusMessage {
  type: 'status';
  message: string;
}

export interface PongMessage {
  type: 'pong';
}

export type BroadcastMessage = DeviceUpdateMessage | StatusMessage | PongMessage;

export function deviceUpdate(deviceId: string, data: unknown): DeviceUpdateMessage {
  return { type: 'device_update', deviceId, data };
}

export function statusMessage(message: string): StatusMessage {
  return { type: 'status', message };
}

export function serializeMessage(message: BroadcastMessage): string {
  return JSON.stringify(message);
}

// --- Viewer commands ---

const viewerCommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('ping') }),
  z.object({ command: z.literal('subscribe'), device: z.string().min(1) }),
  z.object({ command: z.literal('unsubscribe'), device: z.string().min(1) }),
]);

export type ViewerCommand = z.infer<typeof viewerCommandSchema>;

/** Parse a raw text frame from a viewer. Returns null for anything unrecognized. */
export function parseViewerCommand(raw: string): ViewerCommand | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = viewerCommandSchema.safeParse(data);
  return result.success ? result.data : null;
}
