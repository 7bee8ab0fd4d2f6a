/**
 * Connection Persistence
 *
 * Storage for ConnectionState records. The ingest layer only depends on the
 * ConnectionStore interface; two implementations ship here:
 *   - MemoryConnectionStore: tests and ephemeral runs
 *   - YamlConnectionStore: one YAML file per device under a data directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ConnectionState } from './types';
import { getLogger } from '../logger';

const log = getLogger('ConnectionStore');

export interface ConnectionStore {
  load(deviceId: string): Promise<ConnectionState | null>;
  save(state: ConnectionState): Promise<void>;
  list(): Promise<ConnectionState[]>;
  /** Cascade delete when the owning device goes away. */
  remove(deviceId: string): Promise<boolean>;
}

export class MemoryConnectionStore implements ConnectionStore {
  private records = new Map<string, ConnectionState>();

  async load(deviceId: string): Promise<ConnectionState | null> {
    return this.records.get(deviceId) ?? null;
  }

  async save(state: ConnectionState): Promise<void> {
    this.records.set(state.deviceId, state);
  }

  async list(): Promise<ConnectionState[]> {
    return Array.from(this.records.values());
  }

  async remove(deviceId: string): Promise<boolean> {
    return this.records.delete(deviceId);
  }
}

// --- YAML file store ---

const isoDate = z.string().datetime().transform((s) => new Date(s));
const nullableDate = isoDate.nullable().default(null);

const storedConnectionSchema = z.object({
  deviceId: z.string().min(1),
  connectionType: z.enum(['sse', 'websocket']),
  status: z.enum(['connecting', 'connected', 'disconnected', 'error', 'stopped']),
  connectedAt: nullableDate,
  lastMessageAt: nullableDate,
  disconnectedAt: nullableDate,
  errorMessage: z.string().default(''),
  errorCount: z.number().int().min(0).default(0),
  lastErrorAt: nullableDate,
  reconnectAttempts: z.number().int().min(0).default(0),
  maxReconnectAttempts: z.number().int().min(0).default(5),
  createdAt: isoDate,
  updatedAt: isoDate,
});

function toDocument(state: ConnectionState): Record<string, unknown> {
  const iso = (d: Date | null): string | null => (d ? d.toISOString() : null);
  return {
    deviceId: state.deviceId,
    connectionType: state.connectionType,
    status: state.status,
    connectedAt: iso(state.connectedAt),
    lastMessageAt: iso(state.lastMessageAt),
    disconnectedAt: iso(state.disconnectedAt),
    errorMessage: state.errorMessage,
    errorCount: state.errorCount,
    lastErrorAt: iso(state.lastErrorAt),
    reconnectAttempts: state.reconnectAttempts,
    maxReconnectAttempts: state.maxReconnectAttempts,
    createdAt: state.createdAt.toISOString(),
    updatedAt: state.updatedAt.toISOString(),
  };
}

export class YamlConnectionStore implements ConnectionStore {
  private dataDir: string;

  constructor(dataDir?: string) {
    this.dataDir = dataDir ?? path.join(process.cwd(), 'data', 'connections');
  }

  private ensureDir(): void {
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }
  }

  private filePath(deviceId: string): string {
    const safeName = deviceId.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.dataDir, `${safeName}.yml`);
  }

  private readFile(filePath: string): ConnectionState | null {
    const doc: unknown = parseYaml(fs.readFileSync(filePath, 'utf-8'));
    const result = storedConnectionSchema.safeParse(doc);
    if (!result.success) {
      log.warn({ file: filePath, issues: result.error.issues.length }, 'Ignoring invalid connection record');
      return null;
    }
    return result.data;
  }

  async load(deviceId: string): Promise<ConnectionState | null> {
    const filePath = this.filePath(deviceId);
    if (!fs.existsSync(filePath)) return null;
    const state = this.readFile(filePath);
    // Two ids can sanitize to the same file name; never hand back the other one.
    return state && state.deviceId === deviceId ? state : null;
  }

  async save(state: ConnectionState): Promise<void> {
    this.ensureDir();
    const filePath = this.filePath(state.deviceId);
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, stringifyYaml(toDocument(state)), 'utf-8');
    fs.renameSync(tmpPath, filePath);
  }

  async list(): Promise<ConnectionState[]> {
    this.ensureDir();
    const states: ConnectionState[] = [];
    for (const file of fs.readdirSync(this.dataDir)) {
      if (!file.endsWith('.yml')) continue;
      const state = this.readFile(path.join(this.dataDir, file));
      if (state) states.push(state);
    }
    return states.sort((a, b) => a.deviceId.localeCompare(b.deviceId));
  }

  async remove(deviceId: string): Promise<boolean> {
    const filePath = this.filePath(deviceId);
    if (!fs.existsSync(filePath)) return false;
    fs.unlinkSync(filePath);
    return true;
  }
}
