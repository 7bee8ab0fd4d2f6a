import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { setTimeout as delay } from 'node:timers/promises';
import { MemoryConnectionStore, YamlConnectionStore } from '../realtime/connection-store';
import { ConnectionTracker } from '../realtime/connection-tracker';
import { createConnectionState, ConnectionState, ConnectionStatus } from '../realtime/types';
import { markConnected, markError, incrementReconnectAttempt } from '../realtime/state-machine';

const T0 = new Date('2024-05-01T12:00:00.000Z');

describe('MemoryConnectionStore', () => {
  it('should save, load, list and remove', async () => {
    const store = new MemoryConnectionStore();
    const state = createConnectionState('rx-1', { connectionType: 'sse', now: T0 });
    assert.strictEqual(await store.load('rx-1'), null);
    await store.save(state);
    assert.strictEqual(await store.load('rx-1'), state);
    assert.strictEqual((await store.list()).length, 1);
    assert.strictEqual(await store.remove('rx-1'), true);
    assert.strictEqual(await store.remove('rx-1'), false);
    assert.deepStrictEqual(await store.list(), []);
  });
});

describe('YamlConnectionStore', () => {
  let dir: string;
  let store: YamlConnectionStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rf-conn-'));
    store = new YamlConnectionStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should round-trip dates and counters', async () => {
    let state = createConnectionState('rx-1', { connectionType: 'websocket', maxReconnectAttempts: 3, now: T0 });
    state = markConnected(state, new Date('2024-05-01T12:00:05.000Z'));
    state = markError(state, 'socket hang up', new Date('2024-05-01T12:01:00.000Z'));
    await store.save(state);

    const loaded = await store.load('rx-1');
    assert.deepStrictEqual(loaded, state);
  });

  it('should sanitize device ids into file names', async () => {
    await store.save(createConnectionState('rack/1 rx', { connectionType: 'sse', now: T0 }));
    assert.deepStrictEqual(fs.readdirSync(dir), ['rack_1_rx.yml']);
    const loaded = await store.load('rack/1 rx');
    assert.strictEqual(loaded?.deviceId, 'rack/1 rx');
  });

  it('should not return a record stored under a colliding file name', async () => {
    await store.save(createConnectionState('rack/1', { connectionType: 'sse', now: T0 }));
    assert.strictEqual(await store.load('rack_1'), null);
  });

  it('should list records sorted by device id and skip invalid files', async () => {
    await store.save(createConnectionState('rx-b', { connectionType: 'sse', now: T0 }));
    await store.save(createConnectionState('rx-a', { connectionType: 'sse', now: T0 }));
    fs.writeFileSync(path.join(dir, 'broken.yml'), 'status: sideways\n');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    const ids = (await store.list()).map((s) => s.deviceId);
    assert.deepStrictEqual(ids, ['rx-a', 'rx-b']);
  });

  it('should remove the record file', async () => {
    await store.save(createConnectionState('rx-1', { connectionType: 'sse', now: T0 }));
    assert.strictEqual(await store.remove('rx-1'), true);
    assert.strictEqual(await store.load('rx-1'), null);
    assert.strictEqual(await store.remove('rx-1'), false);
  });
});

describe('ConnectionTracker', () => {
  it('should persist every transition before returning it', async () => {
    const store = new MemoryConnectionStore();
    const tracker = new ConnectionTracker(
      createConnectionState('rx-1', { connectionType: 'sse', now: T0 }),
      store,
      () => T0,
    );

    const next = await tracker.markConnecting();
    assert.strictEqual(next.status, 'connecting');
    assert.strictEqual(tracker.state, next);
    assert.strictEqual(await store.load('rx-1'), next);
  });

  it('should emit stateChange only when the status changes', async () => {
    const tracker = new ConnectionTracker(
      createConnectionState('rx-1', { connectionType: 'sse', now: T0 }),
      new MemoryConnectionStore(),
      () => T0,
    );
    const changes: Array<[ConnectionStatus, ConnectionStatus]> = [];
    tracker.on('stateChange', (state: ConnectionState, prev: ConnectionStatus) => {
      changes.push([prev, state.status]);
    });

    await tracker.markConnecting();
    await tracker.markConnected();
    await tracker.receivedMessage();
    await tracker.receivedMessage();
    await tracker.markError('timeout');
    await tracker.incrementReconnectAttempt();

    assert.deepStrictEqual(changes, [
      ['disconnected', 'connecting'],
      ['connecting', 'connected'],
      ['connected', 'error'],
    ]);
    assert.strictEqual(tracker.shouldReconnect(), true);
    assert.strictEqual(tracker.state.reconnectAttempts, 1);
  });

  it('should answer queries with the injected clock', async () => {
    let now = T0;
    const tracker = new ConnectionTracker(
      createConnectionState('rx-1', { connectionType: 'sse', now: T0 }),
      new MemoryConnectionStore(),
      () => now,
    );
    await tracker.markConnected();
    now = new Date(T0.getTime() + 2500);
    assert.strictEqual(tracker.isActive(), true);
    assert.strictEqual(tracker.connectionDuration(), 2500);
    assert.strictEqual(tracker.timeSinceLastMessage(), 2500);
  });

  it('should keep the previous state when saving fails', async () => {
    const store = new MemoryConnectionStore();
    store.save = async () => {
      throw new Error('disk full');
    };
    const initial = createConnectionState('rx-1', { connectionType: 'sse', now: T0 });
    const tracker = new ConnectionTracker(initial, store, () => T0);
    await assert.rejects(tracker.markConnecting(), /disk full/);
    assert.strictEqual(tracker.state, initial);
  });

  it('should apply concurrent transitions one after another', async () => {
    const store = new MemoryConnectionStore();
    const saved: ConnectionState[] = [];
    let calls = 0;
    store.save = async (state) => {
      // the first save is the slowest
      await delay(calls++ === 0 ? 30 : 0);
      saved.push(state);
    };
    const failing = incrementReconnectAttempt(
      markError(createConnectionState('rx-1', { connectionType: 'sse', now: T0 }), 'refused', T0),
      T0,
    );
    const tracker = new ConnectionTracker(failing, store, () => T0);

    const [reset, stopped] = await Promise.all([tracker.resetReconnectAttempts(), tracker.markStopped()]);

    assert.strictEqual(reset.status, 'error');
    assert.strictEqual(reset.reconnectAttempts, 0);
    assert.strictEqual(stopped.status, 'stopped');
    assert.strictEqual(stopped.reconnectAttempts, 0);
    assert.deepStrictEqual(saved, [reset, stopped]);
    assert.strictEqual(tracker.state, stopped);
  });

  it('should run the next transition after a failed save', async () => {
    const store = new MemoryConnectionStore();
    const save = store.save.bind(store);
    let calls = 0;
    store.save = async (state) => {
      if (calls++ === 0) throw new Error('disk full');
      await save(state);
    };
    const tracker = new ConnectionTracker(createConnectionState('rx-1', { connectionType: 'sse', now: T0 }), store, () => T0);

    const [first, second] = await Promise.allSettled([tracker.markConnecting(), tracker.markStopped()]);

    assert.strictEqual(first.status, 'rejected');
    assert.strictEqual(second.status, 'fulfilled');
    assert.strictEqual(tracker.state.status, 'stopped');
    assert.strictEqual((await store.load('rx-1'))?.status, 'stopped');
  });
});
