import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { HttpServer } from '../server/http-server';
import { ViewerGateway } from '../server/viewer-ws';
import { BroadcastHub } from '../broadcast/hub';
import { createConnectionState, ConnectionState } from '../realtime/types';
import { markConnected, markError, markStopped, resetErrors } from '../realtime/state-machine';
import { summarize } from '../status-reporter';

const T0 = new Date('2024-05-01T12:00:00.000Z');

describe('HttpServer', () => {
  let states: ConnectionState[];
  let server: HttpServer;
  let base: string;
  let unmonitored: string[] = [];
  const calls: string[] = [];

  before(async () => {
    states = [
      markConnected(createConnectionState('rx-1', { connectionType: 'sse', now: T0 }), T0),
      createConnectionState('rx 2', { connectionType: 'websocket', now: T0 }),
    ];
    server = new HttpServer({
      getSummary: () => summarize(states, 0, T0, unmonitored),
      getStates: () => states,
      stopDevice: async (id) => {
        calls.push(`stop ${id}`);
        const state = states.find((s) => s.deviceId === id);
        return state ? markStopped(state, T0) : null;
      },
      resumeDevice: async (id) => {
        calls.push(`resume ${id}`);
        return states.find((s) => s.deviceId === id) ?? null;
      },
      resetDeviceErrors: async (id) => {
        calls.push(`reset-errors ${id}`);
        const state = states.find((s) => s.deviceId === id);
        return state ? resetErrors(state, T0) : null;
      },
      viewerGateway: new ViewerGateway(new BroadcastHub()),
    });
    const port = await server.start(0, '127.0.0.1');
    base = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    await server.stop();
  });

  it('should answer /ping', async () => {
    const res = await fetch(`${base}/ping`);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(await res.text(), 'pong');
  });

  it('should report health as ok while nothing is failing', async () => {
    const res = await fetch(`${base}/health`);
    assert.strictEqual(res.status, 200);
    const body = JSON.parse(await res.text());
    assert.strictEqual(body.status, 'ok');
    assert.strictEqual(body.total, 2);
    assert.strictEqual(body.byStatus.connected, 1);
    assert.strictEqual(body.healthyPercentage, 50);
  });

  it('should report 503 when a connection is in error', async () => {
    const saved = states;
    states = [markError(saved[0], 'refused', T0)];
    try {
      const res = await fetch(`${base}/health`);
      assert.strictEqual(res.status, 503);
      assert.strictEqual(JSON.parse(await res.text()).status, 'degraded');
    } finally {
      states = saved;
    }
  });

  it('should report 503 when a loop died without a stop', async () => {
    unmonitored = ['rx-1'];
    try {
      const res = await fetch(`${base}/health`);
      assert.strictEqual(res.status, 503);
      const body = JSON.parse(await res.text());
      assert.strictEqual(body.status, 'degraded');
      assert.deepStrictEqual(body.unmonitored, ['rx-1']);
    } finally {
      unmonitored = [];
    }
  });

  it('should list connections', async () => {
    const res = await fetch(`${base}/api/connections`);
    const body = JSON.parse(await res.text());
    assert.deepStrictEqual(body.map((s: { deviceId: string }) => s.deviceId), ['rx-1', 'rx 2']);
    assert.strictEqual(body[0].connectedAt, '2024-05-01T12:00:00.000Z');
  });

  it('should return one connection by url-encoded id', async () => {
    const res = await fetch(`${base}/api/connections/rx%202`);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(JSON.parse(await res.text()).connectionType, 'websocket');
  });

  it('should 404 an unknown connection', async () => {
    const res = await fetch(`${base}/api/connections/nope`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(JSON.parse(await res.text()), { error: 'unknown device: nope' });
  });

  it('should stop and resume through POST', async () => {
    const stop = await fetch(`${base}/api/connections/rx-1/stop`, { method: 'POST' });
    assert.strictEqual(stop.status, 200);
    assert.strictEqual(JSON.parse(await stop.text()).status, 'stopped');

    const resume = await fetch(`${base}/api/connections/rx-1/resume`, { method: 'POST' });
    assert.strictEqual(resume.status, 200);
    await resume.text();
    assert.deepStrictEqual(calls.slice(-2), ['stop rx-1', 'resume rx-1']);
  });

  it('should reset the error counter through POST', async () => {
    const saved = states;
    states = [markError(saved[0], 'refused', T0), saved[1]];
    try {
      const res = await fetch(`${base}/api/connections/rx-1/reset-errors`, { method: 'POST' });
      assert.strictEqual(res.status, 200);
      const body = JSON.parse(await res.text());
      assert.strictEqual(body.errorCount, 0);
      assert.strictEqual(body.lastErrorAt, null);
      assert.strictEqual(body.status, 'error');
      assert.strictEqual(body.errorMessage, 'refused');
      assert.strictEqual(calls[calls.length - 1], 'reset-errors rx-1');
    } finally {
      states = saved;
    }
  });

  it('should reject control actions over GET', async () => {
    const res = await fetch(`${base}/api/connections/rx-1/stop`);
    assert.strictEqual(res.status, 405);
    assert.deepStrictEqual(JSON.parse(await res.text()), { error: 'method not allowed' });
  });

  it('should 404 control actions for unknown devices', async () => {
    const res = await fetch(`${base}/api/connections/nope/resume`, { method: 'POST' });
    assert.strictEqual(res.status, 404);
    await res.text();
  });

  it('should 404 unknown routes', async () => {
    const res = await fetch(`${base}/nowhere`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(JSON.parse(await res.text()), { error: 'not found' });
  });
});
