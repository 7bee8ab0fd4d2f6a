import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as http from 'http';
import { WebSocket, RawData } from 'ws';
import { setTimeout as delay } from 'node:timers/promises';
import { ViewerGateway, requestedDevices } from '../server/viewer-ws';
import { BroadcastHub } from '../broadcast/hub';
import { DEVICE_UPDATES_TOPIC, STATUS_TOPIC, deviceTopic, deviceUpdate, statusMessage } from '../broadcast/messages';
import { waitFor } from './fakes';

async function connectClient(port: number, query = ''): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws${query}`);
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

async function nextMessage(ws: WebSocket): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => reject(new Error('Timeout waiting for message')), 2000);
    ws.once('message', (data: RawData) => {
      clearTimeout(timeout);
      resolve(JSON.parse(data.toString()));
    });
  });
}

describe('ViewerGateway', () => {
  let server: http.Server;
  let hub: BroadcastHub;
  let gateway: ViewerGateway;
  let port: number;
  let clients: WebSocket[];

  beforeEach(async () => {
    server = http.createServer();
    hub = new BroadcastHub();
    gateway = new ViewerGateway(hub);
    gateway.attach(server);
    clients = [];
    port = await new Promise<number>((resolve) => {
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        resolve(address && typeof address === 'object' ? address.port : 0);
      });
    });
  });

  afterEach(async () => {
    for (const ws of clients) {
      if (ws.readyState === WebSocket.OPEN) ws.close();
    }
    gateway.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function open(query = ''): Promise<WebSocket> {
    const ws = await connectClient(port, query);
    clients.push(ws);
    await waitFor(() => gateway.clientCount === clients.length);
    return ws;
  }

  describe('Connection', () => {
    it('should subscribe a plain viewer to status and every device', async () => {
      await open();
      assert.strictEqual(hub.subscriberCount(STATUS_TOPIC), 1);
      assert.strictEqual(hub.subscriberCount(DEVICE_UPDATES_TOPIC), 1);
    });

    it('should subscribe to the devices named in the query', async () => {
      await open('?device=rx-1&device=rx-2');
      assert.strictEqual(hub.subscriberCount(deviceTopic('rx-1')), 1);
      assert.strictEqual(hub.subscriberCount(deviceTopic('rx-2')), 1);
      assert.strictEqual(hub.subscriberCount(DEVICE_UPDATES_TOPIC), 0);
    });

    it('should leave every topic when the viewer disconnects', async () => {
      const ws = await open();
      ws.close();
      await waitFor(() => gateway.clientCount === 0);
      assert.deepStrictEqual(hub.topics(), []);
    });
  });

  describe('Commands', () => {
    it('should answer ping with pong', async () => {
      const ws = await open();
      const reply = nextMessage(ws);
      ws.send(JSON.stringify({ command: 'ping' }));
      assert.deepStrictEqual(await reply, { type: 'pong' });
    });

    it('should ignore malformed input and keep the channel open', async () => {
      const ws = await open();
      ws.send('not json');
      ws.send(JSON.stringify({ command: 'reboot' }));
      ws.send(JSON.stringify([1, 2, 3]));
      ws.send(Buffer.from([0xff, 0x00]), { binary: true });

      const reply = nextMessage(ws);
      ws.send(JSON.stringify({ command: 'ping' }));
      assert.deepStrictEqual(await reply, { type: 'pong' });
      assert.strictEqual(ws.readyState, WebSocket.OPEN);
    });

    it('should add and drop device topics on request', async () => {
      const ws = await open('?device=rx-1');
      ws.send(JSON.stringify({ command: 'subscribe', device: 'rx-9' }));
      await waitFor(() => hub.subscriberCount(deviceTopic('rx-9')) === 1);

      ws.send(JSON.stringify({ command: 'unsubscribe', device: 'rx-1' }));
      await waitFor(() => hub.subscriberCount(deviceTopic('rx-1')) === 0);
    });

    it('should leave the catch-all topic when a device is picked', async () => {
      const ws = await open();
      ws.send(JSON.stringify({ command: 'subscribe', device: 'rx-1' }));
      await waitFor(() => hub.subscriberCount(deviceTopic('rx-1')) === 1);

      assert.strictEqual(hub.subscriberCount(DEVICE_UPDATES_TOPIC), 0);
      assert.strictEqual(hub.subscriberCount(STATUS_TOPIC), 1);
      const update = deviceUpdate('rx-1', { rf: -45 });
      assert.strictEqual(await hub.publish(deviceTopic('rx-1'), update), 1);
      assert.strictEqual(await hub.publish(DEVICE_UPDATES_TOPIC, update), 0);
    });

    it('should not register the same topic twice for one viewer', async () => {
      const ws = await open('?device=rx-1');
      ws.send(JSON.stringify({ command: 'subscribe', device: 'rx-1' }));
      const reply = nextMessage(ws);
      ws.send(JSON.stringify({ command: 'ping' }));
      await reply;
      assert.strictEqual(hub.subscriberCount(deviceTopic('rx-1')), 1);
    });
  });

  describe('Broadcast', () => {
    it('should forward hub messages to subscribed viewers', async () => {
      const ws = await open('?device=rx-1');
      const received = nextMessage(ws);
      const delivered = await hub.publish(deviceTopic('rx-1'), deviceUpdate('rx-1', { battery: 80 }));
      assert.strictEqual(delivered, 1);
      assert.deepStrictEqual(await received, { type: 'device_update', deviceId: 'rx-1', data: { battery: 80 } });
    });

    it('should deliver to each connected viewer', async () => {
      const a = await open();
      const b = await open();
      const ra = nextMessage(a);
      const rb = nextMessage(b);
      assert.strictEqual(await hub.publish(STATUS_TOPIC, statusMessage('rx-1 connected')), 2);
      assert.deepStrictEqual(await ra, { type: 'status', message: 'rx-1 connected' });
      assert.deepStrictEqual(await rb, { type: 'status', message: 'rx-1 connected' });
    });

    it('should close viewer sockets on stop', async () => {
      const ws = await open();
      const closed = new Promise<void>((resolve) => ws.once('close', () => resolve()));
      gateway.stop();
      await closed;
      assert.strictEqual(gateway.clientCount, 0);
      await delay(10);
      assert.deepStrictEqual(hub.topics(), []);
    });
  });
});

describe('requestedDevices', () => {
  it('should read repeated device parameters', () => {
    assert.deepStrictEqual(requestedDevices('/ws?device=a&device=b&x=1'), ['a', 'b']);
  });

  it('should ignore empty values and missing urls', () => {
    assert.deepStrictEqual(requestedDevices('/ws?device='), []);
    assert.deepStrictEqual(requestedDevices(undefined), []);
  });
});
