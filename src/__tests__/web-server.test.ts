import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as net from 'net';
import { WebSocket } from 'ws';
import { setTimeout as delay } from 'node:timers/promises';
import { createAppState } from '../app-state';
import { buildDashboardPage } from '../dashboard';
import { defaultPersistConfig, setLightGroup } from '../persist-config';
import { DashboardServer, SESSION_PATH } from '../server/web-server';
import { ServerMessage } from '../web/client-session';
import { RecordingLightControl, testBridgeConfig, tokenFor } from './fixtures';

async function connectClient(port: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}${SESSION_PATH}`);
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

async function nextMessage(ws: WebSocket): Promise<ServerMessage> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => reject(new Error('Timeout waiting for message')), 2000);
    ws.once('message', (data: Buffer) => {
      clearTimeout(timeout);
      resolve(JSON.parse(data.toString()));
    });
  });
}

/** Raw TCP client that completes the upgrade handshake by hand */
async function rawUpgrade(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1', () => {
      socket.write(
        `GET ${SESSION_PATH} HTTP/1.1\r\n` +
        `Host: 127.0.0.1:${port}\r\n` +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        'Sec-WebSocket-Key: dGVzdC1rZXktMDAwMDAwMA==\r\n' +
        'Sec-WebSocket-Version: 13\r\n\r\n',
      );
    });
    socket.once('data', (data: Buffer) => {
      if (data.toString('latin1').startsWith('HTTP/1.1 101')) resolve(socket);
      else reject(new Error('Upgrade refused'));
    });
    socket.once('error', reject);
  });
}

function pageTokenOf(html: string): string {
  const match = /page: "([0-9a-f]{32})"/.exec(html);
  if (!match) throw new Error('No page token in document');
  return match[1];
}

function scriptsOf(msg: ServerMessage): string[] {
  assert.equal(msg.type, 'run');
  return msg.type === 'run' ? msg.scripts : [];
}

describe('DashboardServer', () => {
  let server: DashboardServer;
  let control: RecordingLightControl;
  let port: number;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    const app = createAppState(testBridgeConfig, setLightGroup(defaultPersistConfig, 'Kitchen', ['1']));
    control = new RecordingLightControl([{ id: '1', name: 'Lamp', state: { on: true, brightness: 128 } }]);
    server = new DashboardServer({
      buildPage: page => buildDashboardPage(page, { app, lightControl: control, userID: 'local' }),
      title: 'Test Deck',
      pendingPageTtlMs: 60000,
      elementQueryTimeoutMs: 1000,
    });
    port = await server.start(0, '127.0.0.1');
  });

  afterEach(async () => {
    for (const ws of clients.splice(0)) {
      if (ws.readyState === WebSocket.OPEN) ws.close();
    }
    await server.stop();
  });

  async function openPage(): Promise<{ html: string; token: string }> {
    const res = await fetch(`http://127.0.0.1:${port}/`);
    const html = await res.text();
    return { html, token: pageTokenOf(html) };
  }

  async function attach(token: string): Promise<{ ws: WebSocket; batch: ServerMessage }> {
    const ws = await connectClient(port);
    clients.push(ws);
    const batchPromise = nextMessage(ws);
    ws.send(JSON.stringify({ type: 'attach', page: token }));
    return { ws, batch: await batchPromise };
  }

  describe('HTTP', () => {
    it('should answer ping', async () => {
      const res = await fetch(`http://127.0.0.1:${port}/ping`);
      assert.equal(res.status, 200);
      assert.equal(await res.text(), 'pong');
    });

    it('should return 404 for unknown paths', async () => {
      const res = await fetch(`http://127.0.0.1:${port}/nope`);
      assert.equal(res.status, 404);
      await res.arrayBuffer();
    });

    it('should serve the dashboard document with its tiles', async () => {
      const res = await fetch(`http://127.0.0.1:${port}/`);
      assert.equal(res.status, 200);
      assert.equal(res.headers.get('content-type'), 'text/html; charset=utf-8');
      const html = await res.text();
      assert.ok(html.startsWith('<!DOCTYPE html>'));
      assert.ok(html.includes('<title>Test Deck</title>'));
      assert.ok(html.includes('<div class="tile" id="bridge-tile">'));
      assert.ok(html.includes('<div class="tile" id="light-1-tile">'));
      assert.match(pageTokenOf(html), /^[0-9a-f]{32}$/);
      assert.equal(server.pendingPageCount, 1);
    });
  });

  describe('Sessions', () => {
    it('should run the page actions when the browser attaches', async () => {
      const { token } = await openPage();
      const ready = new Promise(resolve => server.once('session-ready', resolve));
      const { batch } = await attach(token);
      await ready;

      const scripts = scriptsOf(batch);
      assert.equal(scripts.length, 6);
      assert.ok(scripts[0].startsWith('document.querySelector("#bridge-all-switch")'));
      assert.equal(server.pendingPageCount, 0);
      assert.equal(server.sessionCount, 1);
    });

    it('should invoke callbacks and send the reload', async () => {
      const { token } = await openPage();
      const { ws, batch } = await attach(token);
      const callback = tokenFor(scriptsOf(batch), 'light-1-switch');

      const reply = nextMessage(ws);
      ws.send(JSON.stringify({ type: 'callback', token: callback, args: [] }));
      assert.deepEqual(await reply, { type: 'run', scripts: ['window.location.reload(false);'] });
      assert.deepEqual(control.commands, ['on:1:false']);
    });

    it('should reload clients with an unknown page token', async () => {
      const { batch } = await attach('ffffffffffffffffffffffffffffffff');
      assert.deepEqual(batch, { type: 'run', scripts: ['window.location.reload(false);'] });
    });

    it('should not hand a page to a second session', async () => {
      const { token } = await openPage();
      await attach(token);
      const { batch } = await attach(token);
      assert.deepEqual(batch, { type: 'run', scripts: ['window.location.reload(false);'] });
    });

    it('should survive a client sending an invalid frame', async () => {
      const socket = await rawUpgrade(port);
      assert.equal(server.sessionCount, 1);

      const closeFrame = new Promise<Buffer>(resolve => socket.once('data', resolve));
      // Masked text frame whose one-byte payload is not valid UTF-8
      socket.write(Buffer.from([0x81, 0x81, 0x00, 0x00, 0x00, 0x00, 0xff]));
      const frame = await closeFrame;
      assert.equal(frame[0], 0x88);
      socket.destroy();
      await delay(100);

      const res = await fetch(`http://127.0.0.1:${port}/ping`);
      assert.equal(await res.text(), 'pong');
      assert.equal(server.sessionCount, 0);
    });

    it('should forget sessions that disconnect', async () => {
      const ws = await connectClient(port);
      clients.push(ws);
      assert.equal(server.sessionCount, 1);
      ws.close();
      await delay(100);
      assert.equal(server.sessionCount, 0);
    });
  });
});
