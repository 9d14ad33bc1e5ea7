import { once } from 'node:events';
import WebSocket from 'ws';
import { registerHealthIndicator, resetAppLifecycle } from '../src/app.js';
import type { ControlResponse } from '../src/control/protocol.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { rawDataToString, startControlServer, type ControlServerRuntime } from '../src/server/http.js';
import { createConnectedPlane } from './helpers/controlPlane.js';
import { createCapturedLogger } from './helpers/logger.js';

class Inbox {
  private readonly received: ControlResponse[] = [];
  private readonly waiters: Array<(message: ControlResponse) => void> = [];

  push(message: ControlResponse) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.received.push(message);
    }
  }

  next(): Promise<ControlResponse> {
    const queued = this.received.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }
}

async function connectClient(port: number) {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  const inbox = new Inbox();
  socket.on('message', data => {
    const message: ControlResponse = JSON.parse(rawDataToString(data));
    inbox.push(message);
  });
  await once(socket, 'open');
  return { socket, inbox };
}

describe('ControlServer', () => {
  let runtime: ControlServerRuntime | null = null;
  const sockets: WebSocket[] = [];
  let metrics: MetricsRegistry;
  let bus: EventBus;

  async function startServer() {
    const { logger } = createCapturedLogger();
    metrics = new MetricsRegistry();
    bus = new EventBus({ log: logger, metrics });
    const { controlPlane } = await createConnectedPlane(['PC (wall_led)'], logger, metrics);
    runtime = await startControlServer({ controlPlane, port: 0, host: '127.0.0.1', bus, logger, metrics });
    return runtime;
  }

  async function client(port: number) {
    const connected = await connectClient(port);
    sockets.push(connected.socket);
    return connected;
  }

  afterEach(async () => {
    for (const socket of sockets.splice(0)) {
      socket.terminate();
    }
    await runtime?.close();
    runtime = null;
    resetAppLifecycle();
  });

  it('NewClient receives the current state first', async () => {
    const server = await startServer();
    const { inbox } = await client(server.port);

    const first = await inbox.next();

    expect(first.action).toBe('state_update');
    if (first.action === 'state_update') {
      expect(first.state).toMatchObject({ componentId: 'rx-1', currentSource: 'PC (wall_led)' });
    }
  });

  it('Commands are answered on the same socket', async () => {
    const server = await startServer();
    const { socket, inbox } = await client(server.port);
    await inbox.next();

    socket.send(JSON.stringify({ action: 'ping' }));

    await expect(inbox.next()).resolves.toEqual({ action: 'pong', timestamp: 1234 });
  });

  it('StateChanges are broadcast to every client', async () => {
    const server = await startServer();
    const first = await client(server.port);
    const second = await client(server.port);
    await first.inbox.next();
    await second.inbox.next();
    expect(server.clientCount()).toBe(2);

    first.socket.send(JSON.stringify({ action: 'set_lock_global', locked: true }));

    const broadcast = await second.inbox.next();
    expect(broadcast.action).toBe('state_update');
    if (broadcast.action === 'state_update') {
      expect(broadcast.state.locked).toBe(true);
    }
    const [pushed, reply] = [await first.inbox.next(), await first.inbox.next()];
    expect(pushed.action).toBe('state_update');
    expect(reply.action).toBe('state_update');
    expect(metrics.snapshot().control.broadcasts).toBe(1);
  });

  it('StateEndpoint returns the snapshot', async () => {
    const server = await startServer();

    const response = await fetch(`http://127.0.0.1:${server.port}/api/state`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ componentName: 'Wall', sources: ['PC (wall_led)'] });
  });

  it('EventsEndpoint caps the limit', async () => {
    const server = await startServer();
    bus.emitEvent({ component: 'supervisor', kind: 'connection', severity: 'info', message: 'first' });
    bus.emitEvent({ component: 'supervisor', kind: 'connection', severity: 'info', message: 'second' });

    const response = await fetch(`http://127.0.0.1:${server.port}/api/events?limit=1`);

    await expect(response.json()).resolves.toMatchObject({ events: [{ kind: 'connection', message: 'second' }] });
  });

  it('HealthEndpoint reports degraded indicators with 503', async () => {
    registerHealthIndicator('connection', () => ({ status: 'degraded', details: { status: 'connecting' } }));
    const server = await startServer();

    const response = await fetch(`http://127.0.0.1:${server.port}/health`);

    expect(response.status).toBe(503);
    await expect(response.json()).resolves.toEqual({
      status: 'degraded',
      checks: [{ name: 'connection', status: 'degraded', details: { status: 'connecting' } }]
    });
  });

  it('MetricsEndpoint exposes the client gauge', async () => {
    const server = await startServer();
    const { inbox } = await client(server.port);
    await inbox.next();

    const response = await fetch(`http://127.0.0.1:${server.port}/metrics`);

    expect(response.headers.get('content-type')).toContain('text/plain');
    const text = await response.text();
    expect(text.split('\n')).toContain('led_receiver_control_clients 1');
  });

  it('UnknownRoute returns 404', async () => {
    const server = await startServer();

    const response = await fetch(`http://127.0.0.1:${server.port}/nope`);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: 'Not found' });
  });
});
