import http, { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import defaultBus from '../eventBus.js';
import loggerModule, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { collectHealthChecks } from '../app.js';
import type { ControlPlane } from '../control/controlPlane.js';
import type { ControlResponse } from '../control/protocol.js';
import type { ReceiverEvent } from '../types.js';

const DEFAULT_HEARTBEAT_INTERVAL_MS = 20_000;
const DEFAULT_EVENT_LIMIT = 50;
const MAX_EVENT_LIMIT = 200;

export type HealthReport = {
  status: 'ok' | 'degraded';
  checks: Array<{ name: string; status: string; details?: Record<string, unknown> }>;
};

export interface ControlServerOptions {
  controlPlane: Pick<ControlPlane, 'getSnapshot' | 'handleMessage' | 'onStateChanged'>;
  port?: number;
  host?: string;
  bus?: { getRecentEvents(limit?: number): ReceiverEvent[] };
  health?: () => Promise<HealthReport>;
  heartbeatIntervalMs?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export interface ControlServerRuntime {
  server: http.Server;
  port: number;
  clientCount: () => number;
  close: () => Promise<void>;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export async function startControlServer(options: ControlServerOptions): Promise<ControlServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '0.0.0.0';
  const bus = options.bus ?? defaultBus;
  const log = options.logger ?? loggerModule.child({ component: 'control-server' });
  const registry = options.metrics ?? metrics;
  const controlPlane = options.controlPlane;
  const startedAt = Date.now();
  const health =
    options.health ??
    (async (): Promise<HealthReport> => {
      const checks = await collectHealthChecks({ service: { status: 'running', startedAt } });
      return { status: checks.every(check => check.status === 'ok') ? 'ok' : 'degraded', checks };
    });

  const server = http.createServer((req, res) => {
    handleRequest(req, res).catch(error => {
      log.error({ err: error, url: req.url }, 'HTTP request failed');
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      } else {
        res.end();
      }
    });
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse) {
    if (!req.url || req.method !== 'GET') {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    const url = new URL(req.url, 'http://localhost');
    switch (url.pathname) {
      case '/api/state':
        sendJson(res, 200, controlPlane.getSnapshot());
        return;
      case '/api/events': {
        const limit = parseLimit(url.searchParams.get('limit'));
        sendJson(res, 200, { events: bus.getRecentEvents(limit) });
        return;
      }
      case '/health': {
        const report = await health();
        sendJson(res, report.status === 'ok' ? 200 : 503, report);
        return;
      }
      case '/metrics':
        res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
        res.end(registry.exportPrometheus());
        return;
      default:
        sendJson(res, 404, { error: 'Not found' });
    }
  }

  const wss = new WebSocketServer({ server });
  const alive = new Map<WebSocket, boolean>();

  const updateClientGauge = () => {
    registry.setConnectedClients(alive.size);
  };

  const send = (socket: WebSocket, message: ControlResponse) => {
    socket.send(JSON.stringify(message), error => {
      if (error) {
        log.warn({ err: error }, 'Dropping control client after failed send');
        socket.terminate();
      }
    });
  };

  wss.on('connection', socket => {
    alive.set(socket, true);
    updateClientGauge();
    log.info({ clients: alive.size }, 'Control client connected');

    socket.on('pong', () => {
      alive.set(socket, true);
    });

    socket.on('message', data => {
      controlPlane
        .handleMessage(rawDataToString(data), 'local')
        .then(response => {
          if (response && socket.readyState === WebSocket.OPEN) {
            send(socket, response);
          }
        })
        .catch(error => {
          log.error({ err: error }, 'Control message handling failed');
        });
    });

    socket.on('error', error => {
      log.warn({ err: error }, 'Control client error');
    });

    socket.once('close', () => {
      alive.delete(socket);
      updateClientGauge();
      log.info({ clients: alive.size }, 'Control client disconnected');
    });

    send(socket, { action: 'state_update', state: controlPlane.getSnapshot() });
  });

  const unsubscribe = controlPlane.onStateChanged((_snapshot, messages) => {
    let failures = 0;
    for (const socket of alive.keys()) {
      if (socket.readyState !== WebSocket.OPEN) {
        failures += 1;
        socket.terminate();
        continue;
      }
      for (const message of messages) {
        send(socket, message);
      }
    }
    registry.recordBroadcast(failures);
  });

  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const heartbeat = setInterval(() => {
    for (const [socket, isAlive] of alive) {
      if (!isAlive) {
        log.warn('Terminating unresponsive control client');
        socket.terminate();
        continue;
      }
      alive.set(socket, false);
      socket.ping();
    }
  }, heartbeatIntervalMs);
  heartbeat.unref();

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  log.info({ port: actualPort, host }, 'Control server listening');

  return {
    server,
    port: actualPort,
    clientCount: () => alive.size,
    close: async () => {
      clearInterval(heartbeat);
      unsubscribe();
      for (const socket of alive.keys()) {
        socket.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      log.info('Control server closed');
    }
  };
}

function parseLimit(raw: string | null): number {
  if (raw === null) {
    return DEFAULT_EVENT_LIMIT;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    return DEFAULT_EVENT_LIMIT;
  }
  return Math.min(value, MAX_EVENT_LIMIT);
}

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

export default startControlServer;
