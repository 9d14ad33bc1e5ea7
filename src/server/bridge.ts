import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import loggerModule, { type Logger } from '../logger.js';
import type { ControlPlane } from '../control/controlPlane.js';
import type { ControlResponse } from '../control/protocol.js';
import { rawDataToString } from './http.js';

export type BridgeClientOptions = {
  url: string;
  componentId: string;
  controlPlane: Pick<ControlPlane, 'getSnapshot' | 'handleMessage' | 'onStateChanged'>;
  reconnectDelayMs: number;
  logger?: Logger;
  createSocket?: (url: string) => WebSocket;
};

/**
 * Outbound connection to a shared upstream bridge. Every message sent upstream is tagged
 * with this receiver's componentId; inbound commands are answered over the same socket.
 */
export class BridgeClient extends EventEmitter {
  private readonly options: BridgeClientOptions;
  private readonly log: Logger;
  private readonly createSocket: (url: string) => WebSocket;
  private socket: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private stopped = true;

  constructor(options: BridgeClientOptions) {
    super();
    this.options = options;
    this.log = options.logger ?? loggerModule.child({ component: 'bridge-client' });
    this.createSocket = options.createSocket ?? (url => new WebSocket(url));
  }

  start() {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.unsubscribe = this.options.controlPlane.onStateChanged((_snapshot, messages) => {
      for (const message of messages) {
        this.send(message);
      }
    });
    this.connect();
  }

  isConnected() {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  async stop() {
    this.stopped = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.terminate();
    });
  }

  private connect() {
    const { url } = this.options;
    this.log.info({ url }, 'Connecting to bridge');
    const socket = this.createSocket(url);
    this.socket = socket;

    socket.on('open', () => {
      this.log.info({ url }, 'Bridge connected');
      this.send({ action: 'state_update', state: this.options.controlPlane.getSnapshot() });
      this.emit('connected');
    });

    socket.on('message', data => {
      this.options.controlPlane
        .handleMessage(rawDataToString(data), 'bridge')
        .then(response => {
          if (response) {
            this.send(response);
          }
        })
        .catch(error => {
          this.log.error({ err: error }, 'Bridge command handling failed');
        });
    });

    socket.on('error', error => {
      this.log.warn({ err: error, url }, 'Bridge connection error');
    });

    socket.once('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.emit('disconnected');
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect() {
    if (this.stopped || this.reconnectTimer) {
      return;
    }
    const delay = this.options.reconnectDelayMs;
    this.log.info({ delayMs: delay }, 'Bridge disconnected; reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) {
        this.connect();
      }
    }, delay);
    this.reconnectTimer.unref();
  }

  private send(message: ControlResponse) {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return;
    }
    const tagged: ControlResponse = { ...message, componentId: this.options.componentId };
    socket.send(JSON.stringify(tagged), error => {
      if (error) {
        this.log.warn({ err: error }, 'Bridge send failed');
      }
    });
  }
}
