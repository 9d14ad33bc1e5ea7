import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import loggerModule, { type Logger } from '../logger.js';
import {
  TransportError,
  type ColorFormat,
  type ConnectionHandle,
  type DiscoveryTransport,
  type PixelFormat,
  type RawFrame,
  type SourceName
} from '../types.js';

const NDI_INPUT_FORMAT = 'libndi_newtek';
const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 2000;
const DEFAULT_QUEUE_DEPTH = 3;
const SOURCE_LINE = /'([^'\t]+)'\s*\t\s*'([^']*)'/;

/** The part of a fluent-ffmpeg command the transport drives. */
export interface NdiCommand extends EventEmitter {
  pipe(): EventEmitter;
  run(): void;
  kill(signal: string): unknown;
}

export type NdiCommandRequest =
  | { kind: 'discover'; waitSeconds: number }
  | { kind: 'receive'; source: SourceName; pixelFormat: string };

export type FfmpegNdiTransportOptions = {
  colorFormat?: ColorFormat;
  ffmpegPath?: string;
  connectTimeoutMs?: number;
  forceKillTimeoutMs?: number;
  queueDepth?: number;
  commandFactory?: (request: NdiCommandRequest) => NdiCommand;
  logger?: Logger;
};

type VideoDetails = {
  width: number;
  height: number;
  frameRateN: number;
  frameRateD: number;
};

const WIRE_FORMATS: Record<ColorFormat, { pixFmt: string; format: PixelFormat; bytesPerPixel: number }> = {
  bgra: { pixFmt: 'bgra', format: 'bgra', bytesPerPixel: 4 },
  rgba: { pixFmt: 'rgba', format: 'rgba', bytesPerPixel: 4 },
  uyvy: { pixFmt: 'uyvy422', format: 'uyvy', bytesPerPixel: 2 }
};

export function parseSourceLines(stderr: string): SourceName[] {
  const names: SourceName[] = [];
  for (const line of stderr.split(/\r?\n/)) {
    const match = SOURCE_LINE.exec(line);
    if (match && !names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Reads dimensions and frame rate from fluent-ffmpeg `codecData`, whose `video`
 * field carries the stream description, e.g. `rawvideo (UYVY / 0x59565955), uyvy422, 1920x1080, 29.97 fps`.
 */
export function parseVideoDetails(data: unknown): VideoDetails | null {
  if (typeof data !== 'object' || data === null) {
    return null;
  }
  const parts: string[] = [];
  if ('video' in data && typeof data.video === 'string') {
    parts.push(data.video);
  }
  if ('video_details' in data && Array.isArray(data.video_details)) {
    for (const entry of data.video_details) {
      if (typeof entry === 'string') {
        parts.push(entry);
      }
    }
  }
  const description = parts.join(', ');
  const size = /\b(\d{1,5})x(\d{1,5})\b/.exec(description);
  if (!size) {
    return null;
  }
  const rate = /(\d+(?:\.\d+)?)\s*(?:fps|tbr)/.exec(description);
  const { frameRateN, frameRateD } = toRational(rate ? Number.parseFloat(rate[1]) : 0);
  return {
    width: Number.parseInt(size[1], 10),
    height: Number.parseInt(size[2], 10),
    frameRateN,
    frameRateD
  };
}

export function toRational(fps: number): { frameRateN: number; frameRateD: number } {
  if (!Number.isFinite(fps) || fps <= 0) {
    return { frameRateN: 0, frameRateD: 1 };
  }
  if (Number.isInteger(fps)) {
    return { frameRateN: fps, frameRateD: 1 };
  }
  const ntsc = Math.round(fps * 1.001);
  if (Math.abs(ntsc / 1.001 - fps) < 0.01) {
    return { frameRateN: ntsc * 1000, frameRateD: 1001 };
  }
  return { frameRateN: Math.round(fps * 1000), frameRateD: 1000 };
}

function classifySpawnError(error: unknown): TransportError | null {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return new TransportError('spawn-failed', 'ffmpeg executable not found', { cause: error });
  }
  if (error instanceof Error && /Cannot find ffmpeg/i.test(error.message)) {
    return new TransportError('spawn-failed', error.message, { cause: error });
  }
  return null;
}

class NdiConnection {
  readonly handle: ConnectionHandle;
  private readonly queue: RawFrame[] = [];
  private pending: Buffer = Buffer.alloc(0);
  private details: VideoDetails | null = null;
  private waiter: ((frame: RawFrame | null) => void) | null = null;
  private closedError: TransportError | null = null;
  private exited = false;
  private readonly exitListeners: Array<() => void> = [];

  constructor(
    handle: ConnectionHandle,
    private readonly command: NdiCommand,
    private readonly wire: (typeof WIRE_FORMATS)[ColorFormat],
    private readonly queueDepth: number,
    private readonly log: Logger
  ) {
    this.handle = handle;
  }

  open(connectTimeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settle(new TransportError('connect-failed', `No video from "${this.handle.source}" within ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      const settle = (error: TransportError | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      this.command.on('codecData', (data: unknown) => {
        const details = parseVideoDetails(data);
        if (!details) {
          settle(new TransportError('connect-failed', `Unrecognised stream description from "${this.handle.source}"`));
          return;
        }
        this.details = details;
        this.log.debug({ source: this.handle.source, ...details }, 'Stream negotiated');
        settle(null);
      });

      this.command.once('error', (error: unknown) => {
        const spawnError = classifySpawnError(error);
        const message = error instanceof Error ? error.message : String(error);
        const transportError =
          spawnError ?? new TransportError(settled ? 'closed' : 'connect-failed', message, { cause: error });
        this.markExited(transportError);
        settle(transportError);
      });

      this.command.once('end', () => {
        const error = new TransportError('closed', `Stream from "${this.handle.source}" ended`);
        this.markExited(error);
        settle(error);
      });

      let stream: EventEmitter;
      try {
        stream = this.command.pipe();
      } catch (error) {
        const transportError =
          classifySpawnError(error) ??
          new TransportError('spawn-failed', error instanceof Error ? error.message : String(error), { cause: error });
        this.markExited(transportError);
        settle(transportError);
        return;
      }
      stream.on('data', (chunk: Buffer) => {
        this.consume(chunk);
      });
      stream.on('error', (error: unknown) => {
        this.log.debug({ err: error, source: this.handle.source }, 'Output stream error');
      });
    });
  }

  receive(timeoutMs: number): Promise<RawFrame | null> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    if (this.waiter) {
      return Promise.reject(new Error('Concurrent receive on one connection'));
    }
    return new Promise<RawFrame | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = frame => {
        clearTimeout(timer);
        this.waiter = null;
        if (frame) {
          resolve(frame);
        } else if (this.closedError) {
          reject(this.closedError);
        } else {
          resolve(null);
        }
      };
    });
  }

  close(forceKillTimeoutMs: number): Promise<void> {
    if (this.exited) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      const killTimer = setTimeout(() => {
        this.log.warn({ source: this.handle.source }, 'ffmpeg ignored SIGTERM; sending SIGKILL');
        this.kill('SIGKILL');
        this.markExited(new TransportError('closed', 'Connection closed'));
      }, forceKillTimeoutMs);
      killTimer.unref();
      this.exitListeners.push(() => {
        clearTimeout(killTimer);
        resolve();
      });
      this.kill('SIGTERM');
    });
  }

  private kill(signal: NodeJS.Signals) {
    try {
      this.command.kill(signal);
    } catch (error) {
      this.log.debug({ err: error, signal }, 'Kill signal not delivered');
    }
  }

  private markExited(error: TransportError) {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.closedError = error;
    this.waiter?.(null);
    for (const listener of this.exitListeners.splice(0)) {
      listener();
    }
  }

  private consume(chunk: Buffer) {
    const details = this.details;
    if (!details) {
      return;
    }
    const frameBytes = details.width * details.height * this.wire.bytesPerPixel;
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    while (this.pending.length >= frameBytes) {
      const data = Buffer.from(this.pending.subarray(0, frameBytes));
      this.pending = this.pending.subarray(frameBytes);
      this.push({
        width: details.width,
        height: details.height,
        format: this.wire.format,
        data,
        frameRateN: details.frameRateN,
        frameRateD: details.frameRateD,
        timestamp: Date.now()
      });
    }
  }

  private push(frame: RawFrame) {
    if (this.waiter) {
      this.waiter(frame);
      return;
    }
    this.queue.push(frame);
    if (this.queue.length > this.queueDepth) {
      this.queue.splice(0, this.queue.length - this.queueDepth);
    }
  }
}

/** NDI discovery and receive through an ffmpeg build with the libndi_newtek device. */
export class FfmpegNdiTransport implements DiscoveryTransport {
  private readonly options: FfmpegNdiTransportOptions;
  private readonly log: Logger;
  private readonly connections = new Map<number, NdiConnection>();
  private nextHandleId = 1;

  constructor(options: FfmpegNdiTransportOptions = {}) {
    this.options = options;
    this.log = options.logger ?? loggerModule.child({ component: 'ndi-transport' });
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
  }

  listSources(scanTimeoutMs: number): Promise<SourceName[]> {
    const waitSeconds = Math.max(1, Math.ceil(scanTimeoutMs / 1000));
    const command = this.createCommand({ kind: 'discover', waitSeconds });
    const lines: string[] = [];

    return new Promise<SourceName[]>((resolve, reject) => {
      let settled = false;
      const finish = (error: TransportError | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        resolve(parseSourceLines(lines.join('\n')));
      };

      const timer = setTimeout(() => {
        try {
          command.kill('SIGKILL');
        } catch (error) {
          this.log.debug({ err: error }, 'Discovery process already exited');
        }
        finish(null);
      }, scanTimeoutMs + (waitSeconds * 1000) + (this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS));

      command.on('stderr', (line: string) => {
        lines.push(line);
      });
      // The dummy input makes ffmpeg exit non-zero once the listing is printed.
      command.once('error', (error: unknown) => {
        finish(classifySpawnError(error));
      });
      command.once('end', () => {
        finish(null);
      });

      try {
        command.run();
      } catch (error) {
        finish(
          classifySpawnError(error) ??
            new TransportError('spawn-failed', error instanceof Error ? error.message : String(error), { cause: error })
        );
      }
    });
  }

  async connect(source: SourceName): Promise<ConnectionHandle> {
    const colorFormat = this.options.colorFormat ?? 'bgra';
    const wire = WIRE_FORMATS[colorFormat];
    const command = this.createCommand({ kind: 'receive', source, pixelFormat: wire.pixFmt });
    const handle: ConnectionHandle = Object.freeze({ id: this.nextHandleId++, source });
    const connection = new NdiConnection(
      handle,
      command,
      wire,
      this.options.queueDepth ?? DEFAULT_QUEUE_DEPTH,
      this.log
    );

    try {
      await connection.open(this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
    } catch (error) {
      await connection.close(this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS);
      throw error;
    }

    this.connections.set(handle.id, connection);
    return handle;
  }

  receive(handle: ConnectionHandle, timeoutMs: number): Promise<RawFrame | null> {
    const connection = this.connections.get(handle.id);
    if (!connection) {
      return Promise.reject(new TransportError('closed', `Connection ${handle.id} is not open`));
    }
    return connection.receive(timeoutMs);
  }

  async close(handle: ConnectionHandle): Promise<void> {
    const connection = this.connections.get(handle.id);
    if (!connection) {
      return;
    }
    this.connections.delete(handle.id);
    await connection.close(this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS);
  }

  async closeAll(): Promise<void> {
    const handles = Array.from(this.connections.values(), connection => connection.handle);
    await Promise.all(handles.map(handle => this.close(handle)));
  }

  private createCommand(request: NdiCommandRequest): NdiCommand {
    if (this.options.commandFactory) {
      return this.options.commandFactory(request);
    }

    if (request.kind === 'discover') {
      return ffmpeg('dummy')
        .inputFormat(NDI_INPUT_FORMAT)
        .inputOptions(['-find_sources', '1', '-wait_sources', String(request.waitSeconds)])
        .outputOptions(['-f', 'null'])
        .output('-');
    }

    return ffmpeg(request.source)
      .inputFormat(NDI_INPUT_FORMAT)
      .outputOptions(['-f', 'rawvideo', '-pix_fmt', request.pixelFormat]);
  }
}
