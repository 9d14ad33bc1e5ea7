import { setTimeout as delay } from 'node:timers/promises';
import loggerModule, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ConnectionSupervisor } from '../supervisor/connectionSupervisor.js';
import { TransportError, type DiscoveryTransport, type Frame, type FrameSink, type RawFrame } from '../types.js';
import { normalizeFrame, type FrameDropReason } from './pixelFormat.js';

const FPS_WINDOW_MS = 1000;

export type PollResult =
  | { type: 'frame'; frame: Frame }
  | { type: 'timeout' }
  | { type: 'idle' }
  | { type: 'dropped'; reason: FrameDropReason | 'stale-handle' }
  | { type: 'error'; error: Error };

export type FramePumpStats = {
  measuredFps: number;
  sourceFps: number;
  frameRateN: number;
  frameRateD: number;
  framesDelivered: number;
  framesDropped: number;
  width: number;
  height: number;
  lastFrameAt: number | null;
};

export type FramePumpOptions = {
  transport: Pick<DiscoveryTransport, 'receive'>;
  supervisor: Pick<ConnectionSupervisor, 'tick' | 'recordFrame' | 'getActiveHandle' | 'connectionLost'>;
  sink: FrameSink;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export class FramePump {
  private readonly transport: Pick<DiscoveryTransport, 'receive'>;
  private readonly supervisor: Pick<ConnectionSupervisor, 'tick' | 'recordFrame' | 'getActiveHandle' | 'connectionLost'>;
  private readonly sink: FrameSink;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly window: number[] = [];
  private framesDelivered = 0;
  private framesDropped = 0;
  private lastDropReason: string | null = null;
  private frameRateN = 0;
  private frameRateD = 0;
  private width = 0;
  private height = 0;
  private lastFrameAt: number | null = null;

  constructor(options: FramePumpOptions) {
    this.transport = options.transport;
    this.supervisor = options.supervisor;
    this.sink = options.sink;
    this.log = options.logger ?? loggerModule.child({ component: 'frame-pump' });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? (ms => delay(ms).then(() => undefined));
  }

  async pollFrame(timeoutMs: number): Promise<PollResult> {
    await this.supervisor.tick();

    const handle = this.supervisor.getActiveHandle();
    if (!handle) {
      await this.sleep(timeoutMs);
      return { type: 'idle' };
    }

    let raw: RawFrame | null;
    try {
      raw = await this.transport.receive(handle, timeoutMs);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.warn({ err, source: handle.source }, 'Frame receive failed');
      if (error instanceof TransportError && error.code === 'closed') {
        await this.supervisor.connectionLost(handle, err);
      }
      return { type: 'error', error: err };
    }

    if (!raw) {
      return { type: 'timeout' };
    }

    if (this.supervisor.getActiveHandle()?.id !== handle.id) {
      this.recordDrop('stale-handle', `Discarded frame from inactive connection to ${handle.source}`);
      return { type: 'dropped', reason: 'stale-handle' };
    }

    const normalized = normalizeFrame(raw);
    if (!normalized.ok) {
      this.recordDrop(normalized.reason, normalized.message);
      return { type: 'dropped', reason: normalized.reason };
    }

    const capturedAt = this.now();
    this.frameRateN = raw.frameRateN;
    this.frameRateD = raw.frameRateD;
    this.width = raw.width;
    this.height = raw.height;
    this.lastFrameAt = capturedAt;
    this.lastDropReason = null;
    this.framesDelivered += 1;
    this.window.push(capturedAt);
    this.pruneWindow(capturedAt);

    const frame: Frame = {
      width: raw.width,
      height: raw.height,
      pixels: normalized.pixels,
      sourceFrameRateHz: sourceRate(raw.frameRateN, raw.frameRateD),
      capturedAt
    };

    this.supervisor.recordFrame(capturedAt);
    this.metrics.recordFrameDelivered();
    this.metrics.setFrameRates(this.window.length, frame.sourceFrameRateHz);

    try {
      this.sink.deliver(frame);
    } catch (error) {
      this.metrics.recordSinkError();
      this.log.error({ err: error }, 'Frame sink failed');
    }

    return { type: 'frame', frame };
  }

  getStats(): FramePumpStats {
    this.pruneWindow(this.now());
    return {
      measuredFps: this.window.length,
      sourceFps: sourceRate(this.frameRateN, this.frameRateD),
      frameRateN: this.frameRateN,
      frameRateD: this.frameRateD,
      framesDelivered: this.framesDelivered,
      framesDropped: this.framesDropped,
      width: this.width,
      height: this.height,
      lastFrameAt: this.lastFrameAt
    };
  }

  private pruneWindow(now: number) {
    const cutoff = now - FPS_WINDOW_MS;
    let remove = 0;
    while (remove < this.window.length && this.window[remove] <= cutoff) {
      remove += 1;
    }
    if (remove > 0) {
      this.window.splice(0, remove);
    }
  }

  private recordDrop(reason: string, message: string) {
    this.framesDropped += 1;
    this.metrics.recordFrameDropped(reason);
    if (this.lastDropReason !== reason) {
      this.log.warn({ reason, dropped: this.framesDropped }, message);
    } else {
      this.log.debug({ reason, dropped: this.framesDropped }, message);
    }
    this.lastDropReason = reason;
  }
}

function sourceRate(numerator: number, denominator: number): number {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator <= 0) {
    return 0;
  }
  return numerator / denominator;
}
