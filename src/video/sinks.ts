import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import loggerModule, { type Logger } from '../logger.js';
import type { Frame, FrameSink } from '../types.js';

const SNAPSHOT_FILE_NAME = 'last.png';

export class NullFrameSink implements FrameSink {
  private count = 0;
  private last: Pick<Frame, 'width' | 'height' | 'capturedAt'> | null = null;

  deliver(frame: Frame) {
    this.count += 1;
    this.last = { width: frame.width, height: frame.height, capturedAt: frame.capturedAt };
  }

  get framesReceived() {
    return this.count;
  }

  get lastFrame() {
    return this.last;
  }
}

export type SnapshotSinkOptions = {
  directory: string;
  intervalMs: number;
  logger?: Logger;
  now?: () => number;
};

/** Writes the newest frame as `<directory>/last.png`, at most once per interval. */
export class SnapshotSink implements FrameSink {
  private readonly directory: string;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastWriteAt: number | null = null;

  constructor(options: SnapshotSinkOptions) {
    this.directory = options.directory;
    this.intervalMs = options.intervalMs;
    this.log = options.logger ?? loggerModule.child({ component: 'snapshot-sink' });
    this.now = options.now ?? (() => Date.now());
  }

  get filePath() {
    return path.join(this.directory, SNAPSHOT_FILE_NAME);
  }

  deliver(frame: Frame) {
    const now = this.now();
    if (this.lastWriteAt !== null && now - this.lastWriteAt < this.intervalMs) {
      return;
    }
    this.lastWriteAt = now;
    persistPng(frame, this.directory);
    this.log.debug({ file: this.filePath, width: frame.width, height: frame.height }, 'Snapshot written');
  }
}

export function encodePng(frame: Pick<Frame, 'width' | 'height' | 'pixels'>): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  frame.pixels.copy(png.data, 0, 0, frame.width * frame.height * 4);
  return PNG.sync.write(png);
}

export function persistPng(frame: Pick<Frame, 'width' | 'height' | 'pixels'>, directory: string) {
  fs.mkdirSync(directory, { recursive: true });
  const filePath = path.join(directory, SNAPSHOT_FILE_NAME);
  fs.writeFileSync(filePath, encodePng(frame));
  return filePath;
}

/** Delivers every frame to each sink; a failing sink does not starve the others. */
export class FanOutSink implements FrameSink {
  constructor(
    private readonly sinks: FrameSink[],
    private readonly log: Logger = loggerModule.child({ component: 'frame-sink' })
  ) {}

  deliver(frame: Frame) {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.deliver(frame);
      } catch (error) {
        failures.push(error);
        this.log.warn({ err: error }, 'Frame sink rejected frame');
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} frame sink(s) failed`);
    }
  }

  async close() {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        await sink.close?.();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} frame sink(s) failed to close`);
    }
  }
}
