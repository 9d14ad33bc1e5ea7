import { EventEmitter } from 'node:events';
import loggerModule, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { DiscoveryTransport, SourceName, SourceSnapshot } from '../types.js';

export type SourceRegistryOptions = {
  transport: Pick<DiscoveryTransport, 'listSources'>;
  scanTimeoutMs: number;
  pollIntervalMs: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type SourceRegistryUpdate = {
  snapshot: SourceSnapshot;
  added: SourceName[];
  removed: SourceName[];
};

export class SourceRegistry extends EventEmitter {
  private readonly transport: Pick<DiscoveryTransport, 'listSources'>;
  private readonly scanTimeoutMs: number;
  private pollIntervalMs: number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private current: SourceSnapshot;
  private readonly appearances = new Map<SourceName, number>();
  private inflight: Promise<SourceSnapshot> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: SourceRegistryOptions) {
    super();
    this.transport = options.transport;
    this.scanTimeoutMs = options.scanTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs;
    this.log = options.logger ?? loggerModule.child({ component: 'source-registry' });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
    this.current = Object.freeze({ names: Object.freeze([]), observedAt: 0, sequence: 0 });
  }

  start(pollIntervalMs = this.pollIntervalMs) {
    if (this.running) {
      return;
    }
    this.pollIntervalMs = pollIntervalMs;
    this.running = true;
    this.runScheduledPoll();
  }

  snapshot(): SourceSnapshot {
    return this.current;
  }

  /** Poll sequence in which `name` last appeared, or undefined when it is not visible. */
  appearanceSequence(name: SourceName): number | undefined {
    return this.appearances.get(name);
  }

  refreshNow(): Promise<SourceSnapshot> {
    if (!this.inflight) {
      this.inflight = this.poll().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inflight) {
      await this.inflight;
    }
  }

  isRunning() {
    return this.running;
  }

  private runScheduledPoll() {
    void this.refreshNow()
      .catch(error => {
        this.log.error({ err: error }, 'Unexpected discovery failure');
      })
      .finally(() => {
        this.scheduleNext();
      });
  }

  private scheduleNext() {
    if (!this.running) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runScheduledPoll();
    }, this.pollIntervalMs);
  }

  private async poll(): Promise<SourceSnapshot> {
    let names: SourceName[];
    let failed = false;
    try {
      names = await this.transport.listSources(this.scanTimeoutMs);
    } catch (error) {
      failed = true;
      names = [];
      this.log.warn({ err: error }, 'Source discovery failed; treating as zero sources');
    }

    const next = this.publish(names);
    this.metrics.recordDiscoveryPoll(next.names.length, failed);
    return next;
  }

  private publish(names: SourceName[]): SourceSnapshot {
    const previous = this.current;
    const unique = Array.from(new Set(names));
    const sequence = previous.sequence + 1;
    const snapshot: SourceSnapshot = Object.freeze({
      names: Object.freeze(unique),
      observedAt: this.now(),
      sequence
    });

    const previousNames = new Set(previous.names);
    const nextNames = new Set(unique);
    const added = unique.filter(name => !previousNames.has(name));
    const removed = previous.names.filter(name => !nextNames.has(name));

    for (const name of removed) {
      this.appearances.delete(name);
    }
    for (const name of added) {
      this.appearances.set(name, sequence);
    }

    this.current = snapshot;

    if (added.length > 0 || removed.length > 0) {
      this.log.info({ added, removed, count: unique.length }, 'Source list changed');
    } else {
      this.log.debug({ count: unique.length }, 'Source list unchanged');
    }

    this.emit('update', { snapshot, added, removed } satisfies SourceRegistryUpdate);
    return snapshot;
  }
}
