import { EventEmitter } from 'node:events';
import loggerModule, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { EventBus } from '../eventBus.js';
import { filterMatching, type CompiledMatcher } from '../discovery/nameMatcher.js';
import { SerialQueue } from '../utils/serial.js';
import type {
  ConnectionHandle,
  ConnectionState,
  ConnectionStatus,
  DiscoveryTransport,
  SourceName,
  SourceSnapshot
} from '../types.js';

export type SourceRegistryView = {
  snapshot(): SourceSnapshot;
  appearanceSequence?(name: SourceName): number | undefined;
};

export type ConnectionSupervisorOptions = {
  transport: Pick<DiscoveryTransport, 'connect' | 'close'>;
  registry: SourceRegistryView;
  matcher: CompiledMatcher;
  retryDelayMs: number;
  livenessTimeoutMs: number;
  switchCheckIntervalMs: number;
  maxRetries?: number;
  autoSwitch?: boolean;
  fallbackToFirstSource?: boolean;
  /** Exact source name tried before the naming policy on every scan. */
  initialSource?: SourceName;
  /** Arms a timer that calls `tick()`; disable when an external loop drives it. */
  backgroundChecks?: boolean;
  logger?: Logger;
  metrics?: MetricsRegistry;
  eventBus?: EventBus;
  now?: () => number;
};

export type StateChangeReason =
  | 'scanning'
  | 'connected'
  | 'connect-failed'
  | 'no-target'
  | 'liveness-timeout'
  | 'recovered'
  | 'switched'
  | 'source-lost'
  | 'connection-lost'
  | 'manual'
  | 'lock'
  | 'policy'
  | 'retries-exhausted'
  | 'stopped';

export type StateChangeEvent = {
  state: ConnectionState;
  reason: StateChangeReason;
};

export type FatalEvent = {
  failures: number;
  lastTarget: SourceName | null;
  error: Error;
};

export type SupervisorCommandResult =
  | { ok: true; changed: boolean; state: ConnectionState }
  | { ok: false; code: 'source_not_found' | 'connect_failed'; message: string; state: ConnectionState };

export class ConnectionSupervisor extends EventEmitter {
  private readonly transport: Pick<DiscoveryTransport, 'connect' | 'close'>;
  private readonly registry: SourceRegistryView;
  private matcher: CompiledMatcher;
  private readonly retryDelayMs: number;
  private readonly livenessTimeoutMs: number;
  private readonly switchCheckIntervalMs: number;
  private readonly maxRetries: number | undefined;
  private readonly autoSwitch: boolean;
  private readonly fallbackToFirstSource: boolean;
  private readonly backgroundChecks: boolean;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly eventBus: EventBus | undefined;
  private readonly now: () => number;
  private readonly queue = new SerialQueue();

  private state: ConnectionState = {
    status: 'disconnected',
    activeSource: null,
    previousSource: null,
    locked: false,
    lastFrameAt: null
  };
  private handle: ConnectionHandle | null = null;
  private override: SourceName | null;
  private lastActiveSource: SourceName | null = null;
  private connectedAt = 0;
  private lastSwitchCheckAt = 0;
  private nextRetryAt = 0;
  private consecutiveFailures = 0;
  private retriesExhausted = false;
  private started = false;
  private stopped = false;
  private timer: NodeJS.Timeout | null = null;
  private pendingTick: Promise<void> | null = null;

  constructor(options: ConnectionSupervisorOptions) {
    super();
    this.transport = options.transport;
    this.registry = options.registry;
    this.matcher = options.matcher;
    this.retryDelayMs = options.retryDelayMs;
    this.livenessTimeoutMs = options.livenessTimeoutMs;
    this.switchCheckIntervalMs = options.switchCheckIntervalMs;
    this.maxRetries = options.maxRetries;
    this.autoSwitch = options.autoSwitch ?? true;
    this.fallbackToFirstSource = options.fallbackToFirstSource ?? true;
    this.backgroundChecks = options.backgroundChecks ?? true;
    this.override = options.initialSource ?? null;
    this.log = options.logger ?? loggerModule.child({ component: 'connection-supervisor' });
    this.metrics = options.metrics ?? metrics;
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => Date.now());
  }

  async start(): Promise<void> {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;
    await this.queue.run(() => this.scan());

    if (this.backgroundChecks && !this.stopped) {
      this.timer = setInterval(() => {
        this.tick().catch(error => {
          this.log.error({ err: error }, 'Connection check failed');
        });
      }, this.switchCheckIntervalMs);
      this.timer.unref();
    }
  }

  /**
   * Runs liveness detection, due reconnects and the switch check. Calls made while
   * a check is already queued share it.
   */
  tick(): Promise<void> {
    if (!this.pendingTick) {
      this.pendingTick = this.queue.run(() => this.evaluate()).finally(() => {
        this.pendingTick = null;
      });
    }
    return this.pendingTick;
  }

  recordFrame(at: number) {
    this.state.lastFrameAt = at;
    if (this.state.status === 'degraded') {
      void this.queue
        .run(() => {
          if (this.state.status === 'degraded' && this.handle) {
            this.log.info({ source: this.state.activeSource }, 'Frames resumed');
            this.setStatus('connected', 'recovered');
          }
        })
        .catch(error => {
          this.log.error({ err: error }, 'Failed to apply frame recovery');
        });
    }
  }

  /**
   * Drops a connection whose stream has ended. The next due `tick()` rescans; a call for a
   * handle that is no longer active is ignored.
   */
  connectionLost(handle: ConnectionHandle, error: Error): Promise<void> {
    return this.queue.run(async () => {
      if (this.stopped || this.handle?.id !== handle.id) {
        return;
      }
      const source = this.state.activeSource;
      this.log.warn({ source, err: error, retryInMs: this.retryDelayMs }, 'Connection lost');
      this.publishEvent('connection-lost', 'warning', `Connection to ${source ?? 'source'} lost: ${error.message}`, {
        source
      });
      await this.teardown();
      this.nextRetryAt = this.now() + this.retryDelayMs;
      this.setStatus('disconnected', 'connection-lost');
    });
  }

  setSource(name: SourceName): Promise<SupervisorCommandResult> {
    return this.queue.run<SupervisorCommandResult>(async () => {
      const snapshot = this.registry.snapshot();
      if (!snapshot.names.includes(name)) {
        return {
          ok: false,
          code: 'source_not_found',
          message: `Source "${name}" is not currently visible`,
          state: this.getState()
        };
      }

      if (name === this.state.activeSource && this.state.status === 'connected') {
        this.override = name;
        return { ok: true, changed: false, state: this.getState() };
      }

      this.override = name;
      this.consecutiveFailures = 0;
      this.retriesExhausted = false;
      this.log.info({ source: name, from: this.state.activeSource }, 'Manual source selection');
      await this.teardown();
      const connected = await this.connectTo(name, 'manual');
      if (!connected) {
        return {
          ok: false,
          code: 'connect_failed',
          message: `Failed to connect to "${name}"`,
          state: this.getState()
        };
      }
      return { ok: true, changed: true, state: this.getState() };
    });
  }

  setLocked(locked: boolean): Promise<SupervisorCommandResult> {
    return this.queue.run<SupervisorCommandResult>(() => {
      if (this.state.locked === locked) {
        return { ok: true, changed: false, state: this.getState() };
      }
      this.state.locked = locked;
      this.log.info({ locked }, locked ? 'Source locked' : 'Source unlocked');
      this.emitState('lock');
      return { ok: true, changed: true, state: this.getState() };
    });
  }

  setMatcher(matcher: CompiledMatcher): Promise<void> {
    return this.queue.run(() => {
      this.matcher = matcher;
      this.lastSwitchCheckAt = 0;
      this.log.info({ pattern: matcher.effectivePattern }, 'Naming policy updated');
      this.emitState('policy');
    });
  }

  getMatcher(): CompiledMatcher {
    return this.matcher;
  }

  getState(): ConnectionState {
    return { ...this.state };
  }

  getActiveHandle(): ConnectionHandle | null {
    return this.handle;
  }

  isRetryExhausted() {
    return this.retriesExhausted;
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      await this.queue.drain();
      return;
    }
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.queue.run(async () => {
      await this.teardown();
      if (this.state.status !== 'disconnected') {
        this.setStatus('disconnected', 'stopped');
      }
    });
  }

  private async evaluate(): Promise<void> {
    if (this.stopped || !this.started) {
      return;
    }
    const now = this.now();

    if (this.state.status === 'disconnected') {
      if (!this.retriesExhausted && now >= this.nextRetryAt) {
        await this.scan();
      }
      return;
    }

    let forceCheck = false;
    if (this.state.status === 'connected') {
      const reference = this.state.lastFrameAt ?? this.connectedAt;
      const gap = now - reference;
      if (gap > this.livenessTimeoutMs) {
        this.log.warn({ source: this.state.activeSource, gapMs: gap }, 'No frames within liveness timeout');
        this.metrics.recordDegraded();
        this.publishEvent('degraded', 'warning', `No frames from ${this.state.activeSource ?? 'source'} for ${gap}ms`, {
          source: this.state.activeSource,
          gapMs: gap
        });
        this.setStatus('degraded', 'liveness-timeout');
        forceCheck = true;
      }
    }

    if (forceCheck || now - this.lastSwitchCheckAt >= this.switchCheckIntervalMs) {
      await this.runSwitchCheck(now);
    }
  }

  private async runSwitchCheck(now: number): Promise<void> {
    this.lastSwitchCheckAt = now;
    if (this.state.locked || !this.autoSwitch) {
      return;
    }

    const active = this.state.activeSource;
    const snapshot = this.registry.snapshot();
    const present = active !== null && snapshot.names.includes(active);

    if (present && this.state.status !== 'degraded') {
      return;
    }
    // An empty poll carries no information about a source that still streams.
    if (snapshot.names.length === 0 && this.state.status === 'connected') {
      return;
    }

    const candidates = filterMatching(this.matcher, snapshot.names).filter(name => name !== active);
    const previous = this.state.previousSource;
    const target =
      previous !== null && candidates.includes(previous) ? previous : this.mostRecentlyAppeared(candidates);

    if (target) {
      this.log.info(
        { from: active, to: target, reason: present ? 'degraded' : 'vanished' },
        'Switching source'
      );
      this.metrics.recordSourceSwitch(present ? 'degraded' : 'vanished');
      this.publishEvent('source-switch', 'info', `Switching from ${active ?? 'none'} to ${target}`, {
        from: active,
        to: target
      });
      await this.teardown();
      await this.connectTo(target, 'switched');
      return;
    }

    if (!present) {
      this.log.warn({ source: active }, 'Active source vanished with no replacement');
      this.publishEvent('source-lost', 'warning', `Source ${active ?? 'none'} is no longer visible`, {
        source: active
      });
      await this.teardown();
      this.nextRetryAt = now + this.retryDelayMs;
      this.setStatus('disconnected', 'source-lost');
    }
  }

  private mostRecentlyAppeared(candidates: SourceName[]): SourceName | null {
    let best: SourceName | null = null;
    let bestSequence = Number.NEGATIVE_INFINITY;
    for (const name of candidates) {
      const sequence = this.registry.appearanceSequence?.(name) ?? 0;
      if (sequence > bestSequence || (sequence === bestSequence && best !== null && name < best)) {
        best = name;
        bestSequence = sequence;
      }
    }
    return best;
  }

  private selectScanTarget(snapshot: SourceSnapshot): SourceName | null {
    if (this.override && snapshot.names.includes(this.override)) {
      return this.override;
    }
    const [firstMatch] = filterMatching(this.matcher, snapshot.names);
    if (firstMatch !== undefined) {
      return firstMatch;
    }
    if (this.fallbackToFirstSource && snapshot.names.length > 0) {
      return snapshot.names[0] ?? null;
    }
    return null;
  }

  private async scan(): Promise<void> {
    const snapshot = this.registry.snapshot();
    const target = this.selectScanTarget(snapshot);
    if (!target) {
      this.nextRetryAt = this.now() + this.retryDelayMs;
      this.log.debug(
        { sources: snapshot.names.length, pattern: this.matcher.effectivePattern, retryInMs: this.retryDelayMs },
        'No source to connect to'
      );
      if (this.state.status !== 'disconnected') {
        this.setStatus('disconnected', 'no-target');
      }
      return;
    }
    await this.connectTo(target, 'connected');
  }

  private async connectTo(target: SourceName, reason: StateChangeReason): Promise<boolean> {
    this.setStatus('scanning', 'scanning', { activeSource: null });

    let handle: ConnectionHandle;
    try {
      handle = await this.transport.connect(target);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.metrics.recordConnectAttempt(false);
      this.consecutiveFailures += 1;
      this.nextRetryAt = this.now() + this.retryDelayMs;
      this.log.warn({ source: target, err, failures: this.consecutiveFailures }, 'Connect failed');
      this.publishEvent('connect-failed', 'warning', `Failed to connect to ${target}: ${err.message}`, {
        source: target,
        failures: this.consecutiveFailures
      });

      if (this.maxRetries !== undefined && this.consecutiveFailures > this.maxRetries) {
        this.retriesExhausted = true;
        this.setStatus('disconnected', 'retries-exhausted');
        this.log.error({ source: target, failures: this.consecutiveFailures }, 'Giving up after repeated connect failures');
        this.emit('fatal', { failures: this.consecutiveFailures, lastTarget: target, error: err } satisfies FatalEvent);
      } else {
        this.setStatus('disconnected', 'connect-failed');
      }
      return false;
    }

    if (this.stopped) {
      await this.closeHandle(handle);
      return false;
    }

    this.metrics.recordConnectAttempt(true);
    this.consecutiveFailures = 0;
    this.handle = handle;
    this.connectedAt = this.now();
    this.lastSwitchCheckAt = this.connectedAt;
    const previousSource =
      this.lastActiveSource !== null && this.lastActiveSource !== target
        ? this.lastActiveSource
        : this.state.previousSource;
    this.lastActiveSource = target;
    this.log.info({ source: target, previousSource }, 'Connected');
    this.publishEvent('connected', 'info', `Connected to ${target}`, { source: target });
    this.setStatus('connected', reason, { activeSource: target, previousSource, lastFrameAt: null });
    return true;
  }

  private async teardown(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) {
      return;
    }
    this.state.activeSource = null;
    await this.closeHandle(handle);
  }

  private async closeHandle(handle: ConnectionHandle) {
    try {
      await this.transport.close(handle);
    } catch (error) {
      this.log.warn({ err: error, source: handle.source }, 'Failed to close connection');
    }
  }

  private setStatus(
    status: ConnectionStatus,
    reason: StateChangeReason,
    patch: Partial<Omit<ConnectionState, 'status'>> = {}
  ) {
    this.state = { ...this.state, ...patch, status };
    if (status === 'disconnected') {
      this.state.activeSource = null;
    }
    this.emitState(reason);
  }

  private emitState(reason: StateChangeReason) {
    this.emit('state', { state: this.getState(), reason } satisfies StateChangeEvent);
  }

  private publishEvent(
    kind: string,
    severity: 'info' | 'warning' | 'critical',
    message: string,
    meta: Record<string, unknown>
  ) {
    this.eventBus?.emitEvent({ component: 'connection-supervisor', kind, severity, message, meta });
  }
}
