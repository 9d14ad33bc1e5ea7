import loggerModule, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { SourceRegistry } from '../discovery/registry.js';
import type {
  ConnectionSupervisor,
  FatalEvent,
  StateChangeEvent,
  SupervisorCommandResult
} from '../supervisor/connectionSupervisor.js';
import type { FramePumpStats } from '../video/framePump.js';
import type { SourceName } from '../types.js';
import type { ComponentIdentity } from './identity.js';
import type { ConfigurationStore } from './persistence.js';
import {
  assertNever,
  controlError,
  parseControlMessage,
  type ControlCommand,
  type ControlError,
  type ControlResponse,
  type ControlSnapshot,
  type PersistedConfiguration
} from './protocol.js';

export type CommandOrigin = 'local' | 'bridge';

export type CommandResult =
  | { ok: true; response: ControlResponse; changed: boolean }
  | { ok: false; error: ControlError };

export type StateChangedListener = (snapshot: ControlSnapshot, messages: ControlResponse[]) => void;

type SupervisorView = Pick<
  ConnectionSupervisor,
  'getState' | 'getMatcher' | 'setSource' | 'setLocked' | 'on' | 'off'
>;

type RegistryView = Pick<SourceRegistry, 'snapshot' | 'refreshNow' | 'on' | 'off'>;

export type ControlPlaneOptions = {
  supervisor: SupervisorView;
  registry: RegistryView;
  store: ConfigurationStore;
  identity: ComponentIdentity;
  pump?: { getStats(): FramePumpStats };
  outputResolution?: [number, number];
  autoSwitch?: boolean;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export class ControlPlane {
  private readonly supervisor: SupervisorView;
  private readonly registry: RegistryView;
  private readonly store: ConfigurationStore;
  private readonly identity: ComponentIdentity;
  private readonly pump: { getStats(): FramePumpStats } | undefined;
  private readonly outputResolution: [number, number];
  private readonly autoSwitch: boolean;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly listeners = new Set<StateChangedListener>();
  private revision = 0;
  /** One entry per command in flight; state events mark every entry dirty. */
  private readonly pending = new Set<{ dirty: boolean }>();
  private lastAnnouncedSource: SourceName | null = null;
  private lastError: string | null = null;
  private broadcastTimer: NodeJS.Timeout | null = null;
  private readonly detach: Array<() => void> = [];

  constructor(options: ControlPlaneOptions) {
    this.supervisor = options.supervisor;
    this.registry = options.registry;
    this.store = options.store;
    this.identity = options.identity;
    this.pump = options.pump;
    this.outputResolution = options.outputResolution ?? [0, 0];
    this.autoSwitch = options.autoSwitch ?? true;
    this.log = options.logger ?? loggerModule.child({ component: 'control-plane' });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? (() => Date.now());
    this.lastAnnouncedSource = this.supervisor.getState().activeSource;

    const onState = (event: StateChangeEvent) => {
      if (event.reason === 'connect-failed' || event.reason === 'retries-exhausted') {
        this.lastError = `Connection failed (${event.reason})`;
      } else if (event.state.status === 'connected') {
        this.lastError = null;
      }
      this.changed();
    };
    const onFatal = (event: FatalEvent) => {
      this.lastError = event.error.message;
      this.changed();
    };
    const onUpdate = () => {
      this.changed();
    };

    this.supervisor.on('state', onState);
    this.supervisor.on('fatal', onFatal);
    this.registry.on('update', onUpdate);
    this.detach.push(
      () => this.supervisor.off('state', onState),
      () => this.supervisor.off('fatal', onFatal),
      () => this.registry.off('update', onUpdate)
    );
  }

  getSnapshot(): ControlSnapshot {
    const state = this.supervisor.getState();
    const sources = [...this.registry.snapshot().names];
    const matcher = this.supervisor.getMatcher();
    const stats = this.pump?.getStats();
    const resolution: [number, number] = stats ? [stats.width, stats.height] : [0, 0];
    const outputResolution: [number, number] =
      this.outputResolution[0] > 0 && this.outputResolution[1] > 0 ? [...this.outputResolution] : resolution;
    const current = state.activeSource ?? '';
    const { componentId, componentName } = this.identity;

    return {
      version: this.revision,
      componentId,
      componentName,
      sources,
      currentSources: [current],
      regexPatterns: [matcher.policy.pattern],
      effectiveRegexPatterns: [matcher.effectivePattern],
      outputNames: [componentName],
      outputResolutions: [outputResolution],
      outputSources: { [componentName]: current },
      pluralHandlingEnabled: matcher.policy.pluralRelaxation,
      caseSensitive: matcher.policy.caseSensitive,
      locks: [state.locked],
      lastUpdate: this.now(),
      currentSource: state.activeSource,
      previousSource: state.previousSource,
      status: state.status,
      connected: state.status === 'connected' || state.status === 'degraded',
      fps: stats?.measuredFps ?? 0,
      sourceFps: stats?.sourceFps ?? 0,
      frameRateN: stats?.frameRateN ?? 0,
      frameRateD: stats?.frameRateD ?? 0,
      resolution,
      pattern: matcher.policy.pattern,
      locked: state.locked,
      autoSwitchEnabled: this.autoSwitch,
      error: this.lastError
    };
  }

  async handleMessage(raw: string, origin: CommandOrigin = 'local'): Promise<ControlResponse | null> {
    const parsed = parseControlMessage(raw);
    if (!parsed.ok) {
      this.metrics.recordCommandError(parsed.error.code);
      this.log.warn({ origin, code: parsed.error.code }, parsed.error.message);
      return { action: 'error', code: parsed.error.code, message: parsed.error.message };
    }

    const { command, componentId } = parsed.request;
    // Bridge commands must name this component; local ones may omit it.
    const addressedElsewhere =
      origin === 'bridge'
        ? componentId !== this.identity.componentId
        : componentId !== null && componentId !== this.identity.componentId;
    if (addressedElsewhere) {
      this.metrics.recordCommandError('component_mismatch');
      this.log.debug(
        { origin, action: command.action, target: componentId, componentId: this.identity.componentId },
        'Ignoring command addressed to another component'
      );
      return null;
    }

    const result = await this.applyCommand(command);
    if (!result.ok) {
      return { action: 'error', code: result.error.code, message: result.error.message };
    }
    return result.response;
  }

  async applyCommand(command: ControlCommand): Promise<CommandResult> {
    this.metrics.recordCommand(command.action);
    const batch = { dirty: false };
    this.pending.add(batch);
    let result: CommandResult;
    try {
      result = await this.execute(command);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ err: error, action: command.action }, 'Control command failed');
      result = { ok: false, error: controlError('invalid_params', message) };
    } finally {
      this.pending.delete(batch);
    }

    if (!result.ok) {
      this.metrics.recordCommandError(result.error.code);
      this.log.warn({ action: command.action, code: result.error.code }, result.error.message);
    }

    // A failed command still reports state that changed while it ran.
    const forceBroadcast = result.ok && command.action === 'refresh_sources';
    if (forceBroadcast || batch.dirty) {
      this.publish();
    }
    return result;
  }

  onStateChanged(callback: StateChangedListener) {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  startBroadcaster(intervalMs: number) {
    if (this.broadcastTimer) {
      clearInterval(this.broadcastTimer);
    }
    this.broadcastTimer = setInterval(() => {
      this.notify(this.getSnapshot());
    }, intervalMs);
    this.broadcastTimer.unref();
  }

  stop() {
    if (this.broadcastTimer) {
      clearInterval(this.broadcastTimer);
      this.broadcastTimer = null;
    }
    for (const detach of this.detach.splice(0)) {
      detach();
    }
    this.listeners.clear();
  }

  private async execute(command: ControlCommand): Promise<CommandResult> {
    switch (command.action) {
      case 'request_state':
        return this.stateResponse(false);
      case 'ping':
        return { ok: true, response: { action: 'pong', timestamp: this.now() }, changed: false };
      case 'set_source':
        return this.fromSupervisor(await this.supervisor.setSource(command.sourceName));
      case 'refresh_sources':
        await this.registry.refreshNow();
        return this.stateResponse(true);
      case 'set_lock':
      case 'set_lock_global':
        return this.fromSupervisor(await this.supervisor.setLocked(command.locked));
      case 'save_configuration':
        return this.saveConfiguration();
      case 'recall_configuration':
        return this.recallConfiguration();
      default:
        return assertNever(command);
    }
  }

  private stateResponse(changed: boolean): CommandResult {
    return { ok: true, response: { action: 'state_update', state: this.getSnapshot() }, changed };
  }

  private fromSupervisor(result: SupervisorCommandResult): CommandResult {
    if (!result.ok) {
      return { ok: false, error: controlError(result.code, result.message) };
    }
    return this.stateResponse(result.changed);
  }

  private async saveConfiguration(): Promise<CommandResult> {
    const state = this.supervisor.getState();
    const configuration: PersistedConfiguration = {
      currentSource: state.activeSource,
      locked: state.locked,
      pattern: this.supervisor.getMatcher().policy.pattern,
      savedAt: new Date(this.now()).toISOString()
    };
    try {
      await this.store.save(configuration);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: controlError('persistence_failed', `Failed to save configuration: ${message}`) };
    }
    this.log.info({ ...configuration }, 'Configuration saved');
    return { ok: true, response: { action: 'configuration_saved', configuration }, changed: false };
  }

  private async recallConfiguration(): Promise<CommandResult> {
    let configuration: PersistedConfiguration | null;
    try {
      configuration = await this.store.load();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: controlError('persistence_failed', `Failed to load configuration: ${message}`) };
    }
    if (!configuration) {
      return { ok: false, error: controlError('nothing_saved', 'No saved configuration') };
    }

    let changed = false;
    let sourceError: ControlError | null = null;
    const saved = configuration.currentSource;
    if (saved !== null && this.registry.snapshot().names.includes(saved)) {
      const result = await this.supervisor.setSource(saved);
      if (result.ok) {
        changed = result.changed;
      } else {
        sourceError = controlError(result.code, result.message);
      }
    } else if (saved !== null) {
      this.log.info({ source: saved }, 'Saved source not visible; keeping current source');
    }

    const lockResult = await this.supervisor.setLocked(configuration.locked);
    changed = changed || (lockResult.ok && lockResult.changed);

    if (sourceError) {
      return { ok: false, error: sourceError };
    }

    this.log.info({ source: saved, locked: configuration.locked }, 'Configuration recalled');
    return {
      ok: true,
      response: { action: 'configuration_recalled', configuration, state: this.getSnapshot() },
      changed
    };
  }

  private changed() {
    if (this.pending.size > 0) {
      for (const batch of this.pending) {
        batch.dirty = true;
      }
      return;
    }
    this.publish();
  }

  private publish() {
    for (const batch of this.pending) {
      batch.dirty = false;
    }
    this.revision += 1;
    this.notify(this.getSnapshot());
  }

  private notify(snapshot: ControlSnapshot) {
    const messages: ControlResponse[] = [];
    const current = snapshot.currentSource;
    if (current !== null && current !== this.lastAnnouncedSource) {
      messages.push({ action: 'source_changed', block_idx: 0, source_name: current });
    }
    this.lastAnnouncedSource = current;
    messages.push({ action: 'state_update', state: snapshot });

    for (const listener of this.listeners) {
      try {
        listener(snapshot, messages);
      } catch (error) {
        this.log.error({ err: error }, 'State listener failed');
      }
    }
  }
}
