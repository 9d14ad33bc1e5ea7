import { setTimeout as delay } from 'node:timers/promises';
import defaultBus, { EventBus } from './eventBus.js';
import loggerModule, { setLogLevel, type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { registerHealthIndicator, registerShutdownHook } from './app.js';
import type { ConfigManager, ConfigReloadEvent, ReceiverConfig } from './config/index.js';
import { compileNamingPolicy, type CompiledMatcher } from './discovery/nameMatcher.js';
import { SourceRegistry } from './discovery/registry.js';
import { ConnectionSupervisor, type FatalEvent } from './supervisor/connectionSupervisor.js';
import { FramePump } from './video/framePump.js';
import { FanOutSink, NullFrameSink, SnapshotSink } from './video/sinks.js';
import { ControlPlane } from './control/controlPlane.js';
import { resolveIdentity, type ComponentIdentity } from './control/identity.js';
import { JsonFileConfigurationStore, type ConfigurationStore } from './control/persistence.js';
import { startControlServer, type ControlServerRuntime } from './server/http.js';
import { BridgeClient } from './server/bridge.js';
import { FfmpegNdiTransport } from './transport/ffmpegNdi.js';
import type { DiscoveryTransport, FrameSink, NamingPolicy } from './types.js';

export interface ReceiverStartOptions {
  /** Used as-is when no config manager is given. */
  config?: ReceiverConfig;
  /** Supplies the configuration and is watched for reloads. */
  configManager?: ConfigManager;
  transport?: DiscoveryTransport & { closeAll?(): Promise<void> };
  bus?: EventBus;
  logger?: Logger;
  metrics?: MetricsRegistry;
  store?: ConfigurationStore;
  sinks?: FrameSink[];
  hostname?: string;
  onFatal?: (event: FatalEvent) => void;
}

export type ReceiverRuntime = {
  config: ReceiverConfig;
  identity: ComponentIdentity;
  registry: SourceRegistry;
  supervisor: ConnectionSupervisor;
  pump: FramePump;
  controlPlane: ControlPlane;
  server: ControlServerRuntime;
  bridge: BridgeClient | null;
  stop: () => Promise<void>;
};

export async function startReceiver(options: ReceiverStartOptions = {}): Promise<ReceiverRuntime> {
  const manager = options.configManager;
  const initialConfig = manager?.getConfig() ?? options.config;
  if (!initialConfig) {
    throw new Error('A configuration or config manager is required');
  }
  let activeConfig = initialConfig;

  const log = options.logger ?? loggerModule.child({ component: 'receiver' });
  const registryMetrics = options.metrics ?? metrics;
  const bus = options.bus ?? defaultBus;
  const identity = resolveIdentity(activeConfig.app, options.hostname);

  const applyConfiguredLogLevel = (level: string) => {
    try {
      setLogLevel(level);
    } catch (error) {
      log.warn({ err: error, level }, 'Failed to apply configured log level');
    }
  };

  applyConfiguredLogLevel(activeConfig.logging.level);
  bus.configureSuppression(activeConfig.events.suppression.rules);

  const transport =
    options.transport ??
    new FfmpegNdiTransport({
      colorFormat: activeConfig.source.colorFormat,
      ffmpegPath: process.env.FFMPEG_PATH
    });

  const registry = new SourceRegistry({
    transport,
    scanTimeoutMs: activeConfig.discovery.scanTimeoutMs,
    pollIntervalMs: activeConfig.discovery.pollIntervalMs,
    metrics: registryMetrics
  });

  const supervisorConfig = activeConfig.supervisor;
  const supervisor = new ConnectionSupervisor({
    transport,
    registry,
    matcher: compileNamingPolicy(activeConfig.policy),
    retryDelayMs: supervisorConfig.retryDelayMs,
    livenessTimeoutMs: supervisorConfig.livenessTimeoutMs,
    switchCheckIntervalMs: supervisorConfig.switchCheckIntervalMs,
    maxRetries: supervisorConfig.maxRetries,
    autoSwitch: supervisorConfig.autoSwitch,
    fallbackToFirstSource: supervisorConfig.fallbackToFirstSource,
    initialSource: activeConfig.source.name,
    metrics: registryMetrics,
    eventBus: bus
  });

  const sinks: FrameSink[] = options.sinks ? [...options.sinks] : [new NullFrameSink()];
  if (activeConfig.snapshot.enabled) {
    sinks.push(
      new SnapshotSink({
        directory: activeConfig.snapshot.directory,
        intervalMs: activeConfig.snapshot.intervalMs
      })
    );
  }
  const sink = new FanOutSink(sinks);

  const pump = new FramePump({ transport, supervisor, sink, metrics: registryMetrics });

  const controlPlane = new ControlPlane({
    supervisor,
    registry,
    store: options.store ?? new JsonFileConfigurationStore(activeConfig.control.persistencePath),
    identity,
    pump,
    outputResolution: activeConfig.output.resolution,
    autoSwitch: supervisorConfig.autoSwitch,
    metrics: registryMetrics
  });

  const handleFatal = (event: FatalEvent) => {
    log.fatal(
      { err: event.error, failures: event.failures, source: event.lastTarget },
      'Connection retries exhausted'
    );
    options.onFatal?.(event);
  };
  supervisor.on('fatal', handleFatal);

  const unregisterHealth = [
    registerHealthIndicator('connection', () => {
      const state = supervisor.getState();
      const exhausted = supervisor.isRetryExhausted();
      return {
        status: state.status === 'degraded' || exhausted ? 'degraded' : 'ok',
        details: { status: state.status, activeSource: state.activeSource, retriesExhausted: exhausted }
      };
    }),
    registerHealthIndicator('discovery', () => {
      const snapshot = registry.snapshot();
      return {
        status: registry.isRunning() ? 'ok' : 'stopping',
        details: { sources: snapshot.names.length, sequence: snapshot.sequence }
      };
    }),
    registerHealthIndicator('frames', () => {
      const stats = pump.getStats();
      return {
        status: 'ok',
        details: { fps: stats.measuredFps, delivered: stats.framesDelivered, dropped: stats.framesDropped }
      };
    })
  ];

  const server = await startControlServer({
    controlPlane,
    port: activeConfig.control.port,
    host: activeConfig.control.host,
    bus,
    metrics: registryMetrics
  });

  let bridge: BridgeClient | null = null;
  if (activeConfig.control.bridgeUrl) {
    bridge = new BridgeClient({
      url: activeConfig.control.bridgeUrl,
      componentId: identity.componentId,
      controlPlane,
      reconnectDelayMs: activeConfig.control.bridgeReconnectDelayMs
    });
    bridge.start();
  }

  const applyPolicy = (policy: NamingPolicy) => {
    let matcher: CompiledMatcher;
    try {
      matcher = compileNamingPolicy(policy);
    } catch (error) {
      log.warn({ err: error, pattern: policy.pattern }, 'Ignoring invalid naming policy; keeping previous');
      return;
    }
    supervisor.setMatcher(matcher).catch(error => {
      log.error({ err: error }, 'Failed to apply naming policy');
    });
  };

  let stopWatching: (() => void) | null = null;
  const handleReload = ({ previous, next }: ConfigReloadEvent) => {
    activeConfig = next;
    if (next.logging.level !== previous.logging.level) {
      applyConfiguredLogLevel(next.logging.level);
    }
    if (JSON.stringify(next.policy) !== JSON.stringify(previous.policy)) {
      applyPolicy(next.policy);
    }
    bus.configureSuppression(next.events.suppression.rules);
    log.info(
      { pattern: next.policy.pattern, level: next.logging.level, suppressionRules: next.events.suppression.rules.length },
      'configuration reloaded'
    );
  };
  const handleManagerError = (error: unknown) => {
    log.warn(
      { err: error, configPath: manager?.getPath(), action: 'reload', restored: true },
      'configuration reload failed'
    );
  };
  if (manager) {
    stopWatching = manager.watch();
    manager.on('reload', handleReload);
    manager.on('error', handleManagerError);
  }

  registry.start();
  await registry.refreshNow();
  await supervisor.start();
  controlPlane.startBroadcaster(activeConfig.control.broadcastIntervalMs);

  let running = true;
  const frameLoop = (async () => {
    while (running) {
      try {
        const result = await pump.pollFrame(activeConfig.pump.frameTimeoutMs);
        if (result.type === 'error' && running) {
          await delay(activeConfig.pump.frameTimeoutMs);
        }
      } catch (error) {
        log.error({ err: error }, 'Frame loop iteration failed');
        await delay(activeConfig.pump.frameTimeoutMs);
      }
    }
  })();

  log.info(
    { componentId: identity.componentId, port: server.port, pattern: activeConfig.policy.pattern },
    'Receiver started'
  );

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = runStop();
    }
    return stopping;
  };

  const step = async (name: string, task: () => void | Promise<void>) => {
    try {
      await task();
    } catch (error) {
      log.warn({ err: error, step: name }, 'Receiver shutdown step failed');
    }
  };

  const runStop = async () => {
    log.info('Receiver stopping');
    if (manager) {
      manager.off('reload', handleReload);
      manager.off('error', handleManagerError);
      stopWatching?.();
    }
    running = false;
    await step('frame-loop', () => frameLoop);
    await step('connection', async () => {
      await supervisor.stop();
      await transport.closeAll?.();
    });
    await step('discovery', () => registry.stop());
    await step('broadcaster', () => controlPlane.stop());
    await step('control-server', () => server.close());
    await step('bridge', () => bridge?.stop());
    await step('sinks', () => sink.close());
    supervisor.off('fatal', handleFatal);
    unregisterHealth.forEach(unregister => unregister());
    unregisterShutdown();
    log.info('Receiver stopped');
  };

  const unregisterShutdown = registerShutdownHook('receiver', () => stop());

  return { config: activeConfig, identity, registry, supervisor, pump, controlPlane, server, bridge, stop };
}
