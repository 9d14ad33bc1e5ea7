import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { ReceiverEvent } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LastErrorRecord = {
  message: string;
  component: string | null;
  at: number;
};

type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    byComponent: Record<string, CounterMap>;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  events: {
    total: number;
    byKind: CounterMap;
    bySeverity: CounterMap;
    suppressed: number;
    suppressedByRule: CounterMap;
    lastEventAt: string | null;
  };
  discovery: {
    polls: number;
    failures: number;
    lastSourceCount: number;
    lastPollAt: string | null;
  };
  connection: {
    attempts: number;
    failures: number;
    switches: number;
    switchesByReason: CounterMap;
    degraded: number;
  };
  frames: {
    delivered: number;
    dropped: number;
    droppedByReason: CounterMap;
    sinkErrors: number;
    measuredFps: number;
    sourceFps: number;
  };
  control: {
    commands: CounterMap;
    errors: CounterMap;
    broadcasts: number;
    broadcastFailures: number;
    clients: number;
  };
  latencies: Record<string, LatencyStats>;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private currentLogLevel = 'info';
  private lastError: LastErrorRecord | null = null;
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private readonly eventKinds = new Map<string, number>();
  private readonly eventSeverities = new Map<string, number>();
  private suppressedEvents = 0;
  private readonly suppressedByRule = new Map<string, number>();
  private discoveryPolls = 0;
  private discoveryFailures = 0;
  private lastSourceCount = 0;
  private lastPollAt: number | null = null;
  private connectAttempts = 0;
  private connectFailures = 0;
  private sourceSwitches = 0;
  private readonly switchReasons = new Map<string, number>();
  private degradedTransitions = 0;
  private framesDelivered = 0;
  private framesDropped = 0;
  private readonly dropReasons = new Map<string, number>();
  private sinkErrors = 0;
  private measuredFps = 0;
  private sourceFps = 0;
  private readonly commandCounters = new Map<string, number>();
  private readonly commandErrors = new Map<string, number>();
  private broadcasts = 0;
  private broadcastFailures = 0;
  private connectedClients = 0;
  private readonly latencyStats = new Map<
    string,
    { count: number; totalMs: number; minMs: number; maxMs: number }
  >();
  private readonly resetEmitter = new EventEmitter();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.currentLogLevel = 'info';
    this.lastError = null;
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.eventKinds.clear();
    this.eventSeverities.clear();
    this.suppressedEvents = 0;
    this.suppressedByRule.clear();
    this.discoveryPolls = 0;
    this.discoveryFailures = 0;
    this.lastSourceCount = 0;
    this.lastPollAt = null;
    this.connectAttempts = 0;
    this.connectFailures = 0;
    this.sourceSwitches = 0;
    this.switchReasons.clear();
    this.degradedTransitions = 0;
    this.framesDelivered = 0;
    this.framesDropped = 0;
    this.dropReasons.clear();
    this.sinkErrors = 0;
    this.measuredFps = 0;
    this.sourceFps = 0;
    this.commandCounters.clear();
    this.commandErrors.clear();
    this.broadcasts = 0;
    this.broadcastFailures = 0;
    this.connectedClients = 0;
    this.latencyStats.clear();
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (context?.component) {
      const componentMap =
        this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      increment(componentMap, normalized);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastError = {
        message: context?.message ?? this.lastError?.message ?? '',
        component: context?.component ?? null,
        at: Date.now()
      };
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordEvent(event: ReceiverEvent) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    increment(this.eventKinds, event.kind);
    increment(this.eventSeverities, event.severity);
  }

  recordSuppressedEvent(ruleId: string) {
    this.suppressedEvents += 1;
    increment(this.suppressedByRule, ruleId);
  }

  recordDiscoveryPoll(sourceCount: number, failed = false) {
    this.discoveryPolls += 1;
    this.lastPollAt = Date.now();
    this.lastSourceCount = sourceCount;
    if (failed) {
      this.discoveryFailures += 1;
    }
  }

  recordConnectAttempt(succeeded: boolean) {
    this.connectAttempts += 1;
    if (!succeeded) {
      this.connectFailures += 1;
    }
  }

  recordSourceSwitch(reason: string) {
    this.sourceSwitches += 1;
    increment(this.switchReasons, reason);
  }

  recordDegraded() {
    this.degradedTransitions += 1;
  }

  recordFrameDelivered() {
    this.framesDelivered += 1;
  }

  recordFrameDropped(reason: string) {
    this.framesDropped += 1;
    increment(this.dropReasons, reason);
  }

  recordSinkError() {
    this.sinkErrors += 1;
  }

  setFrameRates(measuredFps: number, sourceFps: number) {
    if (Number.isFinite(measuredFps)) {
      this.measuredFps = measuredFps;
    }
    if (Number.isFinite(sourceFps)) {
      this.sourceFps = sourceFps;
    }
  }

  recordCommand(action: string) {
    increment(this.commandCounters, action);
  }

  recordCommandError(code: string) {
    increment(this.commandErrors, code);
  }

  recordBroadcast(failures = 0) {
    this.broadcasts += 1;
    this.broadcastFailures += failures;
  }

  setConnectedClients(count: number) {
    this.connectedClients = Math.max(0, count);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        byComponent: mapFromNested(this.logLevelByComponent),
        currentLevel: this.currentLogLevel,
        lastErrorAt: this.lastError ? new Date(this.lastError.at).toISOString() : null,
        lastErrorMessage: this.lastError?.message || null
      },
      events: {
        total: this.totalEvents,
        byKind: mapFrom(this.eventKinds),
        bySeverity: mapFrom(this.eventSeverities),
        suppressed: this.suppressedEvents,
        suppressedByRule: mapFrom(this.suppressedByRule),
        lastEventAt: this.lastEventTimestamp
          ? new Date(this.lastEventTimestamp).toISOString()
          : null
      },
      discovery: {
        polls: this.discoveryPolls,
        failures: this.discoveryFailures,
        lastSourceCount: this.lastSourceCount,
        lastPollAt: this.lastPollAt ? new Date(this.lastPollAt).toISOString() : null
      },
      connection: {
        attempts: this.connectAttempts,
        failures: this.connectFailures,
        switches: this.sourceSwitches,
        switchesByReason: mapFrom(this.switchReasons),
        degraded: this.degradedTransitions
      },
      frames: {
        delivered: this.framesDelivered,
        dropped: this.framesDropped,
        droppedByReason: mapFrom(this.dropReasons),
        sinkErrors: this.sinkErrors,
        measuredFps: this.measuredFps,
        sourceFps: this.sourceFps
      },
      control: {
        commands: mapFrom(this.commandCounters),
        errors: mapFrom(this.commandErrors),
        broadcasts: this.broadcasts,
        broadcastFailures: this.broadcastFailures,
        clients: this.connectedClients
      },
      latencies: mapFromLatencies(this.latencyStats)
    };
  }

  exportPrometheus(options: PrometheusOptions = {}): string {
    const prefix = options.prefix ?? 'led_receiver';
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const counter = (name: string, help: string, samples: Array<[Record<string, string>, number]>) => {
      const metricName = sanitizePrometheusMetricName(`${prefix}_${name}`);
      lines.push(`# HELP ${metricName} ${escapePrometheusHelp(help)}`);
      lines.push(`# TYPE ${metricName} ${name.endsWith('_total') ? 'counter' : 'gauge'}`);
      for (const [labels, value] of samples) {
        const rendered = formatPrometheusLabels({ ...baseLabels, ...labels });
        lines.push(`${metricName}${rendered} ${formatPrometheusValue(value)}`);
      }
    };

    counter('frames_delivered_total', 'Frames delivered to the sink', [[{}, this.framesDelivered]]);
    counter(
      'frames_dropped_total',
      'Frames discarded during validation',
      labelled('reason', this.dropReasons, this.framesDropped)
    );
    counter('connect_attempts_total', 'Transport connect attempts', [[{}, this.connectAttempts]]);
    counter('connect_failures_total', 'Failed transport connects', [[{}, this.connectFailures]]);
    counter(
      'source_switches_total',
      'Automatic and manual source switches',
      labelled('reason', this.switchReasons, this.sourceSwitches)
    );
    counter('discovery_polls_total', 'Discovery polls', [[{}, this.discoveryPolls]]);
    counter('discovery_failures_total', 'Failed discovery polls', [[{}, this.discoveryFailures]]);
    counter(
      'control_commands_total',
      'Control-plane commands received',
      labelled('action', this.commandCounters, 0)
    );
    counter(
      'log_lines_total',
      'Log lines by level',
      labelled('level', this.logLevelCounters, 0)
    );
    counter('measured_fps', 'Locally measured frames per second', [[{}, this.measuredFps]]);
    counter('source_fps', 'Frame rate advertised by the source', [[{}, this.sourceFps]]);
    counter('control_clients', 'Connected control clients', [[{}, this.connectedClients]]);

    return `${lines.join('\n')}\n`;
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function labelled(
  label: string,
  source: Map<string, number>,
  fallbackTotal: number
): Array<[Record<string, string>, number]> {
  const entries = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) {
    return [[{}, fallbackTotal]];
  }
  return entries.map(([key, value]) => [{ [label]: key }, value]);
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
    };
  }
  return result;
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'led_receiver_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `led_receiver_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type { CounterMap, LatencyStats, MetricsSnapshot, PrometheusOptions };
export { MetricsRegistry };
export default defaultRegistry;
