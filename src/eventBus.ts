import { EventEmitter } from 'node:events';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import type {
  EventSeverity,
  EventSuppressionRule,
  RateLimitConfig,
  ReceiverEvent,
  ReceiverEventPayload
} from './types.js';

const EVENT_CHANNEL = 'event';
const DEFAULT_HISTORY_LIMIT = 200;

interface EventBusDependencies {
  log: Logger;
  store?: (event: ReceiverEvent) => void;
  metrics?: MetricsRegistry;
  historyLimit?: number;
}

interface InternalSuppressionRule {
  id: string;
  kinds?: string[];
  components?: string[];
  severities?: EventSeverity[];
  rateLimit: RateLimitConfig;
  reason: string;
  timeline: SuppressionTimeline;
}

type SuppressionTimeline = {
  suppressedUntil: number;
  history: number[];
};

type SuppressionHit = {
  ruleId: string;
  reason: string;
  history: number[];
  suppressedUntil: number;
};

class EventBus extends EventEmitter {
  private suppressionRules: InternalSuppressionRule[] = [];
  private readonly recent: ReceiverEvent[] = [];
  private readonly store: ((event: ReceiverEvent) => void) | undefined;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly historyLimit: number;

  constructor(dependencies: EventBusDependencies = { log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
    this.historyLimit = Math.max(1, dependencies.historyLimit ?? DEFAULT_HISTORY_LIMIT);

    this.on(EVENT_CHANNEL, (event: ReceiverEvent) => {
      this.recent.push(event);
      if (this.recent.length > this.historyLimit) {
        this.recent.splice(0, this.recent.length - this.historyLimit);
      }
      this.store?.(event);
      this.metrics.recordEvent(event);
      const payload = { component: event.component, kind: event.kind, meta: event.meta };
      if (event.severity === 'critical') {
        this.log.error(payload, event.message);
      } else if (event.severity === 'warning') {
        this.log.warn(payload, event.message);
      } else {
        this.log.info(payload, event.message);
      }
    });
  }

  configureSuppression(rules: EventSuppressionRule[]) {
    this.suppressionRules = rules.map(rule => normalizeSuppressionRule(rule));
  }

  resetSuppressionState() {
    for (const rule of this.suppressionRules) {
      rule.timeline.suppressedUntil = 0;
      rule.timeline.history.length = 0;
    }
  }

  /** Newest last. */
  getRecentEvents(limit = this.historyLimit): ReceiverEvent[] {
    if (limit <= 0) {
      return [];
    }
    return this.recent.slice(-limit);
  }

  clearHistory() {
    this.recent.length = 0;
  }

  emitEvent(payload: ReceiverEventPayload): boolean {
    const event: ReceiverEvent = {
      ts: normalizeTimestamp(payload.ts),
      component: payload.component,
      kind: payload.kind,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };

    const hits = this.evaluateSuppression(event);
    if (hits.length > 0) {
      const primary = hits[0];
      for (const hit of hits) {
        this.metrics.recordSuppressedEvent(hit.ruleId);
      }
      this.log.debug(
        {
          component: event.component,
          kind: event.kind,
          severity: event.severity,
          suppressionRuleId: primary.ruleId,
          suppressionReason: primary.reason,
          suppressedUntil: primary.suppressedUntil,
          history: primary.history
        },
        'Event suppressed'
      );
      return false;
    }

    this.emit(EVENT_CHANNEL, event);
    return true;
  }

  onEvent(listener: (event: ReceiverEvent) => void) {
    this.on(EVENT_CHANNEL, listener);
    return () => {
      this.off(EVENT_CHANNEL, listener);
    };
  }

  private evaluateSuppression(event: ReceiverEvent): SuppressionHit[] {
    const hits: SuppressionHit[] = [];

    for (const rule of this.suppressionRules) {
      if (!ruleMatchesEvent(rule, event)) {
        continue;
      }

      const { timeline, rateLimit } = rule;
      pruneTimeline(timeline, event.ts - rateLimit.perMs);

      if (event.ts < timeline.suppressedUntil) {
        recordTimelineHistory(timeline, event.ts, rateLimit.count);
        hits.push({
          ruleId: rule.id,
          reason: rule.reason,
          history: [...timeline.history],
          suppressedUntil: timeline.suppressedUntil
        });
        continue;
      }

      const exceeded = timeline.history.length >= rateLimit.count;
      recordTimelineHistory(timeline, event.ts, rateLimit.count);

      if (exceeded) {
        const cooldownMs = rateLimit.cooldownMs ?? 0;
        if (cooldownMs > 0) {
          timeline.suppressedUntil = Math.max(timeline.suppressedUntil, event.ts + cooldownMs);
        }
        hits.push({
          ruleId: rule.id,
          reason: rule.reason,
          history: [...timeline.history],
          suppressedUntil: timeline.suppressedUntil
        });
      }
    }

    return hits;
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined') {
    return Date.now();
  }

  if (ts instanceof Date) {
    return ts.getTime();
  }

  return ts;
}

function normalizeSuppressionRule(rule: EventSuppressionRule): InternalSuppressionRule {
  return {
    id: rule.id,
    kinds: asArray(rule.kind),
    components: asArray(rule.component),
    severities: asArray(rule.severity),
    rateLimit: normalizeRateLimit(rule.rateLimit),
    reason: rule.reason,
    timeline: { suppressedUntil: 0, history: [] }
  };
}

function asArray<T>(value: T | T[] | undefined): T[] | undefined {
  if (typeof value === 'undefined') {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
}

function ruleMatchesEvent(rule: InternalSuppressionRule, event: ReceiverEvent): boolean {
  if (rule.kinds && !rule.kinds.includes(event.kind)) {
    return false;
  }
  if (rule.components && !rule.components.includes(event.component)) {
    return false;
  }
  if (rule.severities && !rule.severities.includes(event.severity)) {
    return false;
  }
  return true;
}

function pruneTimeline(timeline: SuppressionTimeline, cutoff: number) {
  let removeCount = 0;
  for (const time of timeline.history) {
    if (time > cutoff) {
      break;
    }
    removeCount += 1;
  }
  if (removeCount > 0) {
    timeline.history.splice(0, removeCount);
  }
}

function recordTimelineHistory(timeline: SuppressionTimeline, ts: number, historyLimit: number) {
  if (!Number.isFinite(ts)) {
    return;
  }
  const last = timeline.history[timeline.history.length - 1];
  if (last === undefined || ts > last) {
    timeline.history.push(ts);
  } else if (ts < last) {
    timeline.history.push(ts);
    timeline.history.sort((a, b) => a - b);
  }
  if (timeline.history.length > historyLimit) {
    timeline.history.splice(0, timeline.history.length - historyLimit);
  }
}

function normalizeRateLimit(rateLimit: RateLimitConfig): RateLimitConfig {
  const count = Math.max(1, Math.floor(rateLimit.count));
  const perMs = Math.max(1, Math.floor(rateLimit.perMs));
  const normalized: RateLimitConfig = { count, perMs };
  if (typeof rateLimit.cooldownMs === 'number' && Number.isFinite(rateLimit.cooldownMs) && rateLimit.cooldownMs > 0) {
    normalized.cooldownMs = Math.floor(rateLimit.cooldownMs);
  }
  return normalized;
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
export type { EventBusDependencies };
