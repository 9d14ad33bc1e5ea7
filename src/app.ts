import config from 'config';
import logger from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { resolveReceiverConfig, validateConfig, type ReceiverConfig } from './config/index.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = { name: string; status: 'ok' | 'error'; error?: Error };

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

function upsert<T extends { name: string }>(list: T[], entry: T) {
  const existingIndex = list.findIndex(item => item.name === entry.name);
  if (existingIndex >= 0) {
    list[existingIndex] = entry;
  } else {
    list.push(entry);
  }
  return () => {
    const index = list.findIndex(item => item === entry);
    if (index >= 0) {
      list.splice(index, 1);
    }
  };
}

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  return upsert(healthIndicators, { name, indicator });
}

export async function collectHealthChecks(context: HealthIndicatorContext): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: { error: error instanceof Error ? error.message : String(error) }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  return upsert(shutdownHooks, { name, hook });
}

/** Runs hooks newest first; a failing hook is recorded and the rest still run. */
export async function runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
  const results: ShutdownHookResult[] = [];
  for (const entry of [...shutdownHooks].reverse()) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, hook: entry.name, reason: context.reason }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

/** Validates the configuration loaded by node-config and returns it with defaults applied. */
export function bootstrap(): ReceiverConfig {
  logger.info('Receiver bootstrap starting');

  const loadedConfig: unknown = config.util.toObject(config);
  validateConfig(loadedConfig);
  const receiverConfig = resolveReceiverConfig(loadedConfig);

  logger.info(
    { pattern: receiverConfig.policy.pattern, port: receiverConfig.control.port },
    'Bootstrap completed'
  );
  return receiverConfig;
}
