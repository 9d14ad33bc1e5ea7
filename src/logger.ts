import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'led-receiver';

const AVAILABLE_LOG_LEVELS = new Set([
  ...Object.keys(pino.levels.values).map(entry => entry.toLowerCase()),
  'silent'
]);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  component?: string;
};

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let component: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
      continue;
    }
    if (value instanceof Error) {
      message ??= value.message;
      continue;
    }
    if (value && typeof value === 'object') {
      if ('component' in value && typeof value.component === 'string' && value.component) {
        component ??= value.component;
      }
      if ('err' in value && value.err instanceof Error) {
        message ??= value.err.message;
      }
    }
  }

  return { message, component };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      const context = extractContext(inputArgs);
      const bound: Record<string, unknown> = this.bindings();
      if (!context.component && typeof bound.component === 'string') {
        context.component = bound.component;
      }
      metrics.incrementLogLevel(resolvedLevel, context);
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(candidate: string) {
  if (!AVAILABLE_LOG_LEVELS.has(candidate)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${candidate}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel);
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel, previous }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

/** Child logger tagged with a component name so log counters can be split per component. */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export type Logger = pino.Logger;

export default logger;
