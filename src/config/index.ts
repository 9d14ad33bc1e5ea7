import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { compileNamingPolicy, PatternCompileError } from '../discovery/nameMatcher.js';
import type { ColorFormat, EventSuppressionRule, NamingPolicy } from '../types.js';

export type AppConfig = {
  name: string;
  componentName: string;
  componentId?: string;
};

export type LoggingConfig = {
  level: string;
};

export type SourceConfig = {
  name?: string;
  colorFormat: ColorFormat;
};

export type DiscoveryConfig = {
  pollIntervalMs: number;
  scanTimeoutMs: number;
};

export type SupervisorConfig = {
  retryDelayMs: number;
  livenessTimeoutMs: number;
  switchCheckIntervalMs: number;
  maxRetries?: number;
  autoSwitch: boolean;
  fallbackToFirstSource: boolean;
};

export type PumpConfig = {
  frameTimeoutMs: number;
};

export type ControlConfig = {
  host: string;
  port: number;
  broadcastIntervalMs: number;
  bridgeUrl?: string;
  bridgeReconnectDelayMs: number;
  persistencePath: string;
};

export type OutputConfig = {
  resolution: [number, number];
};

export type SnapshotConfig = {
  enabled: boolean;
  directory: string;
  intervalMs: number;
};

export type EventsConfig = {
  suppression: {
    rules: EventSuppressionRule[];
  };
};

export type ReceiverConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  policy: NamingPolicy;
  source: SourceConfig;
  discovery: DiscoveryConfig;
  supervisor: SupervisorConfig;
  pump: PumpConfig;
  control: ControlConfig;
  output: OutputConfig;
  snapshot: SnapshotConfig;
  events: EventsConfig;
};

/** Shape accepted on disk: every section and every key is optional. */
export type ReceiverConfigInput = {
  [Section in keyof ReceiverConfig]?: Partial<ReceiverConfig[Section]>;
};

export const DEFAULT_RECEIVER_CONFIG: ReceiverConfig = {
  app: { name: 'led-receiver', componentName: 'NDI Receiver' },
  logging: { level: 'info' },
  policy: { pattern: '.*_led', caseSensitive: false, pluralRelaxation: false },
  source: { colorFormat: 'bgra' },
  discovery: { pollIntervalMs: 15000, scanTimeoutMs: 2000 },
  supervisor: {
    retryDelayMs: 5000,
    livenessTimeoutMs: 5000,
    switchCheckIntervalMs: 2000,
    autoSwitch: true,
    fallbackToFirstSource: true
  },
  pump: { frameTimeoutMs: 100 },
  control: {
    host: '0.0.0.0',
    port: 8080,
    broadcastIntervalMs: 10000,
    bridgeReconnectDelayMs: 5000,
    persistencePath: 'data/receiver-state.json'
  },
  output: { resolution: [0, 0] },
  snapshot: { enabled: false, directory: 'snapshots', intervalMs: 5000 },
  events: { suppression: { rules: [] } }
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minItems?: number;
  maxItems?: number;
  minLength?: number;
};

const positiveInteger: JsonSchema = { type: 'integer', minimum: 1 };
const nonEmptyString: JsonSchema = { type: 'string', minLength: 1 };

const stringOrStringList: JsonSchema = {
  type: ['string', 'array'],
  items: { type: 'string' }
};

const severitySchema: JsonSchema = {
  type: ['string', 'array'],
  enum: ['info', 'warning', 'critical'],
  items: { type: 'string', enum: ['info', 'warning', 'critical'] }
};

const suppressionRuleSchema: JsonSchema = {
  type: 'object',
  required: ['id', 'rateLimit', 'reason'],
  additionalProperties: false,
  properties: {
    id: nonEmptyString,
    kind: stringOrStringList,
    component: stringOrStringList,
    severity: severitySchema,
    reason: { type: 'string' },
    rateLimit: {
      type: 'object',
      required: ['count', 'perMs'],
      additionalProperties: false,
      properties: {
        count: positiveInteger,
        perMs: positiveInteger,
        cooldownMs: { type: 'integer', minimum: 0 }
      }
    }
  }
};

const receiverConfigSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: nonEmptyString,
        componentName: nonEmptyString,
        componentId: nonEmptyString
      }
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] }
      }
    },
    policy: {
      type: 'object',
      additionalProperties: false,
      properties: {
        pattern: { type: 'string' },
        caseSensitive: { type: 'boolean' },
        pluralRelaxation: { type: 'boolean' }
      }
    },
    source: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: nonEmptyString,
        colorFormat: { type: 'string', enum: ['bgra', 'rgba', 'uyvy'] }
      }
    },
    discovery: {
      type: 'object',
      additionalProperties: false,
      properties: {
        pollIntervalMs: positiveInteger,
        scanTimeoutMs: positiveInteger
      }
    },
    supervisor: {
      type: 'object',
      additionalProperties: false,
      properties: {
        retryDelayMs: positiveInteger,
        livenessTimeoutMs: positiveInteger,
        switchCheckIntervalMs: positiveInteger,
        maxRetries: { type: 'integer', minimum: 0 },
        autoSwitch: { type: 'boolean' },
        fallbackToFirstSource: { type: 'boolean' }
      }
    },
    pump: {
      type: 'object',
      additionalProperties: false,
      properties: {
        frameTimeoutMs: positiveInteger
      }
    },
    control: {
      type: 'object',
      additionalProperties: false,
      properties: {
        host: nonEmptyString,
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        broadcastIntervalMs: positiveInteger,
        bridgeUrl: nonEmptyString,
        bridgeReconnectDelayMs: positiveInteger,
        persistencePath: nonEmptyString
      }
    },
    output: {
      type: 'object',
      additionalProperties: false,
      properties: {
        resolution: {
          type: 'array',
          minItems: 2,
          maxItems: 2,
          items: { type: 'integer', minimum: 0 }
        }
      }
    },
    snapshot: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        directory: nonEmptyString,
        intervalMs: positiveInteger
      }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        suppression: {
          type: 'object',
          required: ['rules'],
          additionalProperties: false,
          properties: {
            rules: { type: 'array', items: suppressionRuleSchema }
          }
        }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const { additionalProperties } = schema;
    if (additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additionalProperties && typeof additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additionalProperties, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must contain at least ${schema.minItems} items`);
    }
    if (typeof schema.maxItems === 'number' && value.length > schema.maxItems) {
      errors.push(`${pathLabel} must contain at most ${schema.maxItems} items`);
    }

    const { items } = schema;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must not be empty`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is ReceiverConfigInput {
  const errors = validateAgainstSchema(receiverConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

export function resolveReceiverConfig(input: ReceiverConfigInput = {}): ReceiverConfig {
  const defaults = DEFAULT_RECEIVER_CONFIG;
  const resolved: ReceiverConfig = {
    app: { ...defaults.app, ...input.app },
    logging: { ...defaults.logging, ...input.logging },
    policy: { ...defaults.policy, ...input.policy },
    source: { ...defaults.source, ...input.source },
    discovery: { ...defaults.discovery, ...input.discovery },
    supervisor: { ...defaults.supervisor, ...input.supervisor },
    pump: { ...defaults.pump, ...input.pump },
    control: { ...defaults.control, ...input.control },
    output: { resolution: input.output?.resolution ?? [...defaults.output.resolution] },
    snapshot: { ...defaults.snapshot, ...input.snapshot },
    events: {
      suppression: {
        rules: input.events?.suppression?.rules ?? [...defaults.events.suppression.rules]
      }
    }
  };
  validateLogicalConfig(resolved);
  return resolved;
}

export function parseConfig(contents: string): ReceiverConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return resolveReceiverConfig(parsed);
}

export function loadConfigFromFile(filePath: string): ReceiverConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: ReceiverConfig) {
  const messages: string[] = [];

  try {
    compileNamingPolicy(config.policy);
  } catch (error) {
    if (error instanceof PatternCompileError) {
      messages.push(`config.policy.pattern is invalid: ${error.message}`);
    } else {
      throw error;
    }
  }

  if (config.discovery.scanTimeoutMs > config.discovery.pollIntervalMs) {
    messages.push('config.discovery.scanTimeoutMs must not exceed config.discovery.pollIntervalMs');
  }

  const ruleIds = new Set<string>();
  for (const rule of config.events.suppression.rules) {
    if (ruleIds.has(rule.id)) {
      messages.push(`config.events.suppression.rules contains duplicate id "${rule.id}"`);
    }
    ruleIds.add(rule.id);
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: ReceiverConfig;
  next: ReceiverConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: ReceiverConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath: string, private readonly debounceMs = 100) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): ReceiverConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): ReceiverConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, this.debounceMs);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: ReceiverConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, this.debounceMs * 2);
    }
  }
}

export { receiverConfigSchema };
