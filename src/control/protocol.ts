import type { ConnectionStatus, SourceName } from '../types.js';

export type ControlCommand =
  | { action: 'request_state' }
  | { action: 'set_source'; sourceName: SourceName }
  | { action: 'refresh_sources' }
  | { action: 'set_lock'; locked: boolean; blockIdx: number }
  | { action: 'set_lock_global'; locked: boolean }
  | { action: 'save_configuration' }
  | { action: 'recall_configuration' }
  | { action: 'ping' };

export type ControlAction = ControlCommand['action'];

export type ControlRequest = {
  command: ControlCommand;
  componentId: string | null;
};

export type ControlErrorCode =
  | 'invalid_message'
  | 'unknown_action'
  | 'invalid_params'
  | 'source_not_found'
  | 'connect_failed'
  | 'nothing_saved'
  | 'persistence_failed'
  | 'component_mismatch';

export type ControlError = {
  code: ControlErrorCode;
  message: string;
};

export type PersistedConfiguration = {
  currentSource: SourceName | null;
  locked: boolean;
  pattern: string;
  savedAt: string;
};

export type ControlSnapshot = {
  /** Increases with every published state change. */
  version: number;
  componentId: string;
  componentName: string;
  sources: SourceName[];
  currentSources: string[];
  regexPatterns: string[];
  effectiveRegexPatterns: string[];
  outputNames: string[];
  outputResolutions: Array<[number, number]>;
  outputSources: Record<string, string>;
  pluralHandlingEnabled: boolean;
  caseSensitive: boolean;
  locks: boolean[];
  lastUpdate: number;
  currentSource: SourceName | null;
  previousSource: SourceName | null;
  status: ConnectionStatus;
  connected: boolean;
  fps: number;
  sourceFps: number;
  frameRateN: number;
  frameRateD: number;
  resolution: [number, number];
  pattern: string;
  locked: boolean;
  autoSwitchEnabled: boolean;
  error: string | null;
};

export type ControlResponse =
  | { action: 'state_update'; state: ControlSnapshot; componentId?: string }
  | { action: 'source_changed'; block_idx: number; source_name: string; componentId?: string }
  | { action: 'error'; code: ControlErrorCode; message: string; componentId?: string }
  | { action: 'pong'; timestamp: number; componentId?: string }
  | { action: 'configuration_saved'; configuration: PersistedConfiguration; componentId?: string }
  | {
      action: 'configuration_recalled';
      configuration: PersistedConfiguration;
      state: ControlSnapshot;
      componentId?: string;
    };

export type ParseResult = { ok: true; request: ControlRequest } | { ok: false; error: ControlError };

const ACTIONS: readonly ControlAction[] = [
  'request_state',
  'set_source',
  'refresh_sources',
  'set_lock',
  'set_lock_global',
  'save_configuration',
  'recall_configuration',
  'ping'
];

function isAction(value: string): value is ControlAction {
  return ACTIONS.some(action => action === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function controlError(code: ControlErrorCode, message: string): ControlError {
  return { code, message };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled control command: ${JSON.stringify(value)}`);
}

function readComponentId(body: Record<string, unknown>): string | null | ControlError {
  const raw = body.componentId ?? body.component_id;
  if (raw === undefined || raw === null || raw === '') {
    return null;
  }
  if (typeof raw !== 'string') {
    return controlError('invalid_params', 'componentId must be a string');
  }
  return raw;
}

function readLocked(body: Record<string, unknown>): boolean | ControlError {
  if (typeof body.locked !== 'boolean') {
    return controlError('invalid_params', 'locked must be a boolean');
  }
  return body.locked;
}

function parseCommand(action: ControlAction, body: Record<string, unknown>): ControlCommand | ControlError {
  switch (action) {
    case 'request_state':
    case 'refresh_sources':
    case 'save_configuration':
    case 'recall_configuration':
    case 'ping':
      return { action };
    case 'set_source': {
      const sourceName = body.source_name ?? body.sourceName;
      if (typeof sourceName !== 'string' || sourceName.trim().length === 0) {
        return controlError('invalid_params', 'set_source requires a non-empty source_name');
      }
      return { action, sourceName };
    }
    case 'set_lock': {
      const locked = readLocked(body);
      if (typeof locked !== 'boolean') {
        return locked;
      }
      const blockIdx = body.block_idx ?? body.blockIdx ?? 0;
      if (blockIdx !== 0) {
        return controlError('invalid_params', 'block_idx must be 0 for a single-output receiver');
      }
      return { action, locked, blockIdx: 0 };
    }
    case 'set_lock_global': {
      const locked = readLocked(body);
      if (typeof locked !== 'boolean') {
        return locked;
      }
      return { action, locked };
    }
    default:
      return assertNever(action);
  }
}

/** Parses one inbound JSON message into a command, or a typed error value. */
export function parseControlMessage(raw: string): ParseResult {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: controlError('invalid_message', `Invalid JSON: ${message}`) };
  }

  if (!isRecord(body)) {
    return { ok: false, error: controlError('invalid_message', 'Message must be a JSON object') };
  }

  const { action } = body;
  if (typeof action !== 'string') {
    return { ok: false, error: controlError('invalid_message', 'Message is missing an action') };
  }

  if (!isAction(action)) {
    return { ok: false, error: controlError('unknown_action', `Unknown action: ${action}`) };
  }

  const componentId = readComponentId(body);
  if (isControlError(componentId)) {
    return { ok: false, error: componentId };
  }

  const command = parseCommand(action, body);
  if ('code' in command) {
    return { ok: false, error: command };
  }

  return { ok: true, request: { command, componentId } };
}

function isControlError(value: unknown): value is ControlError {
  return isRecord(value) && typeof value.code === 'string' && typeof value.message === 'string';
}
