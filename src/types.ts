export type SourceName = string;

export type EventSeverity = 'info' | 'warning' | 'critical';

export interface ReceiverEventPayload {
  ts?: number | Date;
  component: string;
  kind: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface ReceiverEvent {
  ts: number;
  component: string;
  kind: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

export interface RateLimitConfig {
  count: number;
  perMs: number;
  cooldownMs?: number;
}

export interface EventSuppressionRule {
  id: string;
  kind?: string | string[];
  component?: string | string[];
  severity?: EventSeverity | EventSeverity[];
  rateLimit: RateLimitConfig;
  reason: string;
}

export type NamingPolicy = {
  pattern: string;
  caseSensitive: boolean;
  pluralRelaxation: boolean;
};

export type SourceSnapshot = {
  readonly names: readonly SourceName[];
  readonly observedAt: number;
  readonly sequence: number;
};

export type ConnectionStatus = 'disconnected' | 'scanning' | 'connected' | 'degraded';

export type ConnectionState = {
  status: ConnectionStatus;
  activeSource: SourceName | null;
  previousSource: SourceName | null;
  locked: boolean;
  lastFrameAt: number | null;
};

export type PixelFormat = 'uyvy' | 'bgra' | 'bgrx' | 'rgba' | 'rgbx';

export type ColorFormat = 'bgra' | 'rgba' | 'uyvy';

export type RawFrame = {
  width: number;
  height: number;
  format: PixelFormat;
  data: Buffer;
  lineStrideBytes?: number;
  frameRateN: number;
  frameRateD: number;
  timestamp?: number;
};

export type Frame = {
  width: number;
  height: number;
  pixels: Buffer;
  sourceFrameRateHz: number;
  capturedAt: number;
};

export type ConnectionHandle = {
  readonly id: number;
  readonly source: SourceName;
};

/**
 * Network discovery and receive operations. Implementations own every native
 * resource; the rest of the receiver only sees names, handles and frames.
 */
export interface DiscoveryTransport {
  listSources(scanTimeoutMs: number): Promise<SourceName[]>;
  connect(source: SourceName): Promise<ConnectionHandle>;
  /** Resolves `null` when no frame arrived within `timeoutMs`. */
  receive(handle: ConnectionHandle, timeoutMs: number): Promise<RawFrame | null>;
  close(handle: ConnectionHandle): Promise<void>;
}

export interface FrameSink {
  deliver(frame: Frame): void;
  close?(): Promise<void>;
}

export type TransportErrorCode =
  | 'not-found'
  | 'connect-failed'
  | 'closed'
  | 'timeout'
  | 'spawn-failed';

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}
