import { compileNamingPolicy } from '../src/discovery/nameMatcher.js';
import { SourceRegistry } from '../src/discovery/registry.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { FramePump } from '../src/video/framePump.js';
import { NullFrameSink } from '../src/video/sinks.js';
import {
  ConnectionSupervisor,
  type ConnectionSupervisorOptions,
  type FatalEvent,
  type StateChangeEvent
} from '../src/supervisor/connectionSupervisor.js';
import { FakeTransport } from './helpers/fakeTransport.js';
import { createCapturedLogger } from './helpers/logger.js';

type Harness = {
  transport: FakeTransport;
  registry: SourceRegistry;
  supervisor: ConnectionSupervisor;
  bus: EventBus;
  metrics: MetricsRegistry;
  events: StateChangeEvent[];
  advance: (ms: number) => void;
  publish: (names: string[]) => Promise<void>;
};

function createHarness(overrides: Partial<ConnectionSupervisorOptions> = {}): Harness {
  const transport = new FakeTransport();
  const { logger } = createCapturedLogger();
  const metrics = new MetricsRegistry();
  let clock = 0;
  const now = () => clock;
  const registry = new SourceRegistry({
    transport,
    scanTimeoutMs: 100,
    pollIntervalMs: 1000,
    logger,
    metrics,
    now
  });
  const bus = new EventBus({ log: logger, metrics });
  const supervisor = new ConnectionSupervisor({
    transport,
    registry,
    matcher: compileNamingPolicy({ pattern: '.*_led', caseSensitive: false, pluralRelaxation: false }),
    retryDelayMs: 5000,
    livenessTimeoutMs: 5000,
    switchCheckIntervalMs: 2000,
    backgroundChecks: false,
    logger,
    metrics,
    eventBus: bus,
    now,
    ...overrides
  });
  const events: StateChangeEvent[] = [];
  supervisor.on('state', (event: StateChangeEvent) => events.push(event));

  return {
    transport,
    registry,
    supervisor,
    bus,
    metrics,
    events,
    advance: ms => {
      clock += ms;
    },
    publish: async names => {
      transport.sources = names;
      await registry.refreshNow();
    }
  };
}

describe('ConnectionSupervisor', () => {
  it('InitialScan connects to the only matching source', async () => {
    const h = createHarness();
    await h.publish(['HOST (studio_led)']);

    await h.supervisor.start();

    const state = h.supervisor.getState();
    expect(state.status).toBe('connected');
    expect(state.activeSource).toBe('HOST (studio_led)');
    expect(h.events.map(event => event.reason)).toEqual(['scanning', 'connected']);
    expect(h.supervisor.getActiveHandle()?.source).toBe('HOST (studio_led)');
  });

  it('VanishedSource switches to the remaining match and remembers the previous one', async () => {
    const h = createHarness();
    await h.publish(['PC1 (a_led)']);
    await h.supervisor.start();

    await h.publish(['PC2 (b_led)']);
    h.advance(2000);
    await h.supervisor.tick();

    const state = h.supervisor.getState();
    expect(state.status).toBe('connected');
    expect(state.activeSource).toBe('PC2 (b_led)');
    expect(state.previousSource).toBe('PC1 (a_led)');
    expect(h.transport.calls.filter(call => !call.startsWith('list'))).toEqual([
      'connect:PC1 (a_led)',
      'close:PC1 (a_led)',
      'connect:PC2 (b_led)'
    ]);
    expect(h.metrics.snapshot().connection.switchesByReason).toEqual({ vanished: 1 });
  });

  it('PreviousSource wins over a more recently appeared match', async () => {
    const h = createHarness();
    await h.publish(['PC (b_led)']);
    await h.supervisor.start();

    await h.publish(['PC (a_led)']);
    h.advance(2000);
    await h.supervisor.tick();
    expect(h.supervisor.getState().activeSource).toBe('PC (a_led)');
    expect(h.supervisor.getState().previousSource).toBe('PC (b_led)');

    await h.publish(['PC (a_led)', 'PC (b_led)']);
    await h.publish(['PC (b_led)', 'PC (c_led)']);
    expect(h.registry.appearanceSequence('PC (c_led)')).toBe(4);
    expect(h.registry.appearanceSequence('PC (b_led)')).toBe(3);

    h.advance(2000);
    await h.supervisor.tick();

    const state = h.supervisor.getState();
    expect(state.activeSource).toBe('PC (b_led)');
    expect(state.previousSource).toBe('PC (a_led)');
  });

  it('MostRecentMatch breaks ties by the smallest name', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    await h.publish(['PC (z_led)', 'PC (m_led)']);
    h.advance(2000);
    await h.supervisor.tick();

    expect(h.supervisor.getState().activeSource).toBe('PC (m_led)');
  });

  it('LockedSource becomes degraded without switching', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)', 'PC (b_led)']);
    await h.supervisor.start();
    const lock = await h.supervisor.setLocked(true);
    expect(lock.ok && lock.changed).toBe(true);

    h.advance(10000);
    await h.supervisor.tick();

    const state = h.supervisor.getState();
    expect(state.status).toBe('degraded');
    expect(state.activeSource).toBe('PC (a_led)');
    expect(h.transport.calls.filter(call => call.startsWith('connect'))).toEqual(['connect:PC (a_led)']);
    expect(h.bus.getRecentEvents().map(event => event.kind)).toEqual(['connected', 'degraded']);
  });

  it('DegradedSource switches when unlocked and another match exists', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)', 'PC (b_led)']);
    await h.supervisor.start();

    h.advance(6000);
    await h.supervisor.tick();

    const state = h.supervisor.getState();
    expect(state.status).toBe('connected');
    expect(state.activeSource).toBe('PC (b_led)');
    expect(h.events.map(event => event.reason)).toEqual([
      'scanning',
      'connected',
      'liveness-timeout',
      'scanning',
      'switched'
    ]);
  });

  it('FramesResume recovers a degraded connection', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();
    h.advance(6000);
    await h.supervisor.tick();
    expect(h.supervisor.getState().status).toBe('degraded');

    h.supervisor.recordFrame(6000);
    await h.supervisor.tick();

    expect(h.supervisor.getState().status).toBe('connected');
    expect(h.events.at(-1)?.reason).toBe('recovered');
  });

  it('EmptySnapshot keeps a streaming connection', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    await h.publish([]);
    h.advance(2000);
    h.supervisor.recordFrame(2000);
    await h.supervisor.tick();

    expect(h.supervisor.getState().status).toBe('connected');
    expect(h.supervisor.getState().activeSource).toBe('PC (a_led)');
    expect(h.transport.calls).not.toContain('close:PC (a_led)');
  });

  it('VanishedSourceWithoutReplacement disconnects', async () => {
    const h = createHarness({ fallbackToFirstSource: false });
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    await h.publish(['PC (projector)']);
    h.advance(2000);
    await h.supervisor.tick();

    const state = h.supervisor.getState();
    expect(state.status).toBe('disconnected');
    expect(state.activeSource).toBeNull();
    expect(h.events.at(-1)?.reason).toBe('source-lost');
    expect(h.transport.open.size).toBe(0);
  });

  it('FallbackToFirstSource connects when nothing matches', async () => {
    const h = createHarness();
    await h.publish(['PC (projector)', 'PC (monitor)']);

    await h.supervisor.start();

    expect(h.supervisor.getState().activeSource).toBe('PC (projector)');
  });

  it('NoTarget stays disconnected and rescans after the retry delay', async () => {
    const h = createHarness({ fallbackToFirstSource: false });
    await h.publish(['PC (projector)']);
    await h.supervisor.start();
    expect(h.supervisor.getState().status).toBe('disconnected');

    await h.publish(['PC (projector)', 'PC (wall_led)']);
    h.advance(4999);
    await h.supervisor.tick();
    expect(h.supervisor.getState().status).toBe('disconnected');

    h.advance(1);
    await h.supervisor.tick();
    expect(h.supervisor.getState().activeSource).toBe('PC (wall_led)');
  });

  it('ConnectFailure retries after the fixed backoff', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    h.transport.refuse.add('PC (a_led)');

    await h.supervisor.start();
    expect(h.supervisor.getState().status).toBe('disconnected');
    expect(h.events.at(-1)?.reason).toBe('connect-failed');

    h.advance(1000);
    await h.supervisor.tick();
    expect(h.transport.calls.filter(call => call.startsWith('connect'))).toHaveLength(1);

    h.transport.refuse.clear();
    h.advance(4000);
    await h.supervisor.tick();
    expect(h.supervisor.getState().status).toBe('connected');
    expect(h.metrics.snapshot().connection).toMatchObject({ attempts: 2, failures: 1 });
  });

  it('MaxRetries emits fatal once failures exceed the limit', async () => {
    const h = createHarness({ maxRetries: 1 });
    await h.publish(['PC (a_led)']);
    h.transport.refuse.add('PC (a_led)');
    const fatal: FatalEvent[] = [];
    h.supervisor.on('fatal', (event: FatalEvent) => fatal.push(event));

    await h.supervisor.start();
    expect(fatal).toHaveLength(0);

    h.advance(5000);
    await h.supervisor.tick();
    expect(fatal).toHaveLength(1);
    expect(fatal[0]?.failures).toBe(2);
    expect(fatal[0]?.lastTarget).toBe('PC (a_led)');
    expect(h.supervisor.isRetryExhausted()).toBe(true);

    h.advance(5000);
    await h.supervisor.tick();
    expect(h.transport.calls.filter(call => call.startsWith('connect'))).toHaveLength(2);
  });

  it('SetSource rejects names missing from the snapshot without side effects', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    const result = await h.supervisor.setSource('PC (missing)');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe('source_not_found');
    }
    expect(h.supervisor.getState().activeSource).toBe('PC (a_led)');
  });

  it('SetSource connects to any visible source and keeps it as the override', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)', 'PC (projector)']);
    await h.supervisor.start();

    const result = await h.supervisor.setSource('PC (projector)');
    expect(result).toMatchObject({ ok: true, changed: true });
    expect(h.supervisor.getState().activeSource).toBe('PC (projector)');
    expect(h.events.at(-1)?.reason).toBe('manual');

    const again = await h.supervisor.setSource('PC (projector)');
    expect(again).toMatchObject({ ok: true, changed: false });
    expect(h.transport.calls.filter(call => call === 'connect:PC (projector)')).toHaveLength(1);
  });

  it('SetLocked is idempotent', async () => {
    const h = createHarness();
    const first = await h.supervisor.setLocked(true);
    const second = await h.supervisor.setLocked(true);

    expect(first).toMatchObject({ ok: true, changed: true });
    expect(second).toMatchObject({ ok: true, changed: false });
    expect(h.events.map(event => event.reason)).toEqual(['lock']);
  });

  it('ConcurrentTicks share one evaluation', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    const first = h.supervisor.tick();
    const second = h.supervisor.tick();

    expect(second).toBe(first);
    await first;
  });

  it('Stop closes the active connection', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    await h.supervisor.stop();

    expect(h.transport.open.size).toBe(0);
    expect(h.supervisor.getState().status).toBe('disconnected');
    expect(h.events.at(-1)?.reason).toBe('stopped');
  });
  it('EndedStream reconnects after the retry delay', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();
    const pump = new FramePump({
      transport: h.transport,
      supervisor: h.supervisor,
      sink: new NullFrameSink(),
      logger: createCapturedLogger().logger,
      metrics: h.metrics,
      sleep: async () => {}
    });
    const first = h.supervisor.getActiveHandle();
    expect(first?.id).toBe(1);
    h.transport.open.delete(1);

    expect((await pump.pollFrame(1)).type).toBe('error');
    expect(h.supervisor.getState()).toMatchObject({ status: 'disconnected', activeSource: null });
    expect(h.supervisor.getActiveHandle()).toBeNull();
    expect(h.events.at(-1)?.reason).toBe('connection-lost');

    expect(await pump.pollFrame(1)).toEqual({ type: 'idle' });

    h.advance(5000);
    expect(await pump.pollFrame(1)).toEqual({ type: 'timeout' });
    expect(h.supervisor.getState()).toMatchObject({ status: 'connected', activeSource: 'PC (a_led)' });
    expect(h.transport.calls.filter(call => !call.startsWith('list'))).toEqual([
      'connect:PC (a_led)',
      'close:PC (a_led)',
      'connect:PC (a_led)'
    ]);
  });

  it('ConnectionLost ignores a handle that is no longer active', async () => {
    const h = createHarness();
    await h.publish(['PC (a_led)']);
    await h.supervisor.start();

    await h.supervisor.connectionLost({ id: 99, source: 'PC (a_led)' }, new Error('gone'));

    expect(h.supervisor.getState().status).toBe('connected');
    expect(h.supervisor.getActiveHandle()?.id).toBe(1);
  });
});
