import { SourceRegistry, type SourceRegistryUpdate } from '../src/discovery/registry.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { FakeTransport } from './helpers/fakeTransport.js';
import { createCapturedLogger, LEVEL } from './helpers/logger.js';

function createRegistry(transport: FakeTransport) {
  const captured = createCapturedLogger();
  const metrics = new MetricsRegistry();
  let clock = 1000;
  const registry = new SourceRegistry({
    transport,
    scanTimeoutMs: 500,
    pollIntervalMs: 2000,
    logger: captured.logger,
    metrics,
    now: () => clock
  });
  return {
    registry,
    metrics,
    captured,
    advance: (ms: number) => {
      clock += ms;
    }
  };
}

describe('SourceRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('RefreshNow publishes a frozen de-duplicated snapshot', async () => {
    const transport = new FakeTransport();
    transport.sources = ['A (one_led)', 'B (two_led)', 'A (one_led)'];
    const { registry } = createRegistry(transport);

    const snapshot = await registry.refreshNow();

    expect(snapshot.names).toEqual(['A (one_led)', 'B (two_led)']);
    expect(snapshot.sequence).toBe(1);
    expect(snapshot.observedAt).toBe(1000);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.names)).toBe(true);
    expect(registry.snapshot()).toBe(snapshot);
    expect(transport.calls).toEqual(['list:500']);
  });

  it('UpdateEvent reports added and removed names', async () => {
    const transport = new FakeTransport();
    const { registry } = createRegistry(transport);
    const updates: SourceRegistryUpdate[] = [];
    registry.on('update', (update: SourceRegistryUpdate) => updates.push(update));

    transport.sources = ['A (a)', 'B (b)'];
    await registry.refreshNow();
    transport.sources = ['B (b)', 'C (c)'];
    await registry.refreshNow();

    expect(updates.map(update => [update.added, update.removed])).toEqual([
      [['A (a)', 'B (b)'], []],
      [['C (c)'], ['A (a)']]
    ]);
  });

  it('AppearanceSequence tracks the poll in which a name last appeared', async () => {
    const transport = new FakeTransport();
    const { registry } = createRegistry(transport);

    transport.sources = ['A (a)'];
    await registry.refreshNow();
    transport.sources = ['A (a)', 'B (b)'];
    await registry.refreshNow();
    transport.sources = ['B (b)'];
    await registry.refreshNow();
    transport.sources = ['B (b)', 'A (a)'];
    await registry.refreshNow();

    expect(registry.appearanceSequence('B (b)')).toBe(2);
    expect(registry.appearanceSequence('A (a)')).toBe(4);
    expect(registry.appearanceSequence('Z (z)')).toBeUndefined();
  });

  it('ConcurrentRefresh shares the in-flight poll', async () => {
    const transport = new FakeTransport();
    transport.sources = ['A (a)'];
    const { registry } = createRegistry(transport);

    const [first, second] = await Promise.all([registry.refreshNow(), registry.refreshNow()]);

    expect(first).toBe(second);
    expect(transport.calls).toEqual(['list:500']);
  });

  it('DiscoveryFailure publishes an empty snapshot and logs a warning', async () => {
    const transport = new FakeTransport();
    const { registry, metrics, captured } = createRegistry(transport);
    transport.sources = ['A (a)'];
    await registry.refreshNow();

    transport.discoveryError = new Error('network down');
    const snapshot = await registry.refreshNow();

    expect(snapshot.names).toEqual([]);
    expect(snapshot.sequence).toBe(2);
    expect(captured.messages(LEVEL.warn)).toEqual(['Source discovery failed; treating as zero sources']);
    const discovery = metrics.snapshot().discovery;
    expect(discovery.polls).toBe(2);
    expect(discovery.failures).toBe(1);
  });

  it('BackgroundPolling schedules the next poll after each one completes', async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    transport.sources = ['A (a)'];
    const { registry } = createRegistry(transport);

    registry.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(transport.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(transport.calls).toHaveLength(2);

    await registry.stop();
    await vi.advanceTimersByTimeAsync(10000);
    expect(transport.calls).toHaveLength(2);
    expect(registry.isRunning()).toBe(false);
  });
});
