import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { collectHealthChecks, resetAppLifecycle, runShutdownHooks } from '../src/app.js';
import { ConfigManager, resolveReceiverConfig } from '../src/config/index.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startReceiver, type ReceiverRuntime } from '../src/run-receiver.js';
import { NullFrameSink } from '../src/video/sinks.js';
import { FakeTransport, bgraFrame } from './helpers/fakeTransport.js';
import { createCapturedLogger } from './helpers/logger.js';

const testConfig = {
  logging: { level: 'silent' },
  control: { host: '127.0.0.1', port: 0 },
  pump: { frameTimeoutMs: 20 }
};

function startWithFakes(transport: FakeTransport, options: { configManager?: ConfigManager } = {}) {
  const { logger } = createCapturedLogger();
  const metrics = new MetricsRegistry();
  const sink = new NullFrameSink();
  const runtime = startReceiver({
    config: options.configManager ? undefined : resolveReceiverConfig(testConfig),
    configManager: options.configManager,
    transport,
    bus: new EventBus({ log: logger, metrics }),
    logger,
    metrics,
    sinks: [sink],
    store: { load: async () => null, save: async () => undefined },
    hostname: 'test-host'
  });
  return { runtime, sink };
}

describe('RunReceiver', () => {
  const runtimes: ReceiverRuntime[] = [];
  let directory: string | null = null;

  afterEach(async () => {
    for (const runtime of runtimes.splice(0)) {
      await runtime.stop();
    }
    resetAppLifecycle();
    if (directory) {
      fs.rmSync(directory, { recursive: true, force: true });
      directory = null;
    }
  });

  it('Startup connects to the first matching source and pumps frames to the sinks', async () => {
    const transport = new FakeTransport();
    transport.sources = ['PC (projector)', 'PC (wall_led)'];
    const started = startWithFakes(transport);
    const runtime = await started.runtime;
    runtimes.push(runtime);

    expect(runtime.supervisor.getState()).toMatchObject({ status: 'connected', activeSource: 'PC (wall_led)' });
    const handle = runtime.supervisor.getActiveHandle();
    if (!handle) {
      throw new Error('expected an active connection');
    }
    transport.pushFrame(handle, bgraFrame(2, 1, [10, 20, 30, 255]));

    await vi.waitFor(() => {
      expect(started.sink.framesReceived).toBe(1);
    });
    expect(started.sink.lastFrame).toMatchObject({ width: 2, height: 1 });
    expect(runtime.bridge).toBeNull();
    expect(runtime.server.port).toBeGreaterThan(0);
  });

  it('HealthIndicators are registered while running and removed on stop', async () => {
    const transport = new FakeTransport();
    transport.sources = ['PC (wall_led)'];
    const runtime = await startWithFakes(transport).runtime;

    const checks = await collectHealthChecks({ service: { status: 'running', startedAt: 0 } });
    expect(checks.map(check => [check.name, check.status])).toEqual([
      ['connection', 'ok'],
      ['discovery', 'ok'],
      ['frames', 'ok']
    ]);

    await runtime.stop();
    await runtime.stop();

    await expect(collectHealthChecks({ service: { status: 'stopped', startedAt: 0 } })).resolves.toEqual([]);
    expect(transport.open.size).toBe(0);
  });

  it('ShutdownHooks stop the running receiver', async () => {
    const transport = new FakeTransport();
    transport.sources = ['PC (wall_led)'];
    await startWithFakes(transport).runtime;

    const results = await runShutdownHooks({ reason: 'signal', signal: 'SIGTERM' });

    expect(results).toEqual([{ name: 'receiver', status: 'ok' }]);
    expect(transport.open.size).toBe(0);
    await expect(collectHealthChecks({ service: { status: 'stopped', startedAt: 0 } })).resolves.toEqual([]);
    await expect(runShutdownHooks({ reason: 'signal' })).resolves.toEqual([]);
  });

  it('ConfigReload applies a new naming policy', async () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'receiver-run-'));
    const configPath = path.join(directory, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(testConfig));
    const manager = new ConfigManager(configPath, 20);
    const transport = new FakeTransport();
    transport.sources = ['PC (wall_led)', 'PC (stage)'];
    const runtime = await startWithFakes(transport, { configManager: manager }).runtime;
    runtimes.push(runtime);
    expect(runtime.supervisor.getState().activeSource).toBe('PC (wall_led)');

    fs.writeFileSync(configPath, JSON.stringify({ ...testConfig, policy: { pattern: 'stage' } }));
    manager.reload();

    await vi.waitFor(() => {
      expect(runtime.controlPlane.getSnapshot().pattern).toBe('stage');
    });
  });
});
