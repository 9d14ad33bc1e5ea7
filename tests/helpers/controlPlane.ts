import { ControlPlane } from '../../src/control/controlPlane.js';
import { compileNamingPolicy } from '../../src/discovery/nameMatcher.js';
import { SourceRegistry } from '../../src/discovery/registry.js';
import type { Logger } from '../../src/logger.js';
import type { MetricsRegistry } from '../../src/metrics/index.js';
import { ConnectionSupervisor } from '../../src/supervisor/connectionSupervisor.js';
import { FakeTransport } from './fakeTransport.js';

/** Control plane over a fake transport, already connected to the first matching source. */
export async function createConnectedPlane(sources: string[], logger: Logger, metrics: MetricsRegistry) {
  const transport = new FakeTransport();
  transport.sources = sources;
  const registry = new SourceRegistry({ transport, scanTimeoutMs: 100, pollIntervalMs: 1000, logger, metrics });
  const supervisor = new ConnectionSupervisor({
    transport,
    registry,
    matcher: compileNamingPolicy({ pattern: '.*_led', caseSensitive: false, pluralRelaxation: true }),
    retryDelayMs: 1000,
    livenessTimeoutMs: 5000,
    switchCheckIntervalMs: 1000,
    backgroundChecks: false,
    logger,
    metrics
  });
  await registry.refreshNow();
  await supervisor.start();
  const controlPlane = new ControlPlane({
    supervisor,
    registry,
    store: { load: async () => null, save: async () => undefined },
    identity: { componentId: 'rx-1', componentName: 'Wall' },
    outputResolution: [1920, 1080],
    logger,
    metrics,
    now: () => 1234
  });
  return { transport, registry, supervisor, controlPlane };
}
