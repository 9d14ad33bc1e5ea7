import {
  bootstrap,
  collectHealthChecks,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks
} from '../src/app.js';

describe('Bootstrap', () => {
  afterEach(() => {
    resetAppLifecycle();
  });

  it('Bootstrap validates and resolves the node-config documents', () => {
    const config = bootstrap();

    expect(config.logging.level).toBe('silent');
    expect(config.policy).toEqual({ pattern: '.*_led', caseSensitive: false, pluralRelaxation: false });
    expect(config.events.suppression.rules.map(rule => rule.id)).toEqual(['connect-failures']);
    expect(config.control.port).toBe(8080);
  });

  it('HealthIndicators are collected in registration order', async () => {
    registerHealthIndicator('connection', () => ({ status: 'ok', details: { activeSource: 'PC (a_led)' } }));
    registerHealthIndicator('discovery', async context => ({
      status: 'starting',
      details: { service: context.service.status, hasMetrics: context.metrics !== undefined }
    }));

    const checks = await collectHealthChecks({ service: { status: 'running', startedAt: 1 } });

    expect(checks).toEqual([
      { name: 'connection', status: 'ok', details: { activeSource: 'PC (a_led)' } },
      { name: 'discovery', status: 'starting', details: { service: 'running', hasMetrics: true } }
    ]);
  });

  it('FailingIndicator reports degraded with the error message', async () => {
    registerHealthIndicator('frames', () => {
      throw new Error('pump stalled');
    });

    const checks = await collectHealthChecks({ service: { status: 'running', startedAt: null } });

    expect(checks).toEqual([{ name: 'frames', status: 'degraded', details: { error: 'pump stalled' } }]);
  });

  it('RegisteringTheSameName replaces and the returned function unregisters', async () => {
    registerHealthIndicator('connection', () => ({ status: 'degraded' }));
    const unregister = registerHealthIndicator('connection', () => ({ status: 'ok' }));

    const checks = await collectHealthChecks({ service: { status: 'running', startedAt: null } });
    expect(checks.map(check => [check.name, check.status])).toEqual([['connection', 'ok']]);

    unregister();
    await expect(collectHealthChecks({ service: { status: 'running', startedAt: null } })).resolves.toEqual([]);
  });

  it('ShutdownHooks run newest first and survive failures', async () => {
    const order: string[] = [];
    registerShutdownHook('sinks', () => {
      order.push('sinks');
    });
    registerShutdownHook('bridge', async () => {
      order.push('bridge');
      throw new Error('bridge stuck');
    });
    registerShutdownHook('server', () => {
      order.push('server');
    });

    const results = await runShutdownHooks({ reason: 'signal', signal: 'SIGTERM' });

    expect(order).toEqual(['server', 'bridge', 'sinks']);
    expect(results.map(result => [result.name, result.status, result.error?.message])).toEqual([
      ['server', 'ok', undefined],
      ['bridge', 'error', 'bridge stuck'],
      ['sinks', 'ok', undefined]
    ]);
  });
});
