import logger, {
  createComponentLogger,
  getAvailableLogLevels,
  getLogLevel,
  onLogLevelChange,
  setLogLevel
} from '../src/logger.js';
import metrics from '../src/metrics/index.js';

describe('Logger', () => {
  let initialLevel: string;

  beforeEach(() => {
    initialLevel = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(initialLevel);
  });

  it('ConfiguredLevel comes from the test configuration', () => {
    expect(initialLevel).toBe('silent');
    expect(logger.level).toBe('silent');
  });

  it('SetLogLevel normalises, notifies and records the change', () => {
    const changes: Array<[string, string]> = [];
    const unsubscribe = onLogLevelChange((level, previous) => changes.push([level, previous]));

    expect(setLogLevel(' WARN ')).toBe('warn');
    expect(setLogLevel('warn')).toBe('warn');
    unsubscribe();

    expect(changes).toEqual([['warn', 'silent']]);
    expect(logger.level).toBe('warn');
    expect(metrics.snapshot().logs.currentLevel).toBe('warn');
  });

  it('UnknownLevel is rejected with the available levels', () => {
    expect(() => setLogLevel('loud')).toThrow(
      'Unknown log level "loud" (available: debug, error, fatal, info, silent, trace, warn)'
    );
    expect(getLogLevel()).toBe(initialLevel);
    expect(getAvailableLogLevels()).toContain('silent');
  });

  it('ComponentLoggers carry their component binding', () => {
    expect(createComponentLogger('registry').bindings()).toMatchObject({ component: 'registry' });
  });

  it('ErrorLines are counted per component', () => {
    setLogLevel('error');
    const before = metrics.snapshot().logs.byComponent.supervisor?.error ?? 0;

    createComponentLogger('supervisor').error({ err: new Error('connect refused') }, 'Connect failed');

    const { logs } = metrics.snapshot();
    expect(logs.byComponent.supervisor?.error).toBe(before + 1);
    expect(logs.lastErrorMessage).toBe('connect refused');
  });
});
