#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { bootstrap, runShutdownHooks } from './app.js';
import { ConfigManager, loadConfigFromFile, type ReceiverConfig } from './config/index.js';
import { compileNamingPolicy, matches, PatternCompileError } from './discovery/nameMatcher.js';
import { FfmpegNdiTransport } from './transport/ffmpegNdi.js';
import { extractLogicalName } from './utils/sourceName.js';
import type { ReceiverRuntime, ReceiverStartOptions } from './run-receiver.js';
import type { DiscoveryTransport, NamingPolicy } from './types.js';

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  createTransport?: (config: ReceiverConfig) => Pick<DiscoveryTransport, 'listSources'>;
  startReceiver?: (options: ReceiverStartOptions) => Promise<ReceiverRuntime>;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'LED receiver CLI',
  '',
  'Usage:',
  '  led-receiver start [--config path]        Run the receiver until interrupted',
  '  led-receiver list-sources [--timeout ms] [--json] [--config path]',
  '                                            Discover sources and mark policy matches',
  '  led-receiver check-pattern <name...> [--pattern p] [--case-sensitive] [--plural]',
  '                                            Show which names the naming policy accepts',
  '  led-receiver log-level get|set <level>    Get or set the active log level',
  '  led-receiver help                         Show this message'
];

const LOG_LEVEL_USAGE = [
  'Usage:',
  '  led-receiver log-level get',
  '  led-receiver log-level set <level>'
].join('\n');

const state: {
  status: ServiceStatus;
  runtime: ReceiverRuntime | null;
  stopResolver: (() => void) | null;
  shutdownPromise: Promise<Error | null> | null;
  exitCode: number;
} = {
  status: 'idle',
  runtime: null,
  stopResolver: null,
  shutdownPromise: null,
  exitCode: 0
};

function resetServiceState() {
  state.status = 'idle';
  state.runtime = null;
  state.stopResolver = null;
  state.shutdownPromise = null;
  state.exitCode = 0;
}

export function getServiceState() {
  return { status: state.status };
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const command = argv[0] ?? 'start';
  const args = argv.slice(1);

  switch (command) {
    case 'start':
      return startService(args, io, deps);
    case 'list-sources':
      return listSources(args, io, deps);
    case 'check-pattern':
      return checkPattern(args, io);
    case 'log-level':
      return runLogLevelCommand(args, io);
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
  }
}

type ParsedArgs = {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
  errors: string[];
};

function parseArgs(args: string[], valueOptions: string[], flagOptions: string[]): ParsedArgs {
  const result: ParsedArgs = { positionals: [], values: new Map(), flags: new Set(), errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (valueOptions.includes(token)) {
      const value = args[index + 1];
      if (value === undefined || value.startsWith('--')) {
        result.errors.push(`Missing value for ${token}`);
      } else {
        result.values.set(token, value);
        index += 1;
      }
      continue;
    }
    if (flagOptions.includes(token)) {
      result.flags.add(token);
      continue;
    }
    if (token.startsWith('--')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    result.positionals.push(token);
  }
  return result;
}

function loadConfiguration(configPath: string | undefined): ReceiverConfig {
  return configPath ? loadConfigFromFile(configPath) : bootstrap();
}

function writeErrors(io: CliIo, errors: string[]) {
  for (const error of errors) {
    io.stderr.write(`${error}\n`);
  }
}

async function startService(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  const parsed = parseArgs(args, ['--config'], []);
  if (parsed.errors.length > 0 || parsed.positionals.length > 0) {
    writeErrors(io, [...parsed.errors, ...parsed.positionals.map(value => `Unexpected argument: ${value}`)]);
    return 1;
  }

  if (state.status === 'running' || state.status === 'starting') {
    io.stdout.write('Receiver is already running\n');
    return 0;
  }

  const configPath = parsed.values.get('--config');
  const options: ReceiverStartOptions = {
    onFatal: () => {
      state.exitCode = 1;
      void performShutdown('retries-exhausted');
    }
  };
  try {
    if (configPath) {
      options.configManager = new ConfigManager(path.resolve(configPath));
    } else {
      options.config = bootstrap();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Invalid configuration');
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  const start = deps.startReceiver ?? (await import('./run-receiver.js')).startReceiver;

  state.status = 'starting';
  state.exitCode = 0;
  let runtime: ReceiverRuntime;
  try {
    runtime = await metrics.time('receiver.startup.ms', () => start(options));
  } catch (error) {
    state.status = 'stopped';
    logger.error({ err: error }, 'Receiver failed to start');
    io.stderr.write('Receiver failed to start. Check logs for details.\n');
    return 1;
  }

  state.runtime = runtime;
  state.status = 'running';
  io.stdout.write(`Receiver started (component ${runtime.identity.componentId}, port ${runtime.server.port})\n`);

  const unregister = registerSignalHandlers();
  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    // Retries may already be exhausted during the first scan.
    if (state.exitCode !== 0) {
      void performShutdown('retries-exhausted');
    }
  });
  unregister();

  const exitCode = state.exitCode;
  io.stdout.write('Receiver stopped\n');
  resetServiceState();
  return exitCode;
}

async function listSources(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  const parsed = parseArgs(args, ['--timeout', '--config'], ['--json']);
  if (parsed.errors.length > 0) {
    writeErrors(io, parsed.errors);
    return 1;
  }

  let config: ReceiverConfig;
  try {
    config = loadConfiguration(parsed.values.get('--config'));
  } catch (error) {
    io.stderr.write(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const rawTimeout = parsed.values.get('--timeout');
  const timeoutMs = rawTimeout === undefined ? config.discovery.scanTimeoutMs : Number(rawTimeout);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    io.stderr.write(`Invalid --timeout value: ${rawTimeout}\n`);
    return 1;
  }

  const transport = deps.createTransport?.(config) ?? new FfmpegNdiTransport({ colorFormat: config.source.colorFormat });
  const matcher = compileNamingPolicy(config.policy);

  let names: string[];
  try {
    names = await transport.listSources(timeoutMs);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Source discovery failed');
    io.stderr.write(`Discovery failed: ${message}\n`);
    return 1;
  }

  const rows = names.map(name => ({
    name,
    logicalName: extractLogicalName(name),
    matches: matches(matcher, name)
  }));

  if (parsed.flags.has('--json')) {
    io.stdout.write(`${JSON.stringify({ pattern: matcher.effectivePattern, sources: rows })}\n`);
    return 0;
  }

  if (rows.length === 0) {
    io.stdout.write('No sources found\n');
    return 0;
  }
  for (const row of rows) {
    io.stdout.write(`${row.matches ? '*' : ' '} ${row.name}\n`);
  }
  return 0;
}

function checkPattern(args: string[], io: CliIo): number {
  const parsed = parseArgs(args, ['--pattern', '--config'], ['--case-sensitive', '--plural']);
  if (parsed.errors.length > 0) {
    writeErrors(io, parsed.errors);
    return 1;
  }
  if (parsed.positionals.length === 0) {
    io.stderr.write('check-pattern needs at least one source name\n');
    return 1;
  }

  let base: NamingPolicy;
  try {
    base = loadConfiguration(parsed.values.get('--config')).policy;
  } catch (error) {
    io.stderr.write(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const policy: NamingPolicy = {
    pattern: parsed.values.get('--pattern') ?? base.pattern,
    caseSensitive: parsed.flags.has('--case-sensitive') || base.caseSensitive,
    pluralRelaxation: parsed.flags.has('--plural') || base.pluralRelaxation
  };

  try {
    const matcher = compileNamingPolicy(policy);
    io.stdout.write(`Effective pattern: ${matcher.effectivePattern}\n`);
    for (const name of parsed.positionals) {
      io.stdout.write(`${matches(matcher, name) ? 'match' : 'no match'}: ${name}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof PatternCompileError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (!getAvailableLogLevels().includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log-level subcommand: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    void performShutdown('signal', signal);
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, handleSignal);
    }
  };
}

export async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status !== 'running' && state.status !== 'stopping') {
    return null;
  }
  if (state.shutdownPromise) {
    return state.shutdownPromise;
  }

  state.status = 'stopping';
  logger.info({ reason, signal }, 'Receiver shutting down');

  const shutdownTask = (async () => {
    // The running receiver registers its own teardown as a hook.
    const hooks = await metrics.time('receiver.shutdown.ms', () => runShutdownHooks({ reason, signal }));
    const failure = hooks.find(hook => hook.status === 'error')?.error ?? null;
    if (failure) {
      state.exitCode = 1;
    }

    state.runtime = null;
    state.status = 'stopped';
    state.stopResolver?.();
    state.stopResolver = null;
    return failure;
  })();

  state.shutdownPromise = shutdownTask;
  return shutdownTask;
}

export const __test__ = {
  getState: () => ({ ...state }),
  reset: resetServiceState
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Receiver CLI failed');
      process.exit(1);
    }
  );
}
