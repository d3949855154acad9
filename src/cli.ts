import fs from 'node:fs';
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels } from './logger.js';
import metrics from './metrics/index.js';
import { collectHealthChecks, runShutdownHooks, type HealthStatus } from './app.js';
import {
  applyCameraOverrides,
  ConfigManager,
  createStarterCamera,
  DEFAULTS,
  expandHome,
  WILDCARD_EVENT,
  type Camera,
  type CameraOverrides,
  type CameraStreamNames,
  type OnvifeyeConfig,
  type StillsPolicy
} from './config/index.js';
import { checkRunnable } from './recording/handler.js';
import type { EyeRuntime } from './run-eye.js';
import {
  isStatusStale,
  readStatusFile,
  writeStatusFile,
  type StatusSnapshot
} from './status.js';

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type EyeHandle = Pick<EyeRuntime, 'stop'>;

type ShutdownHookSummary = {
  name: string;
  status: 'ok' | 'error';
  error?: string;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const DEFAULT_CONFIG_PATH = 'config/default.json';

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  starting: 2,
  stopping: 3
};

const STATUS_UNAVAILABLE_EXIT_CODE = 4;

const CAMERA_OPTION_LINES = [
  '  --camera-id id                 --camera-model model',
  '  --camera-host host             --camera-port port',
  '  --camera-username name         --camera-password secret',
  '  --camera-stream name           --camera-stills-stream name',
  '  --camera-clip-seconds n        --camera-target-events a,b',
  '  --camera-handler path          --camera-save-folder path',
  '  --camera-stills video|stream|none'
];

const USAGE_LINES = [
  'onvifeye',
  '',
  'Usage:',
  '  onvifeye start [--config path] [--log-level level] [--verbose] [--status-file path] [camera options]',
  '  onvifeye status [--json] [--config path] [--status-file path]',
  '  onvifeye config create <file> [camera options] [--force]',
  '  onvifeye config check [--config path] [camera options]',
  '  onvifeye help',
  '',
  'Camera options override the matching value of every configured camera:',
  ...CAMERA_OPTION_LINES
];

const CONFIG_USAGE = [
  'onvifeye config commands',
  '',
  'Usage:',
  '  onvifeye config create <file> [camera options] [--force]',
  '  onvifeye config check [--config path] [camera options]',
  '',
  ...CAMERA_OPTION_LINES
].join('\n');

const STILLS_POLICIES: readonly StillsPolicy[] = ['video', 'stream', 'none'];

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT', 'SIGHUP'];

const state: {
  status: ServiceStatus;
  startedAt: number | null;
  runtime: EyeHandle | null;
  stopResolver: (() => void) | null;
  shutdownPromise: Promise<void> | null;
  lastShutdownError: Error | null;
  lastShutdownHooks: ShutdownHookSummary[];
  lastShutdownReason: string | null;
  lastShutdownSignal: NodeJS.Signals | null;
} = {
  status: 'idle',
  startedAt: null,
  runtime: null,
  stopResolver: null,
  shutdownPromise: null,
  lastShutdownError: null,
  lastShutdownHooks: [],
  lastShutdownReason: null,
  lastShutdownSignal: null
};

function resetServiceState() {
  state.status = 'idle';
  state.startedAt = null;
  state.runtime = null;
  state.stopResolver = null;
  state.shutdownPromise = null;
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = null;
  state.lastShutdownSignal = null;
}

type ParsedOptions = {
  positional: string[];
  values: Map<string, string>;
  flags: Set<string>;
  errors: string[];
};

const VALUE_OPTIONS = new Set([
  '--config',
  '--log-level',
  '--status-file',
  '--camera-id',
  '--camera-model',
  '--camera-host',
  '--camera-port',
  '--camera-username',
  '--camera-password',
  '--camera-stream',
  '--camera-stills-stream',
  '--camera-clip-seconds',
  '--camera-target-events',
  '--camera-handler',
  '--camera-save-folder',
  '--camera-stills'
]);

function parseOptions(args: string[]): ParsedOptions {
  const result: ParsedOptions = {
    positional: [],
    values: new Map(),
    flags: new Set(),
    errors: []
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (VALUE_OPTIONS.has(token)) {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push(`Missing value for ${token}`);
      } else {
        result.values.set(token, value);
        index += 1;
      }
      continue;
    }
    if (token.startsWith('-')) {
      result.flags.add(token);
      continue;
    }
    result.positional.push(token);
  }

  return result;
}

function rejectUnknownFlags(parsed: ParsedOptions, allowed: readonly string[]) {
  for (const flag of parsed.flags) {
    if (!allowed.includes(flag)) {
      parsed.errors.push(`Unknown option: ${flag}`);
    }
  }
}

function parseInteger(
  parsed: ParsedOptions,
  option: string,
  range: { min: number; max?: number }
): number | undefined {
  const raw = parsed.values.get(option);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || (range.max !== undefined && value > range.max)) {
    const bounds = range.max === undefined ? `>= ${range.min}` : `${range.min}-${range.max}`;
    parsed.errors.push(`${option} must be an integer ${bounds}`);
    return undefined;
  }
  return value;
}

/** Reads the `--camera-*` options; problems are appended to `parsed.errors`. */
function parseCameraOverrides(parsed: ParsedOptions): CameraOverrides {
  const values = parsed.values;
  const overrides: CameraOverrides = {};

  const id = values.get('--camera-id');
  const model = values.get('--camera-model');
  const host = values.get('--camera-host');
  const username = values.get('--camera-username');
  const password = values.get('--camera-password');
  const handler = values.get('--camera-handler');
  const saveFolder = values.get('--camera-save-folder');
  if (id !== undefined) overrides.id = id;
  if (model !== undefined) overrides.model = model;
  if (host !== undefined) overrides.host = host;
  if (username !== undefined) overrides.username = username;
  if (password !== undefined) overrides.password = password;
  if (handler !== undefined) overrides.handler = handler;
  if (saveFolder !== undefined) overrides.saveFolder = saveFolder;

  const onvifPort = parseInteger(parsed, '--camera-port', { min: 1, max: 65535 });
  const clipSeconds = parseInteger(parsed, '--camera-clip-seconds', { min: 1 });
  if (onvifPort !== undefined) overrides.onvifPort = onvifPort;
  if (clipSeconds !== undefined) overrides.clipSeconds = clipSeconds;

  const streams: CameraStreamNames = {};
  const mainStream = values.get('--camera-stream');
  const stillsStream = values.get('--camera-stills-stream');
  if (mainStream !== undefined) streams.main = mainStream;
  if (stillsStream !== undefined) streams.stills = stillsStream;
  if (Object.keys(streams).length > 0) {
    overrides.streams = streams;
  }

  const targets = values.get('--camera-target-events');
  if (targets !== undefined) {
    const events = targets
      .split(',')
      .map(event => event.trim())
      .filter(Boolean);
    if (events.length === 0) {
      parsed.errors.push('--camera-target-events must list at least one event name');
    } else {
      overrides.targetEvents = events;
    }
  }

  const stills = values.get('--camera-stills');
  if (stills !== undefined) {
    const policy = STILLS_POLICIES.find(candidate => candidate === stills);
    if (policy) {
      overrides.stills = policy;
    } else {
      parsed.errors.push(`--camera-stills must be one of ${STILLS_POLICIES.join(', ')}`);
    }
  }

  return overrides;
}

/** `--log-level` wins over `--verbose`, which means debug. */
function parseLogLevel(parsed: ParsedOptions): string | undefined {
  const explicit = parsed.values.get('--log-level');
  const level = explicit ?? (parsed.flags.has('--verbose') || parsed.flags.has('-v') ? 'debug' : undefined);
  if (level === undefined) {
    return undefined;
  }
  const normalized = level.trim().toLowerCase();
  const available = getAvailableLogLevels();
  if (!available.includes(normalized)) {
    parsed.errors.push(`Unknown log level "${level}" (available: ${available.join(', ')})`);
    return undefined;
  }
  return normalized;
}

function resolveFilePath(value: string) {
  return path.resolve(expandHome(value));
}

function resolveStatusSettings(config: OnvifeyeConfig, explicitFile: string | undefined) {
  return {
    file: resolveFilePath(explicitFile ?? config.status?.file ?? DEFAULTS.statusFile),
    intervalMs: config.status?.intervalMs ?? DEFAULTS.statusIntervalMs
  };
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'help';

  switch (command) {
    case 'start': {
      return startEyeCommand(argv.slice(1), io);
    }
    case 'status': {
      return runStatusCommand(argv.slice(1), io);
    }
    case 'config': {
      return runConfigCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

async function runConfigCommand(args: string[], io: CliIo): Promise<number> {
  const [subcommand, ...rest] = args;
  if (!subcommand || subcommand === 'help' || subcommand === '--help' || subcommand === '-h') {
    io.stdout.write(`${CONFIG_USAGE}\n`);
    return subcommand ? 0 : 1;
  }

  if (subcommand !== 'create' && subcommand !== 'check') {
    io.stderr.write(`Unknown config command: ${subcommand}\n`);
    io.stderr.write(`${CONFIG_USAGE}\n`);
    return 1;
  }

  const parsed = parseOptions(rest);
  rejectUnknownFlags(parsed, subcommand === 'create' ? ['--force'] : []);
  const overrides = parseCameraOverrides(parsed);
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  if (subcommand === 'create') {
    return createCameraFile(parsed, overrides, io);
  }
  return checkConfig(parsed, overrides, io);
}

function createCameraFile(parsed: ParsedOptions, overrides: CameraOverrides, io: CliIo): number {
  const target = parsed.positional[0];
  if (!target) {
    io.stderr.write('Missing camera file path\n');
    io.stderr.write(`${CONFIG_USAGE}\n`);
    return 1;
  }

  const resolved = path.resolve(target);
  if (fs.existsSync(resolved) && !parsed.flags.has('--force')) {
    io.stderr.write(`Refusing to overwrite ${resolved} (use --force)\n`);
    return 1;
  }

  const camera = applyCameraOverrides(createStarterCamera(), overrides);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, `${JSON.stringify(camera, null, 2)}\n`, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to write ${resolved}: ${message}\n`);
    return 1;
  }

  io.stdout.write(`Wrote starter camera config to ${resolved}\n`);
  return 0;
}

function describeTargets(camera: Camera) {
  const targets = [...camera.targetEvents];
  if (camera.wildcard) {
    targets.unshift(WILDCARD_EVENT);
  }
  return targets.join(', ');
}

async function checkConfig(
  parsed: ParsedOptions,
  cameraOverrides: CameraOverrides,
  io: CliIo
): Promise<number> {
  const configPath = parsed.values.get('--config') ?? DEFAULT_CONFIG_PATH;
  let cameras: Camera[];
  try {
    cameras = new ConfigManager(configPath, { cameraOverrides }).getCameras();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Configuration invalid: ${message}\n`);
    return 1;
  }

  io.stdout.write(`Configuration OK: ${cameras.length} camera(s)\n`);
  for (const camera of cameras) {
    io.stdout.write(`- ${camera.id} (${camera.host}) targets: ${describeTargets(camera)}\n`);
    if (camera.handler) {
      const runnable = await checkRunnable(camera.handler);
      if (!runnable.ok) {
        io.stdout.write(`  warning: handler ${camera.handler} ${runnable.reason}\n`);
      }
    }
  }
  return 0;
}

async function startEyeCommand(args: string[], io: CliIo): Promise<number> {
  if (state.status === 'running') {
    io.stdout.write('onvifeye is already running\n');
    return 0;
  }

  const parsed = parseOptions(args);
  rejectUnknownFlags(parsed, ['--verbose', '-v']);
  const cameraOverrides = parseCameraOverrides(parsed);
  const logLevel = parseLogLevel(parsed);
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  let configManager: ConfigManager;
  try {
    configManager = new ConfigManager(parsed.values.get('--config') ?? DEFAULT_CONFIG_PATH, {
      cameraOverrides
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Configuration invalid: ${message}\n`);
    return 1;
  }
  const statusSettings = resolveStatusSettings(
    configManager.getConfig(),
    parsed.values.get('--status-file')
  );

  const { startEye } = await import('./run-eye.js');

  state.status = 'starting';

  let runtime: EyeRuntime;
  try {
    runtime = await metrics.time('eye.startup.ms', () => startEye({ configManager, logLevel }));
  } catch (error) {
    state.status = 'stopped';
    state.runtime = null;
    logger.error({ err: error }, 'onvifeye failed to start');
    io.stderr.write('onvifeye failed to start. Check logs for details.\n');
    return 1;
  }

  state.runtime = runtime;
  state.status = 'running';
  state.startedAt = Date.now();
  io.stdout.write(`onvifeye watching ${runtime.supervisors.size} camera(s)\n`);

  await publishStatus(statusSettings.file, statusSettings.intervalMs);
  const statusTimer = setInterval(() => {
    void publishStatus(statusSettings.file, statusSettings.intervalMs);
  }, statusSettings.intervalMs);
  statusTimer.unref();

  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    registerSignalHandlers();
  });

  clearInterval(statusTimer);
  await publishStatus(statusSettings.file, statusSettings.intervalMs);

  return state.lastShutdownError ? 1 : 0;
}

async function buildStatusSnapshot(intervalMs: number): Promise<StatusSnapshot> {
  const snapshot = metrics.snapshot();
  const checks = await collectHealthChecks({
    service: { status: state.status, startedAt: state.startedAt },
    metrics: snapshot
  });

  let status: HealthStatus = 'ok';
  if (state.status === 'starting' || state.status === 'idle') {
    status = 'starting';
  } else if (state.status === 'stopping' || state.status === 'stopped') {
    status = 'stopping';
  } else if (checks.some(check => check.status === 'degraded')) {
    status = 'degraded';
  }

  return {
    status,
    state: state.status,
    pid: process.pid,
    startedAt: state.startedAt ? new Date(state.startedAt).toISOString() : null,
    updatedAt: new Date().toISOString(),
    intervalMs,
    checks,
    lastError: snapshot.logs.lastErrorMessage,
    lastShutdownReason: state.lastShutdownReason
  };
}

async function publishStatus(filePath: string, intervalMs: number) {
  try {
    writeStatusFile(filePath, await buildStatusSnapshot(intervalMs));
  } catch (error) {
    logger.warn({ err: error, path: filePath }, 'Failed to publish status');
  }
}

function locateStatusFile(parsed: ParsedOptions): string {
  const explicit = parsed.values.get('--status-file');
  if (explicit) {
    return resolveFilePath(explicit);
  }
  const configPath = parsed.values.get('--config');
  if (!configPath && !fs.existsSync(path.resolve(DEFAULT_CONFIG_PATH))) {
    return resolveFilePath(DEFAULTS.statusFile);
  }
  const config = new ConfigManager(configPath ?? DEFAULT_CONFIG_PATH).getConfig();
  return resolveStatusSettings(config, undefined).file;
}

/** Reads the snapshot a running `start` publishes; exit 4 when none is fresh. */
async function runStatusCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseOptions(args);
  rejectUnknownFlags(parsed, ['--json', '-j']);
  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    return 1;
  }

  let filePath: string;
  let snapshot: StatusSnapshot | null;
  try {
    filePath = locateStatusFile(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Configuration invalid: ${message}\n`);
    return 1;
  }
  try {
    snapshot = readStatusFile(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return STATUS_UNAVAILABLE_EXIT_CODE;
  }

  if (!snapshot) {
    io.stderr.write(`onvifeye is not running (no status file at ${filePath})\n`);
    return STATUS_UNAVAILABLE_EXIT_CODE;
  }

  const stale = isStatusStale(snapshot);
  const exitCode = stale ? STATUS_UNAVAILABLE_EXIT_CODE : resolveHealthExitCode(snapshot.status);

  if (parsed.flags.has('--json') || parsed.flags.has('-j')) {
    io.stdout.write(`${JSON.stringify({ ...snapshot, stale })}\n`);
    return exitCode;
  }

  const summary = [`onvifeye status: ${snapshot.state}`, `Health: ${snapshot.status}`];
  for (const check of snapshot.checks) {
    summary.push(`  ${check.name}: ${check.status}`);
  }
  if (snapshot.lastError) {
    summary.push(`Last error: ${snapshot.lastError}`);
  }
  if (stale) {
    summary.push(`Status is stale (last update ${snapshot.updatedAt})`);
  }
  io.stdout.write(`${summary.join('\n')}\n`);
  return exitCode;
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    void performShutdown('signal', signal);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, handleSignal);
  }
}

function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status] ?? 1;
}

export { resolveHealthExitCode };

async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status === 'idle' || state.status === 'stopped') {
    return null;
  }

  if (state.shutdownPromise) {
    await state.shutdownPromise;
    return state.lastShutdownError;
  }

  state.status = 'stopping';
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = reason;
  state.lastShutdownSignal = signal ?? null;
  logger.info({ reason, signal }, 'onvifeye shutting down');

  const shutdownTask = (async () => {
    const runtime = state.runtime;
    try {
      await metrics.time('eye.shutdown.ms', async () => {
        if (runtime) {
          await runtime.stop();
        }
      });
    } catch (error) {
      state.lastShutdownError = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: error }, 'Error during shutdown');
    } finally {
      const results = await runShutdownHooks({ reason, signal });
      state.lastShutdownHooks = results.map(
        (result): ShutdownHookSummary =>
          result.status === 'error'
            ? { name: result.name, status: 'error', error: result.error?.message ?? 'unknown error' }
            : { name: result.name, status: 'ok' }
      );
      for (const result of results) {
        if (result.status === 'error') {
          logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          if (!state.lastShutdownError) {
            state.lastShutdownError = result.error ?? null;
          }
        }
      }

      state.runtime = null;
      state.status = 'stopped';
      state.startedAt = null;
      state.stopResolver?.();
      state.stopResolver = null;
      state.shutdownPromise = null;
      logger.info({ reason, signal }, 'onvifeye stopped');
    }
  })();

  state.shutdownPromise = shutdownTask;
  await shutdownTask;
  return state.lastShutdownError;
}

export const __test__ = {
  getState: () => ({ ...state }),
  setRuntime(
    runtime: EyeHandle | null,
    options: { status?: ServiceStatus; startedAt?: number | null } = {}
  ) {
    resetServiceState();
    if (runtime) {
      state.runtime = runtime;
      state.status = options.status ?? 'running';
      state.startedAt = typeof options.startedAt === 'number' ? options.startedAt : Date.now();
    }
  },
  reset: resetServiceState,
  performShutdown
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'onvifeye CLI failed');
      process.exit(1);
    }
  );
}
