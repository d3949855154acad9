import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'onvifeye';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase())
);
AVAILABLE_LOG_LEVELS.add('silent');

type LogContext = {
  message?: string;
  camera?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let camera: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      if (typeof value.camera === 'string' && value.camera.length > 0 && !camera) {
        camera = value.camera;
      } else if (!camera && isRecord(value.session)) {
        const cameraId = value.session.cameraId;
        if (typeof cameraId === 'string' && cameraId.length > 0) {
          camera = cameraId;
        }
      }
      if (typeof value.message === 'string' && value.message.length > 0 && !message) {
        message = value.message;
      }
    }
  }

  return { message, camera };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string): asserts level is pino.LevelWithSilent {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  if (currentLevel === normalized) {
    return currentLevel;
  }

  const previous = currentLevel;
  logger.level = normalized;
  currentLevel = logger.level;
  logger.info({ level: currentLevel, previous }, 'Log level updated');
  return currentLevel;
}

export default logger;
