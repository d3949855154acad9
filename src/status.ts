import fs from 'node:fs';
import path from 'node:path';
import type { HealthCheckResult, HealthStatus } from './app.js';

/** What a running `start` publishes for `status` to read from another process. */
export type StatusSnapshot = {
  status: HealthStatus;
  state: string;
  pid: number;
  startedAt: string | null;
  updatedAt: string;
  intervalMs: number;
  checks: HealthCheckResult[];
  lastError: string | null;
  lastShutdownReason: string | null;
};

const HEALTH_STATUSES = new Set<string>(['ok', 'starting', 'stopping', 'degraded']);

// A snapshot older than this many publish intervals means the writer is gone.
const STALE_AFTER_INTERVALS = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHealthStatus(value: unknown): value is HealthStatus {
  return typeof value === 'string' && HEALTH_STATUSES.has(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function parseCheck(value: unknown): HealthCheckResult | null {
  if (!isRecord(value) || typeof value.name !== 'string' || !isHealthStatus(value.status)) {
    return null;
  }
  const check: HealthCheckResult = { name: value.name, status: value.status };
  if (isRecord(value.details)) {
    check.details = value.details;
  }
  return check;
}

export function parseStatusSnapshot(value: unknown): StatusSnapshot {
  if (!isRecord(value)) {
    throw new Error('expected an object');
  }
  if (!isHealthStatus(value.status)) {
    throw new Error('status must be one of ok, starting, stopping, degraded');
  }
  if (typeof value.state !== 'string') {
    throw new Error('state must be a string');
  }
  if (typeof value.pid !== 'number') {
    throw new Error('pid must be a number');
  }
  if (typeof value.updatedAt !== 'string' || Number.isNaN(Date.parse(value.updatedAt))) {
    throw new Error('updatedAt must be an ISO timestamp');
  }
  if (typeof value.intervalMs !== 'number' || value.intervalMs <= 0) {
    throw new Error('intervalMs must be a positive number');
  }
  if (!isNullableString(value.startedAt) || !isNullableString(value.lastError)) {
    throw new Error('startedAt and lastError must be strings or null');
  }
  if (!isNullableString(value.lastShutdownReason)) {
    throw new Error('lastShutdownReason must be a string or null');
  }
  if (!Array.isArray(value.checks)) {
    throw new Error('checks must be an array');
  }

  const checks: HealthCheckResult[] = [];
  for (const entry of value.checks) {
    const check = parseCheck(entry);
    if (!check) {
      throw new Error('checks must hold { name, status } entries');
    }
    checks.push(check);
  }

  return {
    status: value.status,
    state: value.state,
    pid: value.pid,
    startedAt: value.startedAt,
    updatedAt: value.updatedAt,
    intervalMs: value.intervalMs,
    checks,
    lastError: value.lastError,
    lastShutdownReason: value.lastShutdownReason
  };
}

/** Replaces the file in one rename so readers never see a partial write. */
export function writeStatusFile(filePath: string, snapshot: StatusSnapshot) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const temporary = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(temporary, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');
  fs.renameSync(temporary, filePath);
}

/** Returns null when no service has published a status at `filePath`. */
export function readStatusFile(filePath: string): StatusSnapshot | null {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  try {
    return parseStatusSnapshot(JSON.parse(contents));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Status file ${filePath} is malformed: ${message}`);
  }
}

export function isStatusStale(snapshot: StatusSnapshot, now = Date.now()) {
  if (snapshot.state === 'stopped') {
    return false;
  }
  return now - Date.parse(snapshot.updatedAt) > snapshot.intervalMs * STALE_AFTER_INTERVALS;
}
