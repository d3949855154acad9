import { spawn, type ChildProcess } from 'node:child_process';
import fs from 'node:fs/promises';
import { constants as fsConstants, type Stats } from 'node:fs';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { HandlerResult, HandlerStatus, Logger } from '../types.js';

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_OUTPUT_LINES = 20;

export type ExternalHandlerOptions = {
  path: string | null;
  cameraId: string;
  timeoutMs?: number;
  forceKillTimeoutMs?: number;
  outputLines?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type RunnableCheck = { ok: true } | { ok: false; reason: string };

export async function checkRunnable(filePath: string | null): Promise<RunnableCheck> {
  if (!filePath) {
    return { ok: false, reason: 'no handler configured' };
  }

  let stats: Stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
    return { ok: false, reason: code === 'ENOENT' ? 'not found' : `not accessible (${code})` };
  }

  if (stats.isDirectory()) {
    return { ok: false, reason: 'is a directory' };
  }

  try {
    await fs.access(filePath, fsConstants.X_OK);
  } catch {
    return { ok: false, reason: 'not executable' };
  }

  return { ok: true };
}

/**
 * Runs the user's handler program as `<handler> <cameraId> <eventId>`.
 * Exit status is logged and returned; it never propagates as an error.
 */
export class ExternalHandler {
  private readonly inFlight = new Set<Promise<HandlerResult>>();
  private readonly metrics: MetricsRegistry;
  private warnedUnrunnable = false;

  constructor(private readonly options: ExternalHandlerOptions) {
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get configured() {
    return Boolean(this.options.path);
  }

  get pending() {
    return this.inFlight.size;
  }

  invoke(eventId: string): Promise<HandlerResult> {
    const run = this.execute(eventId);
    this.inFlight.add(run);
    void run.finally(() => {
      this.inFlight.delete(run);
    });
    return run;
  }

  /** Resolves true when every in-flight invocation finished within `timeoutMs`. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | null = null;
    const timeout = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
      timer.unref?.();
    });

    try {
      return await Promise.race([
        Promise.allSettled(Array.from(this.inFlight)).then(() => true),
        timeout
      ]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  /** Checks the handler once up front so a bad path is reported before any event. */
  async verify(): Promise<RunnableCheck> {
    const runnable = await checkRunnable(this.options.path);
    if (!runnable.ok && this.options.path) {
      this.reportUnrunnable(runnable.reason, null);
    }
    return runnable;
  }

  private reportUnrunnable(reason: string, eventId: string | null) {
    const context = { camera: this.options.cameraId, eventId, handler: this.options.path, reason };
    if (!this.warnedUnrunnable) {
      this.warnedUnrunnable = true;
      this.options.logger?.warn(context, 'Handler cannot be run, skipping');
    } else {
      this.options.logger?.debug(context, 'Handler cannot be run, skipping');
    }
  }

  private async execute(eventId: string): Promise<HandlerResult> {
    const handlerPath = this.options.path;
    const runnable = await checkRunnable(handlerPath);
    if (!handlerPath || !runnable.ok) {
      const reason = runnable.ok ? 'no handler configured' : runnable.reason;
      if (handlerPath) {
        this.reportUnrunnable(reason, eventId);
      }
      return this.finish(eventId, { status: 'skipped', exitCode: null, signal: null, error: reason });
    }

    return new Promise<HandlerResult>(resolve => {
      let child: ChildProcess;
      try {
        child = spawn(handlerPath, [this.options.cameraId, eventId], {
          stdio: ['ignore', 'pipe', 'pipe']
        });
      } catch (error) {
        resolve(
          this.finish(eventId, {
            status: 'failed',
            exitCode: null,
            signal: null,
            error: error instanceof Error ? error.message : String(error)
          })
        );
        return;
      }

      const outputLimit = this.options.outputLines ?? DEFAULT_OUTPUT_LINES;
      const output: string[] = [];
      let settled = false;
      let timedOut = false;
      let killTimer: NodeJS.Timeout | null = null;

      const onOutput = (chunk: Buffer | string) => {
        for (const line of chunk.toString().split(/\r?\n/)) {
          if (!line) {
            continue;
          }
          output.push(line);
          if (output.length > outputLimit) {
            output.shift();
          }
          this.options.logger?.debug({ camera: this.options.cameraId, eventId, line }, 'Handler output');
        }
      };

      child.stdout?.on('data', onOutput);
      child.stderr?.on('data', onOutput);

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.options.logger?.warn(
          { camera: this.options.cameraId, eventId, handler: handlerPath },
          'Handler overran its timeout, terminating'
        );
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          child.kill('SIGKILL');
        }, this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS);
        killTimer.unref?.();
      }, this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
      timeoutTimer.unref?.();

      const settle = (result: HandlerResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        resolve(this.finish(eventId, result, output));
      };

      child.once('error', error => {
        settle({ status: 'failed', exitCode: null, signal: null, error: error.message });
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        let status: HandlerStatus = code === 0 ? 'succeeded' : 'failed';
        if (timedOut) {
          status = 'timeout';
        }
        settle({
          status,
          exitCode: code,
          signal,
          error: status === 'succeeded' ? null : `Handler exited with ${signal ?? `code ${code}`}`
        });
      });
    });
  }

  private finish(eventId: string, result: HandlerResult, output: readonly string[] = []): HandlerResult {
    this.metrics.recordHandler(result.status);
    const context = {
      camera: this.options.cameraId,
      eventId,
      handler: this.options.path,
      status: result.status,
      exitCode: result.exitCode,
      signal: result.signal
    };
    if (result.status === 'succeeded') {
      this.options.logger?.info(context, 'Handler finished');
    } else if (result.status !== 'skipped') {
      this.options.logger?.warn({ ...context, error: result.error, output: output.slice(-5) }, 'Handler failed');
    }
    return result;
  }
}
