import ffmpeg from 'fluent-ffmpeg';
import fs from 'node:fs/promises';
import path from 'node:path';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { CaptureKind, CaptureResult, CaptureStatus, Logger } from '../types.js';

const DEFAULT_GRACE_SECONDS = 30;
const DEFAULT_STILL_TIMEOUT_SECONDS = 30;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_STDERR_LINES = 20;

export type CaptureOperation = 'video' | 'still' | 'frame';

export type CaptureCommandOptions = {
  operation: CaptureOperation;
  input: string;
  output: string;
  durationSeconds: number | null;
  rtspTransport: string | null;
  inputArgs: readonly string[];
};

export type CaptureSupervisorOptions = {
  cameraId: string;
  graceSeconds?: number;
  stillTimeoutSeconds?: number;
  forceKillTimeoutMs?: number;
  rtspTransport?: string;
  inputArgs?: readonly string[];
  stderrLines?: number;
  commandFactory?: (options: CaptureCommandOptions) => ffmpeg.FfmpegCommand;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

type RunningTask = {
  kind: CaptureKind;
  operation: CaptureOperation;
  path: string;
  command: ffmpeg.FfmpegCommand;
  terminate: (reason: 'timeout' | 'aborted') => void;
  done: Promise<CaptureResult>;
};

let configuredFfmpegPath: string | null = null;

/**
 * Points fluent-ffmpeg at a specific binary. Without one it falls back to the
 * `FFMPEG_PATH` environment variable and then to `ffmpeg` on the PATH.
 */
export function configureFfmpegPath(candidate: string | null | undefined): string | null {
  const trimmed = typeof candidate === 'string' ? candidate.trim() : '';
  if (!trimmed || trimmed === configuredFfmpegPath) {
    return configuredFfmpegPath;
  }
  ffmpeg.setFfmpegPath(trimmed);
  configuredFfmpegPath = trimmed;
  return configuredFfmpegPath;
}

function isRtspSource(input: string) {
  return /^rtsps?:\/\//i.test(input);
}

export function buildCaptureCommand(options: CaptureCommandOptions): ffmpeg.FfmpegCommand {
  const command = ffmpeg(options.input, { stdoutLines: DEFAULT_STDERR_LINES });

  const inputOptions: string[] = [];
  if (options.rtspTransport && isRtspSource(options.input)) {
    inputOptions.push('-rtsp_transport', options.rtspTransport);
  }
  if (options.inputArgs.length > 0) {
    inputOptions.push(...options.inputArgs);
  }
  if (inputOptions.length > 0) {
    command.inputOptions(inputOptions);
  }

  if (options.operation === 'video') {
    command
      .outputOptions('-t', String(options.durationSeconds ?? 0))
      .outputOptions('-c:v', 'libx264')
      .outputOptions('-preset', 'ultrafast')
      .outputOptions('-tune', 'zerolatency')
      .outputOptions('-c:a', 'aac')
      .outputOptions('-f', 'mpegts');
  } else {
    command.outputOptions('-frames:v', '1').outputOptions('-q:v', '2');
  }

  return command.output(options.output);
}

function parseExitCode(error: Error): number | null {
  const match = /exited with code (\d+)/.exec(error.message);
  return match ? Number(match[1]) : null;
}

/**
 * Runs one ffmpeg process per capture task and holds it to a deadline. A
 * process still running at its deadline gets SIGTERM, then SIGKILL after
 * `forceKillTimeoutMs`. Failures are reported in the returned result, never
 * thrown.
 */
export class CaptureSupervisor {
  private readonly running = new Set<RunningTask>();
  private closed = false;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(private readonly options: CaptureSupervisorOptions) {
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => Date.now());
  }

  get activeCount() {
    return this.running.size;
  }

  captureVideo(source: string, outputPath: string, durationSeconds: number) {
    const grace = this.options.graceSeconds ?? DEFAULT_GRACE_SECONDS;
    return this.run('video', 'video', {
      input: source,
      output: outputPath,
      durationSeconds,
      deadlineMs: (durationSeconds + grace) * 1000
    });
  }

  captureStill(source: string, outputPath: string) {
    return this.run('still', 'still', {
      input: source,
      output: outputPath,
      durationSeconds: null,
      deadlineMs: (this.options.stillTimeoutSeconds ?? DEFAULT_STILL_TIMEOUT_SECONDS) * 1000
    });
  }

  extractFrame(videoPath: string, outputPath: string) {
    return this.run('still', 'frame', {
      input: videoPath,
      output: outputPath,
      durationSeconds: null,
      deadlineMs: (this.options.stillTimeoutSeconds ?? DEFAULT_STILL_TIMEOUT_SECONDS) * 1000
    });
  }

  /** Terminates running captures; captures requested afterwards resolve as aborted. */
  async abortAll(): Promise<void> {
    this.closed = true;
    const tasks = Array.from(this.running);
    for (const task of tasks) {
      task.terminate('aborted');
    }
    await Promise.all(tasks.map(task => task.done));
  }

  private async run(
    kind: CaptureKind,
    operation: CaptureOperation,
    request: { input: string; output: string; durationSeconds: number | null; deadlineMs: number }
  ): Promise<CaptureResult> {
    const startedAt = this.now();
    const base = { kind, path: request.output, startedAt };

    try {
      await fs.mkdir(path.dirname(request.output), { recursive: true });
    } catch (error) {
      return this.finish(operation, {
        ...base,
        status: 'failed',
        exitCode: null,
        error: `Failed to create directory: ${error instanceof Error ? error.message : String(error)}`
      });
    }

    if (this.closed) {
      return this.finish(operation, { ...base, status: 'aborted', exitCode: null, error: 'Capture aborted' });
    }

    let command: ffmpeg.FfmpegCommand;
    try {
      command = this.createCommand({
        operation,
        input: request.input,
        output: request.output,
        durationSeconds: request.durationSeconds,
        rtspTransport: this.options.rtspTransport ?? null,
        inputArgs: this.options.inputArgs ?? []
      });
    } catch (error) {
      return this.finish(operation, {
        ...base,
        status: 'failed',
        exitCode: null,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const stderrLimit = this.options.stderrLines ?? DEFAULT_STDERR_LINES;
    const stderr: string[] = [];
    let settle: (result: CaptureResult) => void = () => {};
    const done = new Promise<CaptureResult>(resolve => {
      settle = resolve;
    });

    let settled = false;
    let terminationReason: 'timeout' | 'aborted' | null = null;
    let deadlineTimer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const task: RunningTask = {
      kind,
      operation,
      path: request.output,
      command,
      terminate: reason => terminate(reason),
      done
    };

    const cleanup = () => {
      if (deadlineTimer) {
        clearTimeout(deadlineTimer);
        deadlineTimer = null;
      }
      if (killTimer) {
        clearTimeout(killTimer);
        killTimer = null;
      }
      this.running.delete(task);
    };

    const complete = (status: CaptureStatus, exitCode: number | null, error: string | null) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      settle(this.finish(operation, { ...base, status, exitCode, error }, stderr));
    };

    const sendSignal = (signal: NodeJS.Signals) => {
      try {
        command.kill(signal);
      } catch (error) {
        this.options.logger?.debug(
          { camera: this.options.cameraId, err: error, signal, path: request.output },
          'Failed to signal ffmpeg process'
        );
      }
    };

    const terminate = (reason: 'timeout' | 'aborted') => {
      if (settled || terminationReason) {
        return;
      }
      terminationReason = reason;
      sendSignal('SIGTERM');

      const delay = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
      const forceKill = () => {
        killTimer = null;
        sendSignal('SIGKILL');
        complete(reason, null, reason === 'timeout' ? 'Capture exceeded its deadline' : 'Capture aborted');
      };
      if (delay <= 0) {
        forceKill();
        return;
      }
      killTimer = setTimeout(forceKill, delay);
      killTimer.unref?.();
    };

    const onStart = (commandLine: string) => {
      this.options.logger?.debug(
        { camera: this.options.cameraId, operation, commandLine },
        'ffmpeg started'
      );
    };

    const onStderr = (line: string) => {
      stderr.push(line);
      if (stderr.length > stderrLimit) {
        stderr.splice(0, stderr.length - stderrLimit);
      }
    };

    const onEnd = () => {
      if (terminationReason) {
        complete(
          terminationReason,
          0,
          terminationReason === 'timeout' ? 'Capture exceeded its deadline' : 'Capture aborted'
        );
        return;
      }
      complete('succeeded', 0, null);
    };

    const onError = (error: Error) => {
      if (terminationReason) {
        complete(
          terminationReason,
          parseExitCode(error),
          terminationReason === 'timeout' ? 'Capture exceeded its deadline' : 'Capture aborted'
        );
        return;
      }
      complete('failed', parseExitCode(error), error.message);
    };

    command.on('start', onStart);
    command.on('stderr', onStderr);
    command.on('end', onEnd);
    command.on('error', onError);

    this.running.add(task);

    deadlineTimer = setTimeout(() => {
      deadlineTimer = null;
      this.options.logger?.warn(
        { camera: this.options.cameraId, operation, path: request.output, deadlineMs: request.deadlineMs },
        'ffmpeg overran its deadline, terminating'
      );
      terminate('timeout');
    }, request.deadlineMs);
    deadlineTimer.unref?.();

    try {
      command.run();
    } catch (error) {
      complete('failed', null, error instanceof Error ? error.message : String(error));
    }

    return done;
  }

  private createCommand(options: CaptureCommandOptions) {
    if (this.options.commandFactory) {
      return this.options.commandFactory(options);
    }
    return buildCaptureCommand(options);
  }

  private finish(
    operation: CaptureOperation,
    partial: Omit<CaptureResult, 'finishedAt'>,
    stderr: readonly string[] = []
  ): CaptureResult {
    const result: CaptureResult = { ...partial, finishedAt: this.now() };
    this.metrics.recordCapture(result);

    if (result.status === 'succeeded') {
      this.options.logger?.info(
        { camera: this.options.cameraId, operation, path: result.path },
        'Capture complete'
      );
    } else {
      this.options.logger?.warn(
        {
          camera: this.options.cameraId,
          operation,
          path: result.path,
          status: result.status,
          exitCode: result.exitCode,
          error: result.error,
          stderr: stderr.slice(-5)
        },
        'Capture did not complete'
      );
    }

    return result;
  }
}
