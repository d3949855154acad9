import type { FfmpegCommand } from 'fluent-ffmpeg';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  buildCaptureCommand,
  CaptureSupervisor,
  type CaptureCommandOptions,
  type CaptureSupervisorOptions
} from '../src/recording/capture.js';
import { collectUnhandledRejections, createTestLogger, FakeCommand, waitUntil } from './helpers/fakes.js';

function commandArguments(command: FfmpegCommand): string[] {
  const getter: unknown = Reflect.get(command, '_getArguments');
  if (typeof getter !== 'function') {
    throw new Error('fluent-ffmpeg no longer exposes _getArguments');
  }
  const args: unknown = getter.call(command);
  if (!Array.isArray(args)) {
    throw new Error('Expected an argument list');
  }
  return args.map(String);
}

describe('buildCaptureCommand', () => {
  it('builds a clip command that ffmpeg accepts for a file output', () => {
    const output = path.resolve('/srv/onvifeye/videos/c1/20240115-100000.ts');
    const args = commandArguments(
      buildCaptureCommand({
        operation: 'video',
        input: 'rtsp://10.0.0.5:554/stream1',
        output,
        durationSeconds: 30,
        rtspTransport: 'tcp',
        inputArgs: []
      })
    );

    expect(args.slice(0, 4)).toEqual(['-rtsp_transport', 'tcp', '-i', 'rtsp://10.0.0.5:554/stream1']);
    expect(args).toContain('-y');
    expect(args).not.toContain('-n');
    expect(args[args.indexOf('-t') + 1]).toBe('30');
    expect(args[args.indexOf('-f') + 1]).toBe('mpegts');
    expect(args[args.length - 1]).toBe(output);
  });

  it('reads a single frame from a recorded clip without RTSP options', () => {
    const input = path.resolve('/srv/onvifeye/videos/c1/20240115-100000.ts');
    const output = path.resolve('/srv/onvifeye/images/c1/20240115-100000.jpg');
    const args = commandArguments(
      buildCaptureCommand({
        operation: 'frame',
        input,
        output,
        durationSeconds: null,
        rtspTransport: 'tcp',
        inputArgs: []
      })
    );

    expect(args.slice(0, 2)).toEqual(['-i', input]);
    expect(args).not.toContain('-rtsp_transport');
    expect(args).not.toContain('-n');
    expect(args[args.indexOf('-frames:v') + 1]).toBe('1');
    expect(args[args.length - 1]).toBe(output);
  });
});

describe('CaptureSupervisor', () => {
  let tempDir: string;
  let metrics: MetricsRegistry;
  let commands: FakeCommand[];
  let requests: CaptureCommandOptions[];

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'onvifeye-capture-'));
    metrics = new MetricsRegistry();
    commands = [];
    requests = [];
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createSupervisor(options: Partial<CaptureSupervisorOptions> = {}) {
    const logger = createTestLogger();
    const supervisor = new CaptureSupervisor({
      cameraId: 'c1',
      graceSeconds: 5,
      forceKillTimeoutMs: 3_000,
      rtspTransport: 'tcp',
      metrics,
      logger,
      commandFactory: request => {
        requests.push(request);
        const command = new FakeCommand();
        commands.push(command);
        return command as unknown as FfmpegCommand;
      },
      ...options
    });
    return { supervisor, logger };
  }

  it('records a clip and reports success', async () => {
    const { supervisor, logger } = createSupervisor();
    const output = path.join(tempDir, 'videos', 'c1', '20240115-100000.ts');

    const pending = supervisor.captureVideo('rtsp://10.0.0.5:554/stream1', output, 30);
    await waitUntil(() => commands.length === 1);

    expect(fs.existsSync(path.dirname(output))).toBe(true);
    expect(requests[0]).toEqual({
      operation: 'video',
      input: 'rtsp://10.0.0.5:554/stream1',
      output,
      durationSeconds: 30,
      rtspTransport: 'tcp',
      inputArgs: []
    });
    expect(commands[0].runCalls).toBe(1);
    expect(supervisor.activeCount).toBe(1);

    commands[0].emit('end');
    const result = await pending;

    expect(result).toMatchObject({
      kind: 'video',
      path: output,
      status: 'succeeded',
      exitCode: 0,
      error: null
    });
    expect(supervisor.activeCount).toBe(0);
    expect(metrics.snapshot().captures.byKind.video).toEqual({ succeeded: 1 });
    expect(logger.info).toHaveBeenCalledWith(
      { camera: 'c1', operation: 'video', path: output },
      'Capture complete'
    );
  });

  it('reports a non-zero ffmpeg exit as a failure with its stderr tail', async () => {
    const { supervisor, logger } = createSupervisor({ stderrLines: 2 });
    const output = path.join(tempDir, 'images', 'c1', '20240115-100000.jpg');

    const pending = supervisor.captureStill('rtsp://10.0.0.5:554/stream8', output);
    await waitUntil(() => commands.length === 1);

    expect(requests[0].operation).toBe('still');
    commands[0].emit('stderr', 'Input #0, rtsp');
    commands[0].emit('stderr', 'Connection refused');
    commands[0].emit('stderr', 'Exiting normally, received signal 2.');
    commands[0].exitWithCode(1, 'Connection refused');

    const result = await pending;
    expect(result).toMatchObject({
      kind: 'still',
      status: 'failed',
      exitCode: 1,
      error: 'ffmpeg exited with code 1: Connection refused'
    });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({
        status: 'failed',
        stderr: ['Connection refused', 'Exiting normally, received signal 2.']
      }),
      'Capture did not complete'
    );
  });

  it('terminates an overrunning capture with SIGTERM and then SIGKILL', async () => {
    const { supervisor } = createSupervisor();
    const output = path.join(tempDir, 'videos', 'c1', 'clip.ts');

    const pending = supervisor.captureVideo('rtsp://10.0.0.5:554/stream1', output, 10);
    await waitUntil(() => commands.length === 1);
    const command = commands[0];

    vi.advanceTimersByTime(14_999);
    expect(command.killedSignals).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(command.killedSignals).toEqual(['SIGTERM']);

    vi.advanceTimersByTime(3_000);
    expect(command.killedSignals).toEqual(['SIGTERM', 'SIGKILL']);

    const result = await pending;
    expect(result).toMatchObject({
      status: 'timeout',
      exitCode: null,
      error: 'Capture exceeded its deadline'
    });
    expect(metrics.snapshot().captures.byKind.video).toEqual({ timeout: 1 });
  });

  it('does not escalate when ffmpeg exits after SIGTERM', async () => {
    const { supervisor } = createSupervisor();
    const output = path.join(tempDir, 'videos', 'c1', 'clip.ts');

    const pending = supervisor.captureVideo('rtsp://10.0.0.5:554/stream1', output, 10);
    await waitUntil(() => commands.length === 1);
    const command = commands[0];

    vi.advanceTimersByTime(15_000);
    command.emit('error', new Error('ffmpeg was killed with signal SIGTERM'));

    const result = await pending;
    vi.advanceTimersByTime(10_000);

    expect(result.status).toBe('timeout');
    expect(command.killedSignals).toEqual(['SIGTERM']);
  });

  it('aborts every running capture', async () => {
    const unhandled = await collectUnhandledRejections(async () => {
      const { supervisor } = createSupervisor();

      const video = supervisor.captureVideo(
        'rtsp://10.0.0.5:554/stream1',
        path.join(tempDir, 'videos', 'c1', 'a.ts'),
        30
      );
      const frame = supervisor.extractFrame(
        path.join(tempDir, 'videos', 'c1', 'b.ts'),
        path.join(tempDir, 'images', 'c1', 'b.jpg')
      );
      await waitUntil(() => commands.length === 2);

      expect(requests.map(request => request.operation)).toEqual(['video', 'frame']);

      const aborted = supervisor.abortAll();
      expect(commands.map(command => command.killedSignals)).toEqual([['SIGTERM'], ['SIGTERM']]);

      commands[0].emit('error', new Error('ffmpeg was killed with signal SIGTERM'));
      commands[1].emit('end');
      await aborted;

      const results = await Promise.all([video, frame]);
      expect(results.map(result => result.status)).toEqual(['aborted', 'aborted']);
      expect(results[0].error).toBe('Capture aborted');
      expect(supervisor.activeCount).toBe(0);

      commands[0].emit('error', new Error('late failure'));
    });

    expect(unhandled).toEqual([]);
  });

  it('refuses captures requested after an abort', async () => {
    const { supervisor } = createSupervisor();
    await supervisor.abortAll();

    const result = await supervisor.captureVideo(
      'rtsp://10.0.0.5:554/stream1',
      path.join(tempDir, 'videos', 'c1', 'late.ts'),
      30
    );

    expect(result).toMatchObject({
      kind: 'video',
      status: 'aborted',
      exitCode: null,
      error: 'Capture aborted'
    });
    expect(requests).toEqual([]);
    expect(supervisor.activeCount).toBe(0);
    expect(metrics.snapshot().captures.byKind.video).toEqual({ aborted: 1 });
  });

  it('fails the capture when the command cannot be built', async () => {
    const { supervisor } = createSupervisor({
      commandFactory: () => {
        throw new Error('ffmpeg binary not found');
      }
    });

    const result = await supervisor.captureStill(
      'rtsp://10.0.0.5:554/stream8',
      path.join(tempDir, 'images', 'c1', 'x.jpg')
    );

    expect(result).toMatchObject({
      status: 'failed',
      exitCode: null,
      error: 'ffmpeg binary not found'
    });
  });
});
