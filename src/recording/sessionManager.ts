import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Camera } from '../config/index.js';
import type {
  CaptureResult,
  EventSession,
  Logger,
  Notification,
  RecordingSession,
  StreamAddresses
} from '../types.js';
import type { CaptureSupervisor } from './capture.js';
import type { ExternalHandler } from './handler.js';
import { artifactPath, formatEventId } from './paths.js';

export type CaptureRunner = Pick<
  CaptureSupervisor,
  'captureVideo' | 'captureStill' | 'extractFrame' | 'abortAll'
>;

export type HandlerRunner = Pick<ExternalHandler, 'configured' | 'invoke' | 'drain'>;

export type RecordingSessionManagerOptions = {
  camera: Camera;
  capture: CaptureRunner;
  handler: HandlerRunner;
  resolveStreams: () => Promise<StreamAddresses>;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
  pathExists?: (filePath: string) => boolean;
};

export type VideoEndedEvent = {
  recording: RecordingSession;
  at: number;
};

function unrunResult(
  kind: CaptureResult['kind'],
  status: 'skipped' | 'aborted',
  filePath: string,
  at: number,
  error: string
): CaptureResult {
  return {
    kind,
    path: filePath,
    status,
    startedAt: at,
    finishedAt: at,
    exitCode: null,
    error
  };
}

/**
 * Turns each event session into one recording: a clip, a still and a single
 * handler run. Recordings outlive the event session that started them.
 */
export class RecordingSessionManager extends EventEmitter {
  private readonly recordings = new Map<string, { recording: RecordingSession; done: Promise<void> }>();
  private readonly reservedPaths = new Set<string>();
  private aborted = false;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly pathExists: (filePath: string) => boolean;

  constructor(private readonly options: RecordingSessionManagerOptions) {
    super();
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => Date.now());
    this.pathExists = options.pathExists ?? (filePath => fs.existsSync(filePath));
  }

  active(): RecordingSession[] {
    return Array.from(this.recordings.values(), entry => ({ ...entry.recording }));
  }

  begin(session: EventSession): RecordingSession | null {
    const camera = this.options.camera;
    if (this.aborted || this.recordings.has(session.id)) {
      return null;
    }

    const eventId = formatEventId(session.eventName, session.startedAt);
    const videoPath = artifactPath(camera.saveFolder, 'video', camera.id, session.startedAt);
    if (this.isTaken(videoPath)) {
      this.options.logger?.error(
        { camera: camera.id, eventId, path: videoPath },
        'Video path already exists, skipping recording'
      );
      return null;
    }

    let stillPath: string | null = null;
    let stillConflict: string | null = null;
    if (camera.stills !== 'none') {
      const candidate = artifactPath(camera.saveFolder, 'still', camera.id, session.startedAt);
      if (this.isTaken(candidate)) {
        stillConflict = candidate;
        this.options.logger?.error(
          { camera: camera.id, eventId, path: candidate },
          'Still path already exists, skipping still capture'
        );
      } else {
        stillPath = candidate;
      }
    }

    this.reservedPaths.add(videoPath);
    if (stillPath) {
      this.reservedPaths.add(stillPath);
    }

    const recording: RecordingSession = {
      id: session.id,
      cameraId: camera.id,
      eventName: session.eventName,
      eventId,
      startedAt: session.startedAt,
      deadline: session.startedAt + camera.clipSeconds * 1000,
      paths: { video: videoPath, still: stillPath },
      captures: [],
      handler: null,
      status: 'recording'
    };

    if (stillConflict) {
      recording.captures.push(
        unrunResult('still', 'skipped', stillConflict, this.now(), 'Still path already exists')
      );
    }

    this.options.logger?.info(
      { camera: camera.id, eventId, video: videoPath, still: stillPath },
      'Recording started'
    );

    const done = this.record(recording)
      .catch(error => {
        recording.status = 'degraded';
        this.options.logger?.error({ camera: camera.id, eventId, err: error }, 'Recording failed');
      })
      .finally(() => {
        this.recordings.delete(recording.id);
        this.reservedPaths.delete(videoPath);
        if (stillPath) {
          this.reservedPaths.delete(stillPath);
        }
        this.metrics.recordRecording(camera.id, recording.status);
        this.emit('complete', { ...recording });
      });

    this.recordings.set(recording.id, { recording, done });
    return { ...recording };
  }

  /** Runs the handler for a synthetic notification the camera explicitly targets. */
  handleSynthetic(notification: Notification) {
    if (!this.options.camera.targetEvents.includes(notification.eventName)) {
      return;
    }
    if (!this.options.handler.configured) {
      return;
    }
    const eventId = formatEventId(notification.eventName, notification.observedAt);
    void this.options.handler.invoke(eventId);
  }

  /** Stops running captures and refuses new recordings and captures. */
  async abort(): Promise<void> {
    this.aborted = true;
    await this.options.capture.abortAll();
  }

  /** Resolves true when recordings and handler runs all finished in time. */
  async drain(timeoutMs: number): Promise<boolean> {
    const deadline = this.now() + Math.max(0, timeoutMs);
    const pending = Array.from(this.recordings.values(), entry => entry.done);

    if (pending.length > 0) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<false>(resolve => {
        timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
        timer.unref?.();
      });
      const finished = await Promise.race([Promise.all(pending).then(() => true), timeout]);
      clearTimeout(timer);
      if (!finished) {
        return false;
      }
    }

    return this.options.handler.drain(Math.max(0, deadline - this.now()));
  }

  private isTaken(filePath: string) {
    return this.reservedPaths.has(filePath) || this.pathExists(filePath);
  }

  private async record(recording: RecordingSession): Promise<void> {
    const camera = this.options.camera;
    const streams = await this.resolveStreams(recording);
    const stillPath = recording.paths.still;

    if (this.aborted) {
      const at = this.now();
      recording.captures.push(
        unrunResult('video', 'aborted', recording.paths.video, at, 'Recording aborted')
      );
      if (stillPath) {
        recording.captures.push(unrunResult('still', 'aborted', stillPath, at, 'Recording aborted'));
      }
    } else if (!streams) {
      const at = this.now();
      recording.captures.push(
        unrunResult('video', 'skipped', recording.paths.video, at, 'Stream addresses unavailable')
      );
      if (stillPath) {
        recording.captures.push(
          unrunResult('still', 'skipped', stillPath, at, 'Stream addresses unavailable')
        );
      }
    } else {
      const videoSource =
        camera.videoStream === 'minor' && streams.minor ? streams.minor : streams.main;
      const durationSeconds = Math.max(1, Math.ceil((recording.deadline - this.now()) / 1000));

      let stillTask: Promise<CaptureResult> | null = null;
      if (stillPath && camera.stills === 'stream') {
        stillTask = this.options.capture.captureStill(streams.stills ?? streams.main, stillPath);
      }

      const video = await this.options.capture.captureVideo(
        videoSource,
        recording.paths.video,
        durationSeconds
      );
      recording.captures.push(video);
      this.emit('video-ended', { recording: { ...recording }, at: video.finishedAt });

      if (stillPath && camera.stills === 'video') {
        if (this.aborted) {
          stillTask = Promise.resolve(
            unrunResult('still', 'aborted', stillPath, this.now(), 'Recording aborted')
          );
        } else if (video.status === 'succeeded') {
          stillTask = this.options.capture.extractFrame(recording.paths.video, stillPath);
        } else {
          stillTask = Promise.resolve(
            unrunResult('still', 'skipped', stillPath, this.now(), 'No video to extract a frame from')
          );
        }
      }

      if (stillTask) {
        recording.captures.push(await stillTask);
      }
    }

    recording.status = recording.captures.every(result => result.status === 'succeeded')
      ? 'complete'
      : 'degraded';

    if (this.options.handler.configured) {
      recording.handler = await this.options.handler.invoke(recording.eventId);
    }

    this.options.logger?.info(
      {
        camera: camera.id,
        eventId: recording.eventId,
        status: recording.status,
        captures: recording.captures.map(result => `${result.kind}:${result.status}`)
      },
      'Recording finished'
    );
  }

  private async resolveStreams(recording: RecordingSession): Promise<StreamAddresses | null> {
    try {
      return await this.options.resolveStreams();
    } catch (error) {
      this.options.logger?.error(
        { camera: recording.cameraId, eventId: recording.eventId, err: error },
        'Failed to resolve stream addresses'
      );
      return null;
    }
  }
}
