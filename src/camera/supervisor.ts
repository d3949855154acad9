import { EventEmitter } from 'node:events';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Camera } from '../config/index.js';
import { EventCorrelator, VIDEO_ENDED_EVENT, type SessionEndEvent } from '../events/correlator.js';
import { NotificationNormalizer } from '../events/normalizer.js';
import type { NotificationSource } from '../onvif/source.js';
import { CaptureSupervisor } from '../recording/capture.js';
import { ExternalHandler } from '../recording/handler.js';
import {
  RecordingSessionManager,
  type CaptureRunner,
  type HandlerRunner,
  type VideoEndedEvent
} from '../recording/sessionManager.js';
import type {
  EventSession,
  Logger,
  Notification,
  RecordingSession,
  StreamAddresses
} from '../types.js';

export type CameraSupervisorState =
  | 'idle'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed';

export type CameraSupervisorOptions = {
  camera: Camera;
  source: NotificationSource;
  resolveStreams: () => Promise<StreamAddresses>;
  capture?: CaptureRunner;
  handler?: HandlerRunner & Pick<ExternalHandler, 'verify' | 'pending'>;
  handlerTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type CameraStatus = {
  id: string;
  state: CameraSupervisorState;
  activeSession: EventSession | null;
  activeRecordings: number;
  error: string | null;
};

export type StopResult = {
  camera: string;
  drained: boolean;
  pendingRecordings: RecordingSession[];
};

/**
 * Owns one camera's pipeline: notification source, normalizer, correlator
 * and recording sessions. A fault in any of them moves this supervisor to
 * `failed` without touching other cameras.
 */
export class CameraSupervisor extends EventEmitter {
  readonly correlator: EventCorrelator;
  readonly sessions: RecordingSessionManager;
  private readonly normalizer: NotificationNormalizer;
  private readonly handler: HandlerRunner & Pick<ExternalHandler, 'verify' | 'pending'>;
  private readonly capture: CaptureRunner;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private state: CameraSupervisorState = 'idle';
  private lastError: string | null = null;
  private readonly onPayload = (payload: unknown) => this.handlePayload(payload);
  private readonly onSourceError = (error: unknown) => {
    this.options.logger?.warn({ camera: this.camera.id, err: error }, 'Notification source error');
  };

  constructor(private readonly options: CameraSupervisorOptions) {
    super();
    const camera = options.camera;
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => Date.now());

    this.normalizer = new NotificationNormalizer({
      cameraId: camera.id,
      model: camera.model,
      logger: options.logger,
      metrics: this.metrics,
      now: this.now
    });

    this.correlator = new EventCorrelator({
      cameraId: camera.id,
      targetEvents: camera.targetEvents,
      wildcard: camera.wildcard,
      debounceMs: camera.debounceSeconds * 1000,
      negationPolicy: camera.negationPolicy,
      tieBreak: camera.tieBreak,
      logger: options.logger,
      metrics: this.metrics,
      now: this.now
    });

    this.capture =
      options.capture ??
      new CaptureSupervisor({
        cameraId: camera.id,
        graceSeconds: camera.capture.graceSeconds,
        forceKillTimeoutMs: camera.capture.forceKillTimeoutMs,
        rtspTransport: camera.capture.rtspTransport,
        inputArgs: camera.capture.inputArgs,
        logger: options.logger,
        metrics: this.metrics,
        now: this.now
      });

    this.handler =
      options.handler ??
      new ExternalHandler({
        path: camera.handler,
        cameraId: camera.id,
        timeoutMs: options.handlerTimeoutMs,
        logger: options.logger,
        metrics: this.metrics
      });

    this.sessions = new RecordingSessionManager({
      camera,
      capture: this.capture,
      handler: this.handler,
      resolveStreams: options.resolveStreams,
      logger: options.logger,
      metrics: this.metrics,
      now: this.now
    });

    this.correlator.on('session-start', (session: EventSession) => {
      this.guard('session-start', () => {
        this.sessions.begin(session);
      });
    });
    this.correlator.on('session-end', (event: SessionEndEvent) => {
      this.emit('session-end', event);
    });
    this.correlator.on('synthetic', (notification: Notification) => {
      this.guard('synthetic', () => {
        this.sessions.handleSynthetic(notification);
      });
    });
    this.sessions.on('video-ended', (event: VideoEndedEvent) => {
      this.correlator.ingest({
        kind: 'assert',
        cameraId: camera.id,
        eventName: VIDEO_ENDED_EVENT,
        observedAt: event.at,
        synthetic: true
      });
    });
    this.sessions.on('complete', (recording: RecordingSession) => {
      this.emit('recording', recording);
    });
  }

  get camera(): Camera {
    return this.options.camera;
  }

  status(): CameraStatus {
    return {
      id: this.camera.id,
      state: this.state,
      activeSession: this.correlator.getActiveSession(),
      activeRecordings: this.sessions.active().length,
      error: this.lastError
    };
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      return;
    }
    await this.handler.verify();
    this.state = 'running';
    this.options.source.on('payload', this.onPayload);
    this.options.source.on('error', this.onSourceError);
    this.guard('source-start', () => {
      this.options.source.start();
    });
    if (this.state === 'running') {
      this.options.logger?.info(
        {
          camera: this.camera.id,
          host: this.camera.host,
          targets: this.camera.wildcard ? ['*'] : [...this.camera.targetEvents],
          model: this.normalizer.profileName
        },
        'Camera supervisor started'
      );
    }
  }

  async stop(graceMs = 0): Promise<StopResult> {
    const wasFailed = this.state === 'failed';
    if (!wasFailed) {
      this.state = 'stopping';
    }

    await this.stopSource();
    this.correlator.stop();
    await this.sessions.abort();
    const drained = await this.sessions.drain(graceMs);
    const pendingRecordings = this.sessions.active();

    if (!drained) {
      this.options.logger?.warn(
        {
          camera: this.camera.id,
          pending: pendingRecordings.map(recording => recording.eventId),
          handlerRuns: this.handler.pending
        },
        'Shutdown grace elapsed with work still in flight'
      );
    }

    if (!wasFailed) {
      this.state = 'stopped';
    }
    return { camera: this.camera.id, drained, pendingRecordings };
  }

  private handlePayload(payload: unknown) {
    if (this.state !== 'running') {
      return;
    }
    this.guard('payload', () => {
      const notifications = this.normalizer.normalize(payload);
      if (notifications.length > 0) {
        this.correlator.ingestBatch(notifications);
      }
    });
  }

  private guard(stage: string, fn: () => void) {
    try {
      fn();
    } catch (error) {
      this.fail(stage, error);
    }
  }

  private fail(stage: string, error: unknown) {
    if (this.state === 'failed') {
      return;
    }
    this.state = 'failed';
    this.lastError = error instanceof Error ? error.message : String(error);
    this.options.logger?.error({ camera: this.camera.id, stage, err: error }, 'Camera supervisor failed');
    this.correlator.stop();
    this.stopSource().catch(stopError => {
      this.options.logger?.debug(
        { camera: this.camera.id, err: stopError },
        'Failed to stop notification source'
      );
    });
    this.emit('failed', { camera: this.camera.id, stage, error: this.lastError });
  }

  private async stopSource() {
    this.options.source.off('payload', this.onPayload);
    this.options.source.off('error', this.onSourceError);
    await this.options.source.stop();
  }
}
