import { EventEmitter } from 'node:events';
import onvif, { type Cam, type CamOptions } from 'onvif';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Camera } from '../config/index.js';
import type { Logger, StreamAddresses } from '../types.js';

const DEFAULT_RECONNECT_DELAY_MS = 5000;
const DEFAULT_RECONNECT_MAX_DELAY_MS = 60000;
const DEFAULT_RECONNECT_JITTER_FACTOR = 0.2;
const DEFAULT_TIMEOUT_MS = 15000;

export type OnvifCam = Pick<Cam, 'on' | 'removeAllListeners' | 'getStreamUri' | 'profiles'>;

export type CamFactory = (options: CamOptions) => Promise<OnvifCam>;

/** Anything that delivers raw notification payloads for one camera. */
export interface NotificationSource extends EventEmitter {
  start(): void;
  stop(): Promise<void>;
}

export type OnvifCameraClientOptions = {
  camera: Camera;
  reconnectDelayMs?: number;
  reconnectMaxDelayMs?: number;
  reconnectJitterFactor?: number;
  timeoutMs?: number;
  camFactory?: CamFactory;
  random?: () => number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type ReconnectMeta = {
  minDelayMs: number;
  maxDelayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
};

export type ReconnectEvent = {
  camera: string;
  reason: string;
  attempt: number;
  delayMs: number;
  meta: ReconnectMeta;
  error: string | null;
};

export const defaultCamFactory: CamFactory = options =>
  new Promise<OnvifCam>((resolve, reject) => {
    const cam = new onvif.Cam(options, error => {
      if (error) {
        reject(error);
        return;
      }
      resolve(cam);
    });
  });

/** Adds credentials to an RTSP address unless it already carries some. */
export function withCredentials(uri: string, username: string, password: string): string {
  if (!username) {
    return uri;
  }
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return uri;
  }
  if (url.username) {
    return uri;
  }
  url.username = username;
  url.password = password;
  return url.toString();
}

function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pull-point notification source and stream resolver for one ONVIF camera.
 * Connection failures and subscription errors are retried with exponential
 * backoff and jitter; they never reach the caller as exceptions.
 */
export class OnvifCameraClient extends EventEmitter implements NotificationSource {
  private cam: OnvifCam | null = null;
  private connecting: Promise<OnvifCam> | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private attempt = 0;
  private stopped = true;
  private generation = 0;

  private readonly metrics: MetricsRegistry;
  private readonly camFactory: CamFactory;

  constructor(private readonly options: OnvifCameraClientOptions) {
    super();
    this.metrics = options.metrics ?? defaultMetrics;
    this.camFactory = options.camFactory ?? defaultCamFactory;
  }

  get connected() {
    return this.cam !== null;
  }

  start() {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.attempt = 0;
    void this.subscribe();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.generation += 1;
    this.clearReconnectTimer();
    this.detach();
    this.connecting = null;
  }

  async resolveStreams(): Promise<StreamAddresses> {
    const camera = this.options.camera;
    const explicitMain = camera.urls.main;
    if (explicitMain) {
      return {
        main: withCredentials(explicitMain, camera.username, camera.password),
        minor: camera.urls.minor
          ? withCredentials(camera.urls.minor, camera.username, camera.password)
          : null,
        stills: camera.urls.stills
          ? withCredentials(camera.urls.stills, camera.username, camera.password)
          : null
      };
    }

    const cam = this.cam ?? (await this.connect());
    const main = await this.streamUri(cam, camera.streams.main);
    if (!main) {
      const available = (cam.profiles ?? []).map(profile => profile.name).join(', ');
      throw new Error(
        `Stream profile "${camera.streams.main}" not found on ${camera.id} (available: ${available || 'none'})`
      );
    }

    return {
      main,
      minor: camera.streams.minor ? await this.streamUri(cam, camera.streams.minor) : null,
      stills: camera.streams.stills ? await this.streamUri(cam, camera.streams.stills) : null
    };
  }

  private async streamUri(cam: OnvifCam, profileName: string): Promise<string | null> {
    const profile = (cam.profiles ?? []).find(candidate => candidate.name === profileName);
    if (!profile) {
      this.options.logger?.debug(
        { camera: this.options.camera.id, profile: profileName },
        'Stream profile not found'
      );
      return null;
    }

    const media = await new Promise<{ uri: string }>((resolve, reject) => {
      cam.getStreamUri({ protocol: 'RTSP', profileToken: profile.$.token }, (error, result) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(result);
      });
    });

    this.options.logger?.debug(
      { camera: this.options.camera.id, profile: profileName },
      'Resolved stream profile'
    );
    const camera = this.options.camera;
    return withCredentials(media.uri, camera.username, camera.password);
  }

  private connect(): Promise<OnvifCam> {
    if (this.connecting) {
      return this.connecting;
    }
    const camera = this.options.camera;
    const attempt = this.camFactory({
      hostname: camera.host,
      port: camera.onvifPort,
      username: camera.username,
      password: camera.password,
      timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    });
    this.connecting = attempt;
    const clear = () => {
      if (this.connecting === attempt) {
        this.connecting = null;
      }
    };
    void attempt.then(clear, clear);
    return attempt;
  }

  private async subscribe() {
    const generation = this.generation;
    let cam: OnvifCam;
    try {
      cam = await this.connect();
    } catch (error) {
      if (generation === this.generation && !this.stopped) {
        this.scheduleReconnect('connect-error', error);
      }
      return;
    }

    if (generation !== this.generation || this.stopped) {
      return;
    }

    this.cam = cam;
    cam.on('event', (message: unknown) => {
      if (this.cam !== cam) {
        return;
      }
      this.attempt = 0;
      this.emit('payload', message);
    });
    cam.on('eventsError', (error: unknown) => {
      if (this.cam !== cam || this.stopped) {
        return;
      }
      this.scheduleReconnect('events-error', error);
    });

    this.options.logger?.info(
      { camera: this.options.camera.id, host: this.options.camera.host },
      'Subscribed to camera events'
    );
    this.emit('connected');
  }

  private detach() {
    const cam = this.cam;
    this.cam = null;
    if (cam) {
      cam.removeAllListeners('event');
      cam.removeAllListeners('eventsError');
    }
  }

  private scheduleReconnect(reason: string, error: unknown) {
    this.detach();
    this.clearReconnectTimer();
    this.attempt += 1;
    const { delayMs, meta } = this.computeReconnectDelay(this.attempt);

    const event: ReconnectEvent = {
      camera: this.options.camera.id,
      reason,
      attempt: this.attempt,
      delayMs,
      meta,
      error: error === undefined ? null : describeError(error)
    };
    this.metrics.recordReconnect(this.options.camera.id, reason);
    this.options.logger?.warn({ ...event, err: error }, 'Camera connection lost, reconnecting');
    this.emit('reconnect', event);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.stopped) {
        return;
      }
      void this.subscribe();
    }, delayMs);
    this.reconnectTimer.unref?.();
  }

  private computeReconnectDelay(attempt: number): { delayMs: number; meta: ReconnectMeta } {
    const minDelayMs = Math.max(0, this.options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS);
    const maxDelayMs = Math.max(
      minDelayMs,
      this.options.reconnectMaxDelayMs ?? DEFAULT_RECONNECT_MAX_DELAY_MS
    );

    let baseDelayMs = minDelayMs;
    if (attempt > 1) {
      const exponential = minDelayMs * 2 ** (attempt - 1);
      baseDelayMs = Math.min(maxDelayMs, Math.max(minDelayMs, Math.round(exponential)));
    }

    const factor = Math.max(
      0,
      this.options.reconnectJitterFactor ?? DEFAULT_RECONNECT_JITTER_FACTOR
    );
    const random = this.options.random?.() ?? Math.random();
    const jitterRange = Math.round(baseDelayMs * factor);
    let appliedJitterMs = 0;
    if (jitterRange > 0) {
      appliedJitterMs = Math.round((random * 2 - 1) * jitterRange);
    }

    let delayMs = baseDelayMs + appliedJitterMs;
    if (delayMs > maxDelayMs) {
      delayMs = maxDelayMs;
    } else if (delayMs < minDelayMs) {
      delayMs = minDelayMs;
    }

    return {
      delayMs,
      meta: { minDelayMs, maxDelayMs, baseDelayMs, appliedJitterMs: delayMs - baseDelayMs }
    };
  }

  private clearReconnectTimer() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
