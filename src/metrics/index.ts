import { performance } from 'node:perf_hooks';
import type {
  CaptureResult,
  HandlerStatus,
  Notification,
  RecordingStatus,
  SessionEndReason
} from '../types.js';

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type CameraCounters = {
  notifications: number;
  droppedItems: number;
  sessionsStarted: number;
  sessionsEnded: number;
  recordings: number;
  degradedRecordings: number;
  reconnects: number;
  lastNotificationAt: number | null;
  lastSessionAt: number | null;
};

export type CameraMetricsSnapshot = CameraCounters;

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: Record<string, number>;
    byCamera: Record<string, Record<string, number>>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  notifications: {
    total: number;
    synthetic: number;
    byEvent: Record<string, number>;
    droppedItems: number;
  };
  sessions: {
    started: number;
    ended: number;
    endedByReason: Record<string, number>;
    active: number;
  };
  recordings: {
    total: number;
    byStatus: Record<string, number>;
  };
  captures: {
    total: number;
    byKind: Record<string, Record<string, number>>;
  };
  handlers: {
    total: number;
    byStatus: Record<string, number>;
  };
  sources: {
    reconnects: number;
    byReason: Record<string, number>;
  };
  cameras: Record<string, CameraMetricsSnapshot>;
  latencies: Record<string, LatencyStats & { avgMs: number }>;
};

function createCameraCounters(): CameraCounters {
  return {
    notifications: 0,
    droppedItems: 0,
    sessionsStarted: 0,
    sessionsEnded: 0,
    recordings: 0,
    degradedRecordings: 0,
    reconnects: 0,
    lastNotificationAt: null,
    lastSessionAt: null
  };
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function mapToRecord(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries(Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByCamera = new Map<string, Map<string, number>>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private notificationTotal = 0;
  private syntheticNotifications = 0;
  private readonly notificationsByEvent = new Map<string, number>();
  private droppedItems = 0;
  private sessionsStarted = 0;
  private sessionsEnded = 0;
  private readonly sessionEndReasons = new Map<string, number>();
  private recordingTotal = 0;
  private readonly recordingsByStatus = new Map<string, number>();
  private captureTotal = 0;
  private readonly capturesByKind = new Map<string, Map<string, number>>();
  private handlerTotal = 0;
  private readonly handlersByStatus = new Map<string, number>();
  private reconnectTotal = 0;
  private readonly reconnectReasons = new Map<string, number>();
  private readonly cameras = new Map<string, CameraCounters>();
  private readonly latencyStats = new Map<string, LatencyStats>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByCamera.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.notificationTotal = 0;
    this.syntheticNotifications = 0;
    this.notificationsByEvent.clear();
    this.droppedItems = 0;
    this.sessionsStarted = 0;
    this.sessionsEnded = 0;
    this.sessionEndReasons.clear();
    this.recordingTotal = 0;
    this.recordingsByStatus.clear();
    this.captureTotal = 0;
    this.capturesByKind.clear();
    this.handlerTotal = 0;
    this.handlersByStatus.clear();
    this.reconnectTotal = 0;
    this.reconnectReasons.clear();
    this.cameras.clear();
    this.latencyStats.clear();
  }

  private camera(cameraId: string) {
    let counters = this.cameras.get(cameraId);
    if (!counters) {
      counters = createCameraCounters();
      this.cameras.set(cameraId, counters);
    }
    return counters;
  }

  incrementLogLevel(level: string, context?: { message?: string; camera?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (context?.camera) {
      const byLevel = this.logLevelByCamera.get(context.camera) ?? new Map<string, number>();
      increment(byLevel, normalized);
      this.logLevelByCamera.set(context.camera, byLevel);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordNotification(notification: Notification) {
    this.notificationTotal += 1;
    if (notification.synthetic) {
      this.syntheticNotifications += 1;
    }
    const key = notification.kind === 'assert' ? notification.eventName : `${notification.eventName}_False`;
    increment(this.notificationsByEvent, key);
    const camera = this.camera(notification.cameraId);
    camera.notifications += 1;
    camera.lastNotificationAt = notification.observedAt;
  }

  recordDroppedItem(cameraId: string) {
    this.droppedItems += 1;
    this.camera(cameraId).droppedItems += 1;
  }

  recordSessionStart(cameraId: string, at: number) {
    this.sessionsStarted += 1;
    const camera = this.camera(cameraId);
    camera.sessionsStarted += 1;
    camera.lastSessionAt = at;
  }

  recordSessionEnd(cameraId: string, reason: SessionEndReason) {
    this.sessionsEnded += 1;
    increment(this.sessionEndReasons, reason);
    this.camera(cameraId).sessionsEnded += 1;
  }

  recordRecording(cameraId: string, status: RecordingStatus) {
    this.recordingTotal += 1;
    increment(this.recordingsByStatus, status);
    const camera = this.camera(cameraId);
    camera.recordings += 1;
    if (status === 'degraded') {
      camera.degradedRecordings += 1;
    }
  }

  recordCapture(result: Pick<CaptureResult, 'kind' | 'status' | 'startedAt' | 'finishedAt'>) {
    this.captureTotal += 1;
    const byStatus = this.capturesByKind.get(result.kind) ?? new Map<string, number>();
    increment(byStatus, result.status);
    this.capturesByKind.set(result.kind, byStatus);
    this.observeLatency(`capture.${result.kind}.ms`, Math.max(0, result.finishedAt - result.startedAt));
  }

  recordHandler(status: HandlerStatus) {
    this.handlerTotal += 1;
    increment(this.handlersByStatus, status);
  }

  recordReconnect(cameraId: string, reason: string) {
    this.reconnectTotal += 1;
    increment(this.reconnectReasons, reason);
    this.camera(cameraId).reconnects += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const stats = this.latencyStats.get(metric);
    if (!stats) {
      this.latencyStats.set(metric, {
        count: 1,
        totalMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs
      });
      return;
    }
    stats.count += 1;
    stats.totalMs += durationMs;
    stats.minMs = Math.min(stats.minMs, durationMs);
    stats.maxMs = Math.max(stats.maxMs, durationMs);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const byCamera: Record<string, Record<string, number>> = {};
    for (const [camera, levels] of this.logLevelByCamera) {
      byCamera[camera] = mapToRecord(levels);
    }

    const byKind: Record<string, Record<string, number>> = {};
    for (const [kind, statuses] of this.capturesByKind) {
      byKind[kind] = mapToRecord(statuses);
    }

    const cameras: Record<string, CameraMetricsSnapshot> = {};
    for (const [cameraId, counters] of this.cameras) {
      cameras[cameraId] = { ...counters };
    }

    const latencies: MetricsSnapshot['latencies'] = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        ...stats,
        avgMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapToRecord(this.logLevelCounters),
        byCamera,
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      notifications: {
        total: this.notificationTotal,
        synthetic: this.syntheticNotifications,
        byEvent: mapToRecord(this.notificationsByEvent),
        droppedItems: this.droppedItems
      },
      sessions: {
        started: this.sessionsStarted,
        ended: this.sessionsEnded,
        endedByReason: mapToRecord(this.sessionEndReasons),
        active: this.sessionsStarted - this.sessionsEnded
      },
      recordings: {
        total: this.recordingTotal,
        byStatus: mapToRecord(this.recordingsByStatus)
      },
      captures: {
        total: this.captureTotal,
        byKind
      },
      handlers: {
        total: this.handlerTotal,
        byStatus: mapToRecord(this.handlersByStatus)
      },
      sources: {
        reconnects: this.reconnectTotal,
        byReason: mapToRecord(this.reconnectReasons)
      },
      cameras,
      latencies
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
