import { EventEmitter } from 'node:events';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type {
  EventSession,
  Logger,
  Notification,
  SessionEndReason
} from '../types.js';
import type { NegationPolicy, TieBreakPolicy } from '../config/index.js';

export const VIDEO_ENDED_EVENT = 'VideoEnded';

export type EventCorrelatorOptions = {
  cameraId: string;
  targetEvents: readonly string[];
  wildcard?: boolean;
  debounceMs: number;
  negationPolicy?: NegationPolicy;
  tieBreak?: TieBreakPolicy;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type SessionEndEvent = {
  session: EventSession;
  reason: SessionEndReason;
  at: number;
};

/**
 * Groups a camera's notifications into non-overlapping event sessions.
 *
 * Idle until an asserting notification for a targeted event arrives; the
 * session then lasts until `debounceMs` pass without another assertion of the
 * same event, or (under the `terminal` negation policy) until that event is
 * negated. Other events seen while a session is active are ignored.
 */
export class EventCorrelator extends EventEmitter {
  private active: EventSession | null = null;
  private expiryTimer: NodeJS.Timeout | null = null;
  private sequence = 0;
  private stopped = false;
  private readonly targetPriority = new Map<string, number>();
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(private readonly options: EventCorrelatorOptions) {
    super();
    options.targetEvents.forEach((name, index) => {
      if (!this.targetPriority.has(name)) {
        this.targetPriority.set(name, index);
      }
    });
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => Date.now());
  }

  getActiveSession(): EventSession | null {
    return this.active ? { ...this.active } : null;
  }

  isTargeted(eventName: string): boolean {
    if (eventName === VIDEO_ENDED_EVENT) {
      return false;
    }
    return this.options.wildcard === true || this.targetPriority.has(eventName);
  }

  ingest(notification: Notification) {
    if (this.stopped) {
      return;
    }

    this.metrics.recordNotification(notification);

    if (notification.eventName === VIDEO_ENDED_EVENT) {
      this.emit('synthetic', notification);
      return;
    }

    if (notification.kind === 'assert') {
      this.handleAssert(notification);
    } else {
      this.handleNegate(notification);
    }
  }

  /**
   * Ingests notifications that arrived together. Under the `priority`
   * tie-break the highest-ranked targeted assertion is moved ahead of the
   * other assertions, so it is the one that opens a session.
   */
  ingestBatch(notifications: readonly Notification[]) {
    for (const notification of this.orderBatch(notifications)) {
      this.ingest(notification);
    }
  }

  stop() {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.active) {
      this.close('shutdown', this.now());
    }
    this.clearExpiryTimer();
  }

  private orderBatch(notifications: readonly Notification[]): readonly Notification[] {
    if (this.options.tieBreak !== 'priority' || this.active || notifications.length < 2) {
      return notifications;
    }

    let firstIndex = -1;
    let bestIndex = -1;
    let bestRank = Number.POSITIVE_INFINITY;

    notifications.forEach((notification, index) => {
      if (notification.kind !== 'assert' || !this.isTargeted(notification.eventName)) {
        return;
      }
      if (firstIndex === -1) {
        firstIndex = index;
      }
      const rank = this.targetPriority.get(notification.eventName) ?? Number.POSITIVE_INFINITY;
      if (bestIndex === -1 || rank < bestRank) {
        bestIndex = index;
        bestRank = rank;
      }
    });

    if (bestIndex <= firstIndex) {
      return notifications;
    }

    const ordered = notifications.filter((_, index) => index !== bestIndex);
    ordered.splice(firstIndex, 0, notifications[bestIndex]);
    return ordered;
  }

  private handleAssert(notification: Notification) {
    const session = this.active;
    if (session) {
      if (session.eventName === notification.eventName) {
        session.lastSeenAt = Math.max(session.lastSeenAt, notification.observedAt);
        this.armExpiryTimer();
      }
      return;
    }

    if (!this.isTargeted(notification.eventName)) {
      return;
    }

    this.sequence += 1;
    const started: EventSession = {
      id: `${this.options.cameraId}#${this.sequence}`,
      cameraId: this.options.cameraId,
      eventName: notification.eventName,
      startedAt: notification.observedAt,
      lastSeenAt: notification.observedAt,
      state: 'active'
    };
    this.active = started;
    this.metrics.recordSessionStart(started.cameraId, started.startedAt);
    this.options.logger?.info(
      { camera: started.cameraId, event: started.eventName, session: started.id },
      'Event session started'
    );
    this.armExpiryTimer();
    this.emit('session-start', { ...started });
  }

  private handleNegate(notification: Notification) {
    const session = this.active;
    if (!session || session.eventName !== notification.eventName) {
      return;
    }
    if ((this.options.negationPolicy ?? 'terminal') !== 'terminal') {
      return;
    }
    this.close('negated', notification.observedAt);
  }

  private armExpiryTimer() {
    this.clearExpiryTimer();
    const session = this.active;
    if (!session) {
      return;
    }
    const delay = Math.max(0, session.lastSeenAt + this.options.debounceMs - this.now());
    this.expiryTimer = setTimeout(() => {
      this.expiryTimer = null;
      this.onExpiryTimer();
    }, delay);
    this.expiryTimer.unref?.();
  }

  private onExpiryTimer() {
    const session = this.active;
    if (!session) {
      return;
    }
    const expiresAt = session.lastSeenAt + this.options.debounceMs;
    if (this.now() < expiresAt) {
      this.armExpiryTimer();
      return;
    }
    this.close('expired', this.now());
  }

  private close(reason: SessionEndReason, at: number) {
    const session = this.active;
    if (!session) {
      return;
    }
    this.clearExpiryTimer();
    this.active = null;
    session.state = 'closed';
    this.metrics.recordSessionEnd(session.cameraId, reason);
    this.options.logger?.info(
      {
        camera: session.cameraId,
        event: session.eventName,
        session: session.id,
        reason,
        durationMs: Math.max(0, at - session.startedAt)
      },
      'Event session ended'
    );
    this.emit('session-end', { session: { ...session }, reason, at });
  }

  private clearExpiryTimer() {
    if (this.expiryTimer) {
      clearTimeout(this.expiryTimer);
      this.expiryTimer = null;
    }
  }
}
