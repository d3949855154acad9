import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Logger, Notification } from '../types.js';
import { cleanTopic, findModelProfile, resolveEventName, type ModelProfile } from './cameraModels.js';

export type NormalizerOptions = {
  cameraId: string;
  model?: string | null;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

type DataItem = {
  name: string;
  value: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined || value === null ? [] : [value];
}

export function parseBooleanValue(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return null;
}

function extractTopic(payload: Record<string, unknown>): string | null {
  const topic = payload.topic;
  if (typeof topic === 'string') {
    return cleanTopic(topic);
  }
  if (isRecord(topic) && typeof topic._ === 'string') {
    return cleanTopic(topic._);
  }
  return null;
}

/**
 * Finds the `data` element of a notification message. The `onvif` client
 * nests it as `message.message.data`; hand-built payloads may put it higher.
 */
function extractData(payload: Record<string, unknown>): Record<string, unknown> | null {
  let cursor: unknown = payload;
  for (let depth = 0; depth < 3 && isRecord(cursor); depth += 1) {
    if (isRecord(cursor.data)) {
      return cursor.data;
    }
    cursor = cursor.message;
  }
  return null;
}

function readItem(raw: unknown): DataItem | null {
  if (!isRecord(raw)) {
    return null;
  }
  const attributes = isRecord(raw.$) ? raw.$ : raw;
  const name = attributes.Name ?? attributes.name;
  if (typeof name !== 'string' || name.trim().length === 0) {
    return null;
  }
  return { name: name.trim(), value: attributes.Value ?? attributes.value };
}

export class NotificationNormalizer {
  private readonly profile: ModelProfile;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(private readonly options: NormalizerOptions) {
    this.profile = findModelProfile(options.model);
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => Date.now());
  }

  get profileName() {
    return this.profile.name;
  }

  normalize(payload: unknown): Notification[] {
    if (!isRecord(payload)) {
      this.drop('payload is not an object', { payloadType: typeof payload });
      return [];
    }

    const data = extractData(payload);
    if (!data) {
      this.drop('payload has no data element', { topic: extractTopic(payload) });
      return [];
    }

    const topic = extractTopic(payload);
    const rawItems = toArray(data.simpleItem ?? data.SimpleItem);
    if (rawItems.length === 0) {
      this.drop('payload has no data items', { topic });
      return [];
    }

    const observedAt = this.now();
    const notifications: Notification[] = [];

    for (const rawItem of rawItems) {
      const item = readItem(rawItem);
      if (!item) {
        this.drop('data item has no name', { topic });
        continue;
      }

      const asserted = parseBooleanValue(item.value);
      if (asserted === null) {
        this.drop('data item value is not boolean', {
          topic,
          item: item.name,
          value: item.value
        });
        continue;
      }

      notifications.push({
        kind: asserted ? 'assert' : 'negate',
        cameraId: this.options.cameraId,
        eventName: resolveEventName(this.profile, item.name, topic),
        observedAt
      });
    }

    return notifications;
  }

  private drop(reason: string, details: Record<string, unknown>) {
    this.metrics.recordDroppedItem(this.options.cameraId);
    this.options.logger?.debug(
      { camera: this.options.cameraId, model: this.profile.name, ...details },
      `Dropped notification item: ${reason}`
    );
  }
}
