import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { canonicalCameraId, normalizeCameraId } from '../utils/cameraId.js';

export const WILDCARD_EVENT = '*';

export type NegationPolicy = 'terminal' | 'ignore';

export type TieBreakPolicy = 'first' | 'priority';

export type StillsPolicy = 'video' | 'stream' | 'none';

export type VideoStreamChoice = 'main' | 'minor';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type StorageConfig = {
  saveFolder?: string;
};

export type EventsConfig = {
  debounceSeconds?: number;
  negationPolicy?: NegationPolicy;
  tieBreak?: TieBreakPolicy;
};

export type CaptureConfig = {
  clipSeconds?: number;
  graceSeconds?: number;
  forceKillTimeoutMs?: number;
  rtspTransport?: string;
  stills?: StillsPolicy;
  ffmpegPath?: string;
  inputArgs?: string[];
};

export type OnvifConfig = {
  reconnectDelayMs?: number;
  reconnectMaxDelayMs?: number;
  reconnectJitterFactor?: number;
  timeoutMs?: number;
};

export type HandlerConfig = {
  timeoutMs?: number;
};

export type ShutdownConfig = {
  handlerGraceMs?: number;
};

export type StatusConfig = {
  file?: string;
  intervalMs?: number;
};

export type CameraStreamNames = {
  main?: string;
  minor?: string;
  stills?: string;
};

export type CameraCaptureConfig = {
  rtspTransport?: string;
  inputArgs?: string[];
  graceSeconds?: number;
  forceKillTimeoutMs?: number;
};

export type CameraConfig = {
  id?: string;
  model?: string;
  host: string;
  onvifPort?: number;
  username?: string;
  password?: string;
  streams?: CameraStreamNames;
  urls?: CameraStreamNames;
  videoStream?: VideoStreamChoice;
  targetEvents: string[];
  clipSeconds?: number;
  debounceSeconds?: number;
  stills?: StillsPolicy;
  negationPolicy?: NegationPolicy;
  tieBreak?: TieBreakPolicy;
  saveFolder?: string;
  handler?: string;
  capture?: CameraCaptureConfig;
  enabled?: boolean;
};

export type OnvifeyeConfig = {
  app?: AppConfig;
  logging?: LoggingConfig;
  storage?: StorageConfig;
  events?: EventsConfig;
  capture?: CaptureConfig;
  onvif?: OnvifConfig;
  handler?: HandlerConfig;
  shutdown?: ShutdownConfig;
  status?: StatusConfig;
  cameraDir?: string;
  cameras?: CameraConfig[];
};

export type Camera = Readonly<{
  id: string;
  model: string | null;
  host: string;
  onvifPort: number;
  username: string;
  password: string;
  streams: Readonly<{ main: string; minor: string | null; stills: string | null }>;
  urls: Readonly<{ main: string | null; minor: string | null; stills: string | null }>;
  videoStream: VideoStreamChoice;
  targetEvents: readonly string[];
  wildcard: boolean;
  clipSeconds: number;
  debounceSeconds: number;
  stills: StillsPolicy;
  negationPolicy: NegationPolicy;
  tieBreak: TieBreakPolicy;
  saveFolder: string;
  handler: string | null;
  capture: Readonly<{
    rtspTransport: string;
    inputArgs: readonly string[];
    graceSeconds: number;
    forceKillTimeoutMs: number;
  }>;
}>;

export const DEFAULTS = {
  saveFolder: '~/onvifeye',
  onvifPort: 2020,
  username: 'tapo-admin',
  mainStream: 'mainStream',
  stillsStream: 'jpegStream',
  clipSeconds: 30,
  debounceSeconds: 60,
  graceSeconds: 30,
  forceKillTimeoutMs: 3000,
  rtspTransport: 'tcp',
  stills: 'video',
  negationPolicy: 'terminal',
  tieBreak: 'first',
  reconnectDelayMs: 5000,
  reconnectMaxDelayMs: 60000,
  reconnectJitterFactor: 0.2,
  onvifTimeoutMs: 15000,
  handlerTimeoutMs: 5 * 60 * 1000,
  handlerGraceMs: 10000,
  statusFile: '~/onvifeye/status.json',
  statusIntervalMs: 5000
} as const;

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const streamNamesSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    main: { type: 'string' },
    minor: { type: 'string' },
    stills: { type: 'string' }
  }
};

const stringArraySchema: JsonSchema = {
  type: 'array',
  items: { type: 'string' }
};

const cameraConfigSchema: JsonSchema = {
  type: 'object',
  required: ['host', 'targetEvents'],
  additionalProperties: false,
  properties: {
    id: { type: 'string' },
    model: { type: 'string' },
    host: { type: 'string' },
    onvifPort: { type: 'number', minimum: 1, maximum: 65535 },
    username: { type: 'string' },
    password: { type: 'string' },
    streams: streamNamesSchema,
    urls: streamNamesSchema,
    videoStream: { type: 'string', enum: ['main', 'minor'] },
    targetEvents: stringArraySchema,
    clipSeconds: { type: 'number', minimum: 1 },
    debounceSeconds: { type: 'number', minimum: 1 },
    stills: { type: 'string', enum: ['video', 'stream', 'none'] },
    negationPolicy: { type: 'string', enum: ['terminal', 'ignore'] },
    tieBreak: { type: 'string', enum: ['first', 'priority'] },
    saveFolder: { type: 'string' },
    handler: { type: 'string' },
    enabled: { type: 'boolean' },
    capture: {
      type: 'object',
      additionalProperties: false,
      properties: {
        rtspTransport: { type: 'string' },
        inputArgs: stringArraySchema,
        graceSeconds: { type: 'number', minimum: 0 },
        forceKillTimeoutMs: { type: 'number', minimum: 0 }
      }
    }
  }
};

const onvifeyeConfigSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    storage: {
      type: 'object',
      additionalProperties: false,
      properties: {
        saveFolder: { type: 'string' }
      }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        debounceSeconds: { type: 'number', minimum: 1 },
        negationPolicy: { type: 'string', enum: ['terminal', 'ignore'] },
        tieBreak: { type: 'string', enum: ['first', 'priority'] }
      }
    },
    capture: {
      type: 'object',
      additionalProperties: false,
      properties: {
        clipSeconds: { type: 'number', minimum: 1 },
        graceSeconds: { type: 'number', minimum: 0 },
        forceKillTimeoutMs: { type: 'number', minimum: 0 },
        rtspTransport: { type: 'string' },
        stills: { type: 'string', enum: ['video', 'stream', 'none'] },
        ffmpegPath: { type: 'string' },
        inputArgs: stringArraySchema
      }
    },
    onvif: {
      type: 'object',
      additionalProperties: false,
      properties: {
        reconnectDelayMs: { type: 'number', minimum: 0 },
        reconnectMaxDelayMs: { type: 'number', minimum: 0 },
        reconnectJitterFactor: { type: 'number', minimum: 0, maximum: 1 },
        timeoutMs: { type: 'number', minimum: 0 }
      }
    },
    handler: {
      type: 'object',
      additionalProperties: false,
      properties: {
        timeoutMs: { type: 'number', minimum: 0 }
      }
    },
    shutdown: {
      type: 'object',
      additionalProperties: false,
      properties: {
        handlerGraceMs: { type: 'number', minimum: 0 }
      }
    },
    status: {
      type: 'object',
      additionalProperties: false,
      properties: {
        file: { type: 'string' },
        intervalMs: { type: 'number', minimum: 100 }
      }
    },
    cameraDir: { type: 'string' },
    cameras: {
      type: 'array',
      items: cameraConfigSchema
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isPlainObject(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, value[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is OnvifeyeConfig {
  const errors = validateAgainstSchema(onvifeyeConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as OnvifeyeConfig);
}

export function validateCameraConfig(
  camera: unknown,
  label = 'camera'
): asserts camera is CameraConfig {
  const errors = validateAgainstSchema(cameraConfigSchema, camera, label);
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  const messages: string[] = [];
  validateLogicalCamera(camera as CameraConfig, label, messages);
  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function validateLogicalCamera(camera: CameraConfig, label: string, messages: string[]) {
  if (camera.host.trim().length === 0 && !camera.urls?.main) {
    messages.push(`${label}.host must be a non-empty string unless urls.main is set`);
  }

  const targets = camera.targetEvents.map(event => event.trim()).filter(Boolean);
  if (targets.length === 0) {
    messages.push(`${label}.targetEvents must list at least one event name or "${WILDCARD_EVENT}"`);
  }
  if (targets.some(event => event.endsWith(NEGATED_SUFFIX))) {
    messages.push(`${label}.targetEvents must not contain negated event names (*${NEGATED_SUFFIX})`);
  }

  if (camera.videoStream === 'minor' && !camera.streams?.minor && !camera.urls?.minor) {
    messages.push(`${label}.videoStream "minor" requires streams.minor or urls.minor`);
  }

  if (typeof camera.clipSeconds === 'number' && !Number.isInteger(camera.clipSeconds)) {
    messages.push(`${label}.clipSeconds must be an integer`);
  }
}

function validateLogicalConfig(config: OnvifeyeConfig) {
  const messages: string[] = [];
  const cameraIds = new Map<string, string>();

  (config.cameras ?? []).forEach((camera, index) => {
    const label = `config.cameras[${index}]`;
    validateLogicalCamera(camera, label, messages);

    const normalized = canonicalCameraId(camera.id?.trim() || camera.host);
    const existing = cameraIds.get(normalized);
    if (existing) {
      messages.push(`${label} duplicates camera id "${normalized}" already used by ${existing}`);
    } else {
      cameraIds.set(normalized, label);
    }
  });

  const onvif = config.onvif;
  if (
    typeof onvif?.reconnectDelayMs === 'number' &&
    typeof onvif.reconnectMaxDelayMs === 'number' &&
    onvif.reconnectMaxDelayMs < onvif.reconnectDelayMs
  ) {
    messages.push('config.onvif.reconnectMaxDelayMs must be >= reconnectDelayMs');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export const NEGATED_SUFFIX = '_False';

export function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

export function parseConfig(contents: string): OnvifeyeConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): OnvifeyeConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads one camera per `*.json` or `*.conf` file. A missing directory yields
 * no cameras; a malformed file is an error naming the file.
 */
export function loadCameraDirectory(directory: string): CameraConfig[] {
  const resolved = path.resolve(expandHome(directory));
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    return [];
  }

  const files = fs
    .readdirSync(resolved)
    .filter(name => name.endsWith('.json') || name.endsWith('.conf'))
    .sort();

  return files.map(name => {
    const filePath = path.join(resolved, name);
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse camera file ${filePath}: ${message}`);
    }
    validateCameraConfig(parsed, filePath);
    return parsed;
  });
}

function emptyToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function resolveCamera(camera: CameraConfig, config: OnvifeyeConfig = {}): Camera {
  const targets = Array.from(
    new Set(camera.targetEvents.map(event => event.trim()).filter(Boolean))
  );
  const capture = config.capture ?? {};
  const events = config.events ?? {};

  return Object.freeze({
    id: normalizeCameraId(emptyToNull(camera.id) ?? camera.host),
    model: emptyToNull(camera.model),
    host: camera.host.trim(),
    onvifPort: camera.onvifPort ?? DEFAULTS.onvifPort,
    username: camera.username ?? DEFAULTS.username,
    password: camera.password ?? '',
    streams: Object.freeze({
      main: emptyToNull(camera.streams?.main) ?? DEFAULTS.mainStream,
      minor: emptyToNull(camera.streams?.minor),
      stills: emptyToNull(camera.streams?.stills) ?? DEFAULTS.stillsStream
    }),
    urls: Object.freeze({
      main: emptyToNull(camera.urls?.main),
      minor: emptyToNull(camera.urls?.minor),
      stills: emptyToNull(camera.urls?.stills)
    }),
    videoStream: camera.videoStream ?? 'main',
    targetEvents: Object.freeze(targets.filter(event => event !== WILDCARD_EVENT)),
    wildcard: targets.includes(WILDCARD_EVENT),
    clipSeconds: camera.clipSeconds ?? capture.clipSeconds ?? DEFAULTS.clipSeconds,
    debounceSeconds: camera.debounceSeconds ?? events.debounceSeconds ?? DEFAULTS.debounceSeconds,
    stills: camera.stills ?? capture.stills ?? DEFAULTS.stills,
    negationPolicy: camera.negationPolicy ?? events.negationPolicy ?? DEFAULTS.negationPolicy,
    tieBreak: camera.tieBreak ?? events.tieBreak ?? DEFAULTS.tieBreak,
    saveFolder: path.resolve(
      expandHome(camera.saveFolder ?? config.storage?.saveFolder ?? DEFAULTS.saveFolder)
    ),
    handler: emptyToNull(camera.handler) ? path.resolve(expandHome(camera.handler ?? '')) : null,
    capture: Object.freeze({
      rtspTransport:
        camera.capture?.rtspTransport ?? capture.rtspTransport ?? DEFAULTS.rtspTransport,
      inputArgs: Object.freeze([...(capture.inputArgs ?? []), ...(camera.capture?.inputArgs ?? [])]),
      graceSeconds: camera.capture?.graceSeconds ?? capture.graceSeconds ?? DEFAULTS.graceSeconds,
      forceKillTimeoutMs:
        camera.capture?.forceKillTimeoutMs ??
        capture.forceKillTimeoutMs ??
        DEFAULTS.forceKillTimeoutMs
    })
  });
}

export function createStarterCamera(overrides: Partial<CameraConfig> = {}): CameraConfig {
  return {
    id: '',
    model: '',
    host: '',
    onvifPort: DEFAULTS.onvifPort,
    username: DEFAULTS.username,
    password: '',
    streams: { main: DEFAULTS.mainStream, stills: DEFAULTS.stillsStream },
    targetEvents: ['IsPeople', 'IsCar'],
    clipSeconds: DEFAULTS.clipSeconds,
    stills: DEFAULTS.stills,
    saveFolder: DEFAULTS.saveFolder,
    handler: '',
    ...overrides
  };
}

export type CameraOverrides = Partial<Omit<CameraConfig, 'streams' | 'urls' | 'capture'>> & {
  streams?: CameraStreamNames;
};

/**
 * Layers command-line values over one camera file. Stream names merge key by
 * key, so overriding the main stream keeps the configured stills stream.
 */
export function applyCameraOverrides(
  camera: CameraConfig,
  overrides: CameraOverrides
): CameraConfig {
  const { streams, ...rest } = overrides;
  const merged: CameraConfig = { ...camera, ...rest };
  if (streams) {
    merged.streams = { ...camera.streams, ...streams };
  }
  return merged;
}

export type ConfigManagerOptions = {
  cameraOverrides?: CameraOverrides;
};

export class ConfigManager {
  private readonly currentConfig: OnvifeyeConfig;
  private readonly filePath: string;

  constructor(
    filePath = path.resolve(process.cwd(), 'config/default.json'),
    private readonly options: ConfigManagerOptions = {}
  ) {
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): OnvifeyeConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  /** Inline cameras first, then the camera directory; disabled cameras are left out. */
  getCameras(): Camera[] {
    const inline = this.currentConfig.cameras ?? [];
    const fromDirectory = this.currentConfig.cameraDir
      ? loadCameraDirectory(this.currentConfig.cameraDir)
      : [];
    const overrides = this.options.cameraOverrides;
    const cameras = [...inline, ...fromDirectory]
      .map((camera, index) => {
        if (!overrides || Object.keys(overrides).length === 0) {
          return camera;
        }
        const merged = applyCameraOverrides(camera, overrides);
        validateCameraConfig(merged, `overrides for cameras[${index}]`);
        return merged;
      })
      .filter(camera => camera.enabled !== false)
      .map(camera => resolveCamera(camera, this.currentConfig));

    const seen = new Set<string>();
    for (const camera of cameras) {
      const key = canonicalCameraId(camera.id);
      if (seen.has(key)) {
        throw new Error(`Camera id "${camera.id}" is configured more than once`);
      }
      seen.add(key);
    }
    return cameras;
  }
}

export { onvifeyeConfigSchema, cameraConfigSchema };
