import loggerModule, { setLogLevel } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { registerHealthIndicator, registerShutdownHook, type HealthStatus } from './app.js';
import {
  ConfigManager,
  DEFAULTS,
  type Camera,
  type OnvifeyeConfig
} from './config/index.js';
import {
  CameraSupervisor,
  type CameraSupervisorState,
  type StopResult
} from './camera/supervisor.js';
import { OnvifCameraClient, type NotificationSource } from './onvif/source.js';
import { configureFfmpegPath } from './recording/capture.js';
import type { Logger, StreamAddresses } from './types.js';

export type CameraClient = NotificationSource & {
  resolveStreams: () => Promise<StreamAddresses>;
};

export type ClientFactory = (camera: Camera, config: OnvifeyeConfig, logger: Logger) => CameraClient;

export interface EyeStartOptions {
  config?: OnvifeyeConfig;
  cameras?: Camera[];
  configManager?: ConfigManager;
  logger?: Logger;
  metrics?: MetricsRegistry;
  clientFactory?: ClientFactory;
  registerLifecycle?: boolean;
  /** Takes precedence over `logging.level` from the configuration. */
  logLevel?: string;
}

export type EyeRuntime = {
  supervisors: Map<string, CameraSupervisor>;
  stop: () => Promise<StopResult[]>;
};

const HEALTH_BY_STATE: Record<CameraSupervisorState, HealthStatus> = {
  idle: 'starting',
  running: 'ok',
  stopping: 'stopping',
  stopped: 'stopping',
  failed: 'degraded'
};

export const defaultClientFactory: ClientFactory = (camera, config, logger) =>
  new OnvifCameraClient({
    camera,
    reconnectDelayMs: config.onvif?.reconnectDelayMs ?? DEFAULTS.reconnectDelayMs,
    reconnectMaxDelayMs: config.onvif?.reconnectMaxDelayMs ?? DEFAULTS.reconnectMaxDelayMs,
    reconnectJitterFactor: config.onvif?.reconnectJitterFactor ?? DEFAULTS.reconnectJitterFactor,
    timeoutMs: config.onvif?.timeoutMs ?? DEFAULTS.onvifTimeoutMs,
    logger
  });

let defaultManager: ConfigManager | null = null;

function resolveManager(options: EyeStartOptions) {
  if (options.configManager) {
    return options.configManager;
  }
  if (!defaultManager) {
    defaultManager = new ConfigManager(process.env.ONVIFEYE_CONFIG ?? 'config/default.json');
  }
  return defaultManager;
}

/**
 * Starts one supervisor per configured camera. A camera that fails to start
 * is logged and left in `failed`; the rest keep running.
 */
export async function startEye(options: EyeStartOptions = {}): Promise<EyeRuntime> {
  const logger: Logger = options.logger ?? loggerModule;
  const registry = options.metrics ?? metrics;
  const manager = options.config && options.cameras ? null : resolveManager(options);
  const config = options.config ?? manager?.getConfig() ?? {};
  const cameras = options.cameras ?? manager?.getCameras() ?? [];
  const clientFactory = options.clientFactory ?? defaultClientFactory;

  if (cameras.length === 0) {
    throw new Error('No cameras configured');
  }

  const level = options.logLevel ?? config.logging?.level;
  if (level && !options.logger) {
    try {
      setLogLevel(level);
    } catch (error) {
      logger.warn({ err: error, level }, 'Failed to apply configured log level');
    }
  }

  configureFfmpegPath(config.capture?.ffmpegPath);

  const graceMs = config.shutdown?.handlerGraceMs ?? DEFAULTS.handlerGraceMs;
  const supervisors = new Map<string, CameraSupervisor>();
  const unregister: Array<() => void> = [];

  for (const camera of cameras) {
    const client = clientFactory(camera, config, logger);
    const supervisor = new CameraSupervisor({
      camera,
      source: client,
      resolveStreams: () => client.resolveStreams(),
      handlerTimeoutMs: config.handler?.timeoutMs ?? DEFAULTS.handlerTimeoutMs,
      logger,
      metrics: registry
    });
    supervisors.set(camera.id, supervisor);

    try {
      await supervisor.start();
    } catch (error) {
      logger.error({ camera: camera.id, err: error }, 'Camera supervisor failed to start');
    }

    if (options.registerLifecycle !== false) {
      unregister.push(
        registerHealthIndicator(`camera:${camera.id}`, () => {
          const status = supervisor.status();
          return {
            status: HEALTH_BY_STATE[status.state],
            details: {
              state: status.state,
              activeSession: status.activeSession?.eventName ?? null,
              activeRecordings: status.activeRecordings,
              error: status.error
            }
          };
        })
      );
    }
  }

  logger.info({ cameras: Array.from(supervisors.keys()) }, 'onvifeye started');

  let stopPromise: Promise<StopResult[]> | null = null;
  const stop = () => {
    if (!stopPromise) {
      stopPromise = (async () => {
        const results = await Promise.all(
          Array.from(supervisors.values(), supervisor => supervisor.stop(graceMs))
        );
        for (const dispose of unregister) {
          dispose();
        }
        logger.info(
          { drained: results.every(result => result.drained) },
          'onvifeye stopped'
        );
        return results;
      })();
    }
    return stopPromise;
  };

  if (options.registerLifecycle !== false) {
    unregister.push(
      registerShutdownHook('cameras', async () => {
        await stop();
      })
    );
  }

  return { supervisors, stop };
}
