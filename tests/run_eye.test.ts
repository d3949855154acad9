import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { collectHealthChecks, resetAppLifecycle, runShutdownHooks } from '../src/app.js';
import { resolveCamera, type Camera, type OnvifeyeConfig } from '../src/config/index.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startEye, type ClientFactory } from '../src/run-eye.js';
import type { StreamAddresses } from '../src/types.js';
import { createTestLogger, FakeSource } from './helpers/fakes.js';

class FakeClient extends FakeSource {
  async resolveStreams(): Promise<StreamAddresses> {
    return { main: 'rtsp://10.0.0.5:554/stream1', minor: null, stills: null };
  }
}

function camera(id: string): Camera {
  return resolveCamera({ id, host: '10.0.0.5', targetEvents: ['IsPeople'], saveFolder: '/srv/onvifeye' });
}

describe('startEye', () => {
  const config: OnvifeyeConfig = { shutdown: { handlerGraceMs: 1_000 } };
  let clients: Map<string, FakeClient>;
  let clientFactory: ClientFactory;
  let metrics: MetricsRegistry;

  beforeEach(() => {
    resetAppLifecycle();
    metrics = new MetricsRegistry();
    clients = new Map();
    clientFactory = vi.fn<ClientFactory>(target => {
      const client = new FakeClient();
      if (target.id === 'broken') {
        client.startError = new Error('subscription rejected');
      }
      clients.set(target.id, client);
      return client;
    });
  });

  afterEach(() => {
    resetAppLifecycle();
  });

  it('starts one supervisor per camera and reports each as a health check', async () => {
    const runtime = await startEye({
      config,
      cameras: [camera('porch'), camera('broken')],
      clientFactory,
      logger: createTestLogger(),
      metrics
    });

    expect(Array.from(runtime.supervisors.keys())).toEqual(['porch', 'broken']);
    expect(clients.get('porch')?.started).toBe(1);

    const checks = await collectHealthChecks({ service: { status: 'running', startedAt: 1 } });
    expect(checks).toEqual([
      {
        name: 'camera:porch',
        status: 'ok',
        details: { state: 'running', activeSession: null, activeRecordings: 0, error: null }
      },
      {
        name: 'camera:broken',
        status: 'degraded',
        details: { state: 'failed', activeSession: null, activeRecordings: 0, error: 'subscription rejected' }
      }
    ]);

    await runtime.stop();
  });

  it('keeps healthy cameras running when another one fails', async () => {
    const runtime = await startEye({
      config,
      cameras: [camera('broken'), camera('porch')],
      clientFactory,
      logger: createTestLogger(),
      metrics
    });

    expect(runtime.supervisors.get('broken')?.status().state).toBe('failed');
    expect(runtime.supervisors.get('porch')?.status().state).toBe('running');
    expect(clients.get('porch')?.started).toBe(1);
    expect(clients.get('porch')?.listenerCount('payload')).toBe(1);

    await runtime.stop();
  });

  it('refuses to start without cameras', async () => {
    await expect(
      startEye({ config, cameras: [], clientFactory, logger: createTestLogger(), metrics })
    ).rejects.toThrow('No cameras configured');
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('stops every camera once and unregisters its lifecycle hooks', async () => {
    const runtime = await startEye({
      config,
      cameras: [camera('porch')],
      clientFactory,
      logger: createTestLogger(),
      metrics
    });

    const hookResults = await runShutdownHooks({ reason: 'test' });
    expect(hookResults).toEqual([{ name: 'cameras', status: 'ok' }]);

    const results = await runtime.stop();
    expect(results).toEqual([{ camera: 'porch', drained: true, pendingRecordings: [] }]);
    expect(clients.get('porch')?.stopped).toBe(1);
    expect(runtime.supervisors.get('porch')?.status().state).toBe('stopped');
    expect(await collectHealthChecks({ service: { status: 'stopped', startedAt: null } })).toEqual([]);
  });

  it('lets a requested log level override the configured one', async () => {
    const original = getLogLevel();
    try {
      const runtime = await startEye({
        config: { ...config, logging: { level: 'warn' } },
        cameras: [camera('porch')],
        clientFactory,
        metrics,
        registerLifecycle: false,
        logLevel: 'error'
      });
      expect(getLogLevel()).toBe('error');
      await runtime.stop();
    } finally {
      setLogLevel(original);
    }
  });

  it('skips lifecycle registration when asked to', async () => {
    const runtime = await startEye({
      config,
      cameras: [camera('porch')],
      clientFactory,
      logger: createTestLogger(),
      metrics,
      registerLifecycle: false
    });

    expect(await collectHealthChecks({ service: { status: 'running', startedAt: 1 } })).toEqual([]);
    expect(await runShutdownHooks({ reason: 'test' })).toEqual([]);

    await runtime.stop();
  });
});
