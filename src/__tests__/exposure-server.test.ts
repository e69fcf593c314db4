import { afterEach, describe, it, expect } from 'vitest';
import { createSettings } from '../config/settings';
import { LogServer } from '../logServer';
import { CORS_HEADERS } from '../middleware/cors';
import { ServerStartError, type ExposureServer } from '../server/exposureServer';
import type { Level } from '../sink/levels';
import { EXPOSURE_MODULE } from '../sink/ringBufferSink';

// ── Every test binds 127.0.0.1 on an ephemeral port and stops it afterwards ──

const running: ExposureServer[] = [];

afterEach(async () => {
  await Promise.all(running.splice(0).map((server) => server.stop()));
});

function makeLogServer(level: Level = 'trace', capacity = 50, port = 0): LogServer {
  const logServer = LogServer.withSettings(createSettings({ address: '127.0.0.1', port, level, capacity }));
  logServer.initLogger({ console: false });
  return logServer;
}

async function start(logServer: LogServer): Promise<ExposureServer> {
  const server = await logServer.startServer();
  running.push(server);
  return server;
}

function expectCorsHeaders(res: Response): void {
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    expect(res.headers.get(name)).toBe(value);
  }
}

describe('GET /', () => {
  it('answers with the liveness marker', async () => {
    const server = await start(makeLogServer());

    const res = await fetch(`${server.url}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await res.text()).toBe('Logserver online');
  });
});

describe('GET /logs', () => {
  it('returns an empty array before anything is logged', async () => {
    const server = await start(makeLogServer());

    const res = await fetch(`${server.url}/logs`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await res.json()).toEqual([]);
  });

  it('returns logged records oldest first', async () => {
    const logServer = makeLogServer('trace', 50);
    const logger = logServer.initLogger();

    logger.debug('Debug');
    logger.error('Error');

    const server = await start(logServer);
    const res = await fetch(`${server.url}/logs`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([
      { level: 'DEBUG', module: 'app', message: 'Debug' },
      { level: 'ERROR', module: 'app', message: 'Error' },
    ]);
  });

  it('sees records logged after startup', async () => {
    const logServer = makeLogServer('info', 2);
    const server = await start(logServer);
    const logger = logServer.initLogger();

    logger.info('one');
    logger.info('two');
    logger.info('three');

    const res = await fetch(`${server.url}/logs`);
    expect(await res.json()).toEqual([
      { level: 'INFO', module: 'app', message: 'two' },
      { level: 'INFO', module: 'app', message: 'three' },
    ]);
  });

  it('never contains records from the server itself', async () => {
    const logServer = makeLogServer('trace', 50);
    const logger = logServer.initLogger();

    logger.child({ module: EXPOSURE_MODULE }).error('from the exposure layer');
    logger.child({ module: 'worker' }).warn('kept');

    const server = await start(logServer);
    await fetch(`${server.url}/`);
    await fetch(`${server.url}/logs`);
    const res = await fetch(`${server.url}/logs`);

    expect(await res.json()).toEqual([{ level: 'WARN', module: 'worker', message: 'kept' }]);
  });
});

describe('CORS', () => {
  it('adds the headers to every route', async () => {
    const server = await start(makeLogServer());

    for (const path of ['/', '/logs']) {
      const res = await fetch(`${server.url}${path}`);
      expect(res.status).toBe(200);
      expectCorsHeaders(res);
    }
  });

  it('keeps the status of unknown routes', async () => {
    const server = await start(makeLogServer());

    const res = await fetch(`${server.url}/missing`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
    expectCorsHeaders(res);
  });

  it('answers preflight requests with 204', async () => {
    const server = await start(makeLogServer());

    const res = await fetch(`${server.url}/logs`, { method: 'OPTIONS' });

    expect(res.status).toBe(204);
    expectCorsHeaders(res);
  });
});

describe('startServer', () => {
  it('reports the bound port and url', async () => {
    const server = await start(makeLogServer());

    expect(server.address).toBe('127.0.0.1');
    expect(server.port).toBeGreaterThan(0);
    expect(server.url).toBe(`http://127.0.0.1:${server.port}`);
  });

  it('rejects when the port is already taken', async () => {
    const first = await start(makeLogServer());

    await expect(makeLogServer('trace', 50, first.port).startServer())
      .rejects.toBeInstanceOf(ServerStartError);
  });

  it('stops accepting connections after stop()', async () => {
    const server = await makeLogServer().startServer();
    await server.stop();

    await expect(fetch(`${server.url}/`)).rejects.toThrow();
  });
});
