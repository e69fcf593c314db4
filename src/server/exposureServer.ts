import type { Server } from 'http';
import type { Logger } from 'pino';

import type { Settings } from '../config/settings';
import { EXPOSURE_MODULE, type RingBufferSink } from '../sink/ringBufferSink';
import { createApp } from './app';

export class ServerStartError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'ServerStartError';
  }
}

/** Handle to a running exposure server. */
export interface ExposureServer {
  readonly address: string;
  /** Bound port; differs from Settings.port when that was 0 */
  readonly port:    number;
  readonly url:     string;
  stop(): Promise<void>;
}

function hostForUrl(address: string): string {
  return address.includes(':') ? `[${address}]` : address;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * Starts serving `sink` on Settings.address:Settings.port.
 *
 * Resolves once the listener is bound; rejects with ServerStartError when it
 * cannot bind. The server runs on the event loop, so the caller is never
 * blocked, and keeps running until stop() is called.
 */
export function startExposureServer(
  sink: RingBufferSink,
  settings: Settings,
  logger: Logger,
): Promise<ExposureServer> {
  const app = createApp(sink, logger);
  const log = logger.child({ module: EXPOSURE_MODULE });

  return new Promise((resolve, reject) => {
    const server = app.listen(settings.port, settings.address);

    const onStartError = (err: Error): void => {
      reject(new ServerStartError(
        `Could not listen on ${settings.address}:${settings.port}: ${err.message}`,
        err,
      ));
    };
    server.once('error', onStartError);

    server.once('listening', () => {
      server.off('error', onStartError);
      server.on('error', (err) => {
        log.error({ error: err.message }, 'Exposure server error');
      });

      const bound = server.address();
      const port = typeof bound === 'object' && bound !== null ? bound.port : settings.port;
      const url = `http://${hostForUrl(settings.address)}:${port}`;

      log.info({ url, capacity: sink.capacity, level: settings.level }, 'Exposure server listening');

      resolve({
        address: settings.address,
        port,
        url,
        stop: () => closeServer(server),
      });
    });
  });
}
