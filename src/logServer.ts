import type { Logger } from 'pino';

import { loadSettings, type Settings } from './config/settings';
import { RingBufferSink } from './sink/ringBufferSink';
import { startExposureServer, type ExposureServer } from './server/exposureServer';
import { createLogger, type LoggerOptions } from './utils/logger';

/**
 * Wires one RingBufferSink to both the application logger and the exposure
 * server. The same instance is handed to each; nothing is looked up globally.
 */
export class LogServer {
  readonly sink: RingBufferSink;
  private logger: Logger | undefined;

  private constructor(readonly settings: Settings) {
    this.sink = new RingBufferSink(settings);
  }

  /** Loads settings from `<dir>/<filename>` plus APP_* overrides. Throws SettingsError. */
  static fromFile(dir: string, filename: string, environment?: NodeJS.ProcessEnv): LogServer {
    return new LogServer(loadSettings(dir, filename, environment));
  }

  static withSettings(settings: Settings): LogServer {
    return new LogServer(settings);
  }

  /**
   * Registers the sink as the destination of a pino logger, thresholded at
   * the configured minimum. Later calls return the same logger and ignore
   * `options`.
   */
  initLogger(options?: LoggerOptions): Logger {
    if (!this.logger) {
      this.logger = createLogger(this.sink, options);
    }
    return this.logger;
  }

  /** Starts the exposure server, registering the logger first if needed. */
  startServer(): Promise<ExposureServer> {
    return startExposureServer(this.sink, this.settings, this.initLogger());
  }
}
