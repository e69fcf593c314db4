export { LogServer } from './logServer';

export {
  ENV_PREFIX,
  SettingsError,
  createSettings,
  loadSettings,
} from './config/settings';
export type { Settings } from './config/settings';

export { LEVELS, isAtLeast, isLevel, parseLevel } from './sink/levels';
export type { Level } from './sink/levels';

export { RingBuffer } from './sink/ringBuffer';
export {
  EXPOSURE_MODULE,
  RingBufferSink,
  isExposureModule,
} from './sink/ringBufferSink';
export type { LogItem, LogSink } from './sink/ringBufferSink';
export { createSinkStream } from './sink/sinkStream';

export { createLogger, DEFAULT_MODULE } from './utils/logger';
export type { LoggerOptions } from './utils/logger';

export { CORS_HEADERS } from './middleware/cors';
export { createApp } from './server/app';
export { ServerStartError, startExposureServer } from './server/exposureServer';
export type { ExposureServer } from './server/exposureServer';

export { errorHandler, statusOf } from './middleware/errorHandler';
export { runCli, startFromSettings } from './cli';
export type { CliOptions } from './cli';
