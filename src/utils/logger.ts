import pino from 'pino';
import { env } from '../config/env';
import type { RingBufferSink } from '../sink/ringBufferSink';
import { createSinkStream } from '../sink/sinkStream';

/** Module attributed to log calls made without a `module` binding. */
export const DEFAULT_MODULE = 'app';

export interface LoggerOptions {
  /** Default module name for records without a `module` binding */
  module?:  string;
  /** Also write to the console (default true) */
  console?: boolean;
  /** Human-readable console output via pino-pretty (default: development only) */
  pretty?:  boolean;
}

// ---------------------------------------------------------------------------
// Console destination.
//
// Development: pino-pretty transport (colorized, runs in a worker thread).
// Everywhere else: plain JSON to stdout.
// ---------------------------------------------------------------------------
function consoleStream(pretty: boolean): pino.DestinationStream {
  if (!pretty) return process.stdout;

  return pino.transport({
    target:  'pino-pretty',
    options: { colorize: true, translateTime: 'SYS:standard' },
  });
}

/**
 * Registers `sink` as the destination of a new pino logger.
 *
 * The logger's threshold is the sink's configured minimum, and every line it
 * emits reaches both the sink and (optionally) the console through
 * pino.multistream. Components identify themselves with
 * `logger.child({ module: '...' })`.
 */
export function createLogger(sink: RingBufferSink, options: LoggerOptions = {}): pino.Logger {
  const level = sink.settings.level;

  const sinkEntry = {
    stream: createSinkStream(sink, options.module ?? DEFAULT_MODULE),
    level,
  };

  const streams = options.console === false
    ? [sinkEntry]
    : [sinkEntry, { stream: consoleStream(options.pretty ?? env.NODE_ENV === 'development'), level }];

  return pino({ level }, pino.multistream(streams));
}
