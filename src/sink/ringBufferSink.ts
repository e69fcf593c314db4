import type { Settings } from '../config/settings';
import { RingBuffer } from './ringBuffer';
import { isAtLeast, levelLabel, type Level } from './levels';

// ---------------------------------------------------------------------------
// Module identifier used by the exposure server's own logging. Records from
// this module (or a sub-module such as 'ringlog:http:router') are never
// buffered, so serving /logs cannot fill the buffer with its own noise.
// ---------------------------------------------------------------------------
export const EXPOSURE_MODULE = 'ringlog:http';

export function isExposureModule(module: string): boolean {
  return module === EXPOSURE_MODULE || module.startsWith(`${EXPOSURE_MODULE}:`);
}

export interface LogItem {
  /** Upper-case severity label, e.g. 'ERROR' */
  readonly level:   string;
  /** Name of the component that produced the record */
  readonly module:  string;
  /** Rendered message text */
  readonly message: string;
}

/** What a logging front end needs from a destination. */
export interface LogSink {
  enabled(level: Level): boolean;
  record(level: Level, module: string, message: string): void;
  flush(): void;
}

/**
 * Retains the most recent `settings.capacity` accepted records.
 *
 * record() and snapshot() are synchronous, so each runs to completion on the
 * event loop before any other caller can touch the buffer. HTTP handlers only
 * ever see the copy returned by snapshot().
 */
export class RingBufferSink implements LogSink {
  private readonly buffer: RingBuffer<LogItem>;

  constructor(readonly settings: Settings) {
    this.buffer = new RingBuffer<LogItem>(settings.capacity);
  }

  enabled(level: Level): boolean {
    return isAtLeast(level, this.settings.level);
  }

  record(level: Level, module: string, message: string): void {
    if (!this.enabled(level)) return;
    if (isExposureModule(module)) return;

    this.buffer.push(Object.freeze({ level: levelLabel(level), module, message }));
  }

  snapshot(): LogItem[] {
    return this.buffer.toArray();
  }

  flush(): void {
    // nothing buffered outside memory
  }

  get size(): number {
    return this.buffer.size;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }
}
