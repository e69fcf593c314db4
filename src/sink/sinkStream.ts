import type pino from 'pino';
import { z } from 'zod';
import { fromPinoLevel } from './levels';
import type { LogSink } from './ringBufferSink';

// Only `level` decides whether a line is usable. `module` and `msg` are
// bindings any caller can set, so non-string values are rendered as text.
const text = z.unknown().transform((value): string | undefined => {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : JSON.stringify(value);
});

const PinoLineSchema = z.object({
  level:  z.number(),
  msg:    text,
  module: text,
});

/**
 * pino destination that forwards every line to `sink`. Lines without a
 * `module` binding are attributed to `defaultModule`.
 */
export function createSinkStream(sink: LogSink, defaultModule: string): pino.DestinationStream {
  return {
    write(line: string): void {
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        return;  // not a pino line
      }

      const parsed = PinoLineSchema.safeParse(value);
      if (!parsed.success) return;

      const level = fromPinoLevel(parsed.data.level);
      if (level === undefined) return;

      sink.record(level, parsed.data.module ?? defaultModule, parsed.data.msg ?? '');
    },
  };
}
