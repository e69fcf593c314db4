// ---------------------------------------------------------------------------
// Severity levels, most severe first.
// ---------------------------------------------------------------------------
export const LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type Level = (typeof LEVELS)[number];

const SEVERITY: Record<Level, number> = {
  error: 5,
  warn:  4,
  info:  3,
  debug: 2,
  trace: 1,
};

export function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

/** True when `level` is at least as severe as `minimum`. */
export function isAtLeast(level: Level, minimum: Level): boolean {
  return SEVERITY[level] >= SEVERITY[minimum];
}

/**
 * Case-sensitive parse of a configured level. Anything unrecognised falls back
 * to 'error', the most severe level, instead of failing.
 */
export function parseLevel(label: string): Level {
  return isLevel(label) ? label : 'error';
}

/** Upper-case label stored on each LogItem, e.g. 'WARN'. */
export function levelLabel(level: Level): string {
  return level.toUpperCase();
}

/**
 * Maps a pino numeric level onto ours. fatal (60) collapses into error;
 * anything below trace (10) has no counterpart.
 */
export function fromPinoLevel(value: number): Level | undefined {
  if (value >= 50) return 'error';
  if (value >= 40) return 'warn';
  if (value >= 30) return 'info';
  if (value >= 20) return 'debug';
  if (value >= 10) return 'trace';
  return undefined;
}
