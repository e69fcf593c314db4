import * as fs   from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseLevel, type Level } from '../sink/levels';

export interface Settings {
  readonly address:  string;
  readonly port:     number;
  /** Minimum severity retained by the sink */
  readonly level:    Level;
  /** Maximum number of buffered records */
  readonly capacity: number;
}

/** Prefix for environment variables overriding settings file keys, e.g. APP_PORT. */
export const ENV_PREFIX = 'APP_';

export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SettingsError';
  }
}

// ---------------------------------------------------------------------------
// Validation
//
// Numbers may arrive as JSON numbers or, from environment overrides, as
// strings; a string must be all digits once trimmed. Anything else (null,
// booleans, arrays, blank strings) is rejected rather than coerced.
// `level` is any string: unknown labels fall back to 'error' in parseLevel.
// ---------------------------------------------------------------------------
function numeric(label: string) {
  return z.union(
    [
      z.number(),
      z.string().trim().regex(/^\d+$/, `${label} must be a whole number`).transform(Number),
    ],
    {
      errorMap: (issue, ctx) => (
        issue.code === z.ZodIssueCode.invalid_union
          ? { message: `${label} must be a number` }
          : { message: ctx.defaultError }
      ),
    },
  );
}

const address  = z.string().trim().min(1, 'address is required');
const port     = numeric('port')
  .pipe(z.number().int('port must be an integer').min(0).max(65535));
const capacity = numeric('capacity')
  .pipe(z.number().int('capacity must be an integer').positive('capacity must be positive'));

const SettingsFileSchema = z.object({
  address,
  port,
  num_messages: capacity,
  level:        z.string({ required_error: 'level is required' }),
});

const SettingsValueSchema = z.object({
  address,
  port,
  capacity,
  level: z.enum(['error', 'warn', 'info', 'debug', 'trace']),
});

type SettingsFileKey = keyof z.infer<typeof SettingsFileSchema>;

const FILE_KEYS: SettingsFileKey[] = ['address', 'port', 'num_messages', 'level'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Builds a validated, frozen Settings value. Throws SettingsError. */
export function createSettings(values: Settings): Settings {
  const parsed = SettingsValueSchema.safeParse(values);
  if (!parsed.success) {
    throw new SettingsError('Invalid settings', formatIssues(parsed.error));
  }
  return Object.freeze({ ...parsed.data });
}

function readSettingsFile(location: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(location, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`Could not read settings file ${location}`, [reason]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`Settings file ${location} is not valid JSON`, [reason]);
  }

  if (!isRecord(parsed)) {
    throw new SettingsError(`Settings file ${location} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Loads settings from `<dir>/<filename>` (JSON), then lets APP_ADDRESS,
 * APP_PORT, APP_NUM_MESSAGES and APP_LEVEL override individual keys.
 *
 * Any missing or unparseable key throws SettingsError; callers are expected to
 * treat that as fatal.
 */
export function loadSettings(
  dir: string,
  filename: string,
  environment: NodeJS.ProcessEnv = process.env,
): Settings {
  const location = path.join(dir, filename);
  const merged = { ...readSettingsFile(location) };

  for (const key of FILE_KEYS) {
    const override = environment[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (override !== undefined && override !== '') {
      merged[key] = override;
    }
  }

  const parsed = SettingsFileSchema.safeParse(merged);
  if (!parsed.success) {
    throw new SettingsError(`Invalid settings in ${location}`, formatIssues(parsed.error));
  }

  return createSettings({
    address:  parsed.data.address,
    port:     parsed.data.port,
    level:    parseLevel(parsed.data.level),
    capacity: parsed.data.num_messages,
  });
}
