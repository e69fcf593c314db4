import { env } from './config/env';
import { LogServer } from './logServer';
import type { ExposureServer } from './server/exposureServer';
import type { LoggerOptions } from './utils/logger';

export interface CliOptions {
  settingsDir?:  string;
  settingsFile?: string;
  /** Source of APP_* overrides (default process.env) */
  environment?:  NodeJS.ProcessEnv;
  logger?:       LoggerOptions;
  /** Called with the exit code after a fatal startup error */
  exit?:         (code: number) => void;
}

/** Loads settings, registers the logger and starts serving. */
export async function startFromSettings(options: CliOptions = {}): Promise<ExposureServer> {
  const logServer = LogServer.fromFile(
    options.settingsDir ?? env.SETTINGS_DIR,
    options.settingsFile ?? env.SETTINGS_FILE,
    options.environment,
  );
  const logger = logServer.initLogger(options.logger);

  const server = await logServer.startServer();

  logger.info(
    { url: server.url, level: logServer.settings.level, capacity: logServer.settings.capacity },
    'ringlog server started',
  );
  return server;
}

// ---------------------------------------------------------------------------
// Fail fast: a missing or invalid setting, or a port that cannot be bound,
// reports the problem on stderr and exits with code 1 before anything is
// served.
// ---------------------------------------------------------------------------
export async function runCli(options: CliOptions = {}): Promise<ExposureServer | undefined> {
  const exit = options.exit ?? ((code: number) => process.exit(code));

  try {
    return await startFromSettings(options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[ringlog] ${message}`);
    exit(1);
    return undefined;
  }
}
