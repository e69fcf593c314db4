import 'dotenv/config';
import { z } from 'zod';

// Process-level knobs only. The log server's own settings (address, port,
// level, capacity) come from the settings file, see ./settings.ts.
const envSchema = z.object({
  NODE_ENV:      z.enum(['development', 'production', 'test']).default('development'),

  // Settings file location, read by the CLI entry point
  SETTINGS_DIR:  z.string().min(1).default('.'),
  SETTINGS_FILE: z.string().min(1).default('ringlog.json'),
});

export type ProcessConfig = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): ProcessConfig {
  return envSchema.parse(source);
}

export const env: ProcessConfig = parseEnv(process.env);
