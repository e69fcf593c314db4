import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../config/env';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV:      'development',
      SETTINGS_DIR:  '.',
      SETTINGS_FILE: 'ringlog.json',
    });
  });

  it('reads the settings location', () => {
    const config = parseEnv({ NODE_ENV: 'production', SETTINGS_DIR: '/etc/ringlog', SETTINGS_FILE: 'prod.json' });
    expect(config).toEqual({
      NODE_ENV:      'production',
      SETTINGS_DIR:  '/etc/ringlog',
      SETTINGS_FILE: 'prod.json',
    });
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow(ZodError);
  });
});
