import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Stands in for a .env file: fills LOG_LEVEL only when the process has none
const envFile = vi.hoisted(() => ({ LOG_LEVEL: 'error' }));

vi.mock('dotenv', () => ({
  config: () => {
    if (process.env.LOG_LEVEL === undefined) {
      process.env.LOG_LEVEL = envFile.LOG_LEVEL;
    }
    return { parsed: { LOG_LEVEL: envFile.LOG_LEVEL } };
  },
}));

beforeEach(() => {
  vi.resetModules();
  delete process.env.LOG_LEVEL;
  envFile.LOG_LEVEL = 'error';
});

afterEach(() => {
  process.env.LOG_LEVEL = 'silent';
});

describe('logger', () => {
  it('takes its level from .env files', async () => {
    const { logger } = await import('../../src/utils/logger.js');
    expect(logger.level).toBe('error');
  });

  it('agrees with the validated config level', async () => {
    const { config } = await import('../../src/config.js');
    const { logger } = await import('../../src/utils/logger.js');

    expect(config.logging.level).toBe('error');
    expect(logger.level).toBe('error');
  });

  it('lets the process environment win over .env files', async () => {
    process.env.LOG_LEVEL = 'warn';
    const { logger } = await import('../../src/utils/logger.js');
    expect(logger.level).toBe('warn');
  });

  it('falls back to info for an unknown level and fails config validation', async () => {
    envFile.LOG_LEVEL = 'loud';
    const { logger } = await import('../../src/utils/logger.js');
    expect(logger.level).toBe('info');

    logger.level = 'silent';
    await expect(import('../../src/config.js')).rejects.toThrow('Configuration validation failed');
  });
});
