import { afterEach, describe, it, expect, vi } from 'vitest';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  vi.resetModules();
});

describe('logger with a bad environment', () => {
  it('still prints the error that reports it', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    vi.resetModules();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { logger } = await import('../../src/utils/logger.js');
    const { ConfigError, getEnv } = await import('../../src/config.js');

    expect(() => getEnv()).toThrow(ConfigError);
    expect(() => logger.error('Invalid environment: LOG_LEVEL')).not.toThrow();
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0][0]).toContain('ERROR');
    expect(errors.mock.calls[0][0]).toContain('Invalid environment: LOG_LEVEL');
  });

  it('falls back to the info level', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    vi.resetModules();
    const lines = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { logger } = await import('../../src/utils/logger.js');

    logger.debug('hidden');
    logger.info('shown');

    expect(lines).toHaveBeenCalledTimes(1);
    expect(lines.mock.calls[0][0]).toContain('shown');
  });
});
