import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { applyLogLevel, logger } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    applyLogLevel('silent');
  });

  it('is silent under test until a level is applied', () => {
    expect(logger.level).toBe('silent');
  });

  it('takes the level validated from LOG_LEVEL', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret', LOG_LEVEL: 'warn' });

    applyLogLevel(config.server.logLevel);

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
