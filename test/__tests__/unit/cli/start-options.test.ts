/**
 * Unit Tests: CLI start options
 */

import { describe, it, expect } from '@jest/globals';
import { applyStartOptions, createCliLogger } from '@cli/cli';
import { createAppConfig } from '@config/app-config';

describe('applyStartOptions', () => {
  it('should map flags onto environment variables', () => {
    const env = applyStartOptions(
      { transport: 'sse', port: 9000, host: '0.0.0.0', logLevel: 'warn' },
      { IMAGE_TOP_COLORS: '4' },
    );

    expect(env).toEqual({
      IMAGE_TOP_COLORS: '4',
      MCP_TRANSPORT: 'sse',
      PORT: '9000',
      HOST: '0.0.0.0',
      LOG_LEVEL: 'warn',
    });
  });

  it('should switch to development logging with --dev', () => {
    const config = createAppConfig(applyStartOptions({ dev: true }, {}));

    expect(config.server.nodeEnv).toBe('development');
    expect(config.server.logLevel).toBe('debug');
    expect(config.logging.format).toBe('pretty');
  });

  it('should let an explicit log level win over --dev', () => {
    expect(applyStartOptions({ dev: true, logLevel: 'error' }, {}).LOG_LEVEL).toBe('error');
  });

  it('should not modify the base environment', () => {
    const base = { PORT: '1' };
    applyStartOptions({ port: 2 }, base);
    expect(base).toEqual({ PORT: '1' });
  });
});

describe('createCliLogger', () => {
  it('should take its level from the configuration', () => {
    const config = createAppConfig({ LOG_LEVEL: 'warn', LOG_FORMAT: 'json' });
    const cliLogger = createCliLogger(config);

    expect(cliLogger.level).toBe('warn');
  });

  it('should follow the --log-level flag once applied', () => {
    const config = createAppConfig(applyStartOptions({ logLevel: 'error' }, { LOG_LEVEL: 'info' }));

    expect(createCliLogger(config).level).toBe('error');
  });
});
