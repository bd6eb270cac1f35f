/**
 * modules/common/src/__tests__/loggingSetup.spec.ts
 *
 * @file Tests for the logging setup that runs on import: root level from DIALOG_LAYOUT_LOG_LEVEL and the warning
 * for unknown values.
 */
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

// ---- Hoisted mocks ----

const mocks = vi.hoisted(() => {
  const warn = vi.fn();
  return {
    configureLogging: vi.fn(),
    useLog: vi.fn(() => ({debug: vi.fn(), warn})),
    warn,
  };
});

// noinspection JSUnusedGlobalSymbols
vi.mock('@mburchard/bit-log', () => ({
  configureLogging: mocks.configureLogging,
  useLog: mocks.useLog,
}));

vi.mock('@mburchard/bit-log/appender/ConsoleAppender', () => ({
  ConsoleAppender: class {},
}));

// ---- Test helpers ----

/**
 * Import a fresh copy of the logging module so its setup runs against the current environment.
 *
 * @returns The freshly evaluated module.
 */
async function loadLogging() {
  vi.resetModules();
  return import('../logging.js');
}

// ---- Tests ----

describe('logging setup', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should configure the root logger with the level from the environment', async () => {
    vi.stubEnv('DIALOG_LAYOUT_LOG_LEVEL', 'debug');

    await loadLogging();

    expect(mocks.configureLogging).toHaveBeenCalledOnce();
    expect(mocks.configureLogging).toHaveBeenCalledWith(expect.objectContaining({
      root: {appender: ['CONSOLE'], level: 'DEBUG'},
    }));
    expect(mocks.warn).not.toHaveBeenCalled();
  });

  it('should accept levels with surrounding whitespace', async () => {
    vi.stubEnv('DIALOG_LAYOUT_LOG_LEVEL', ' Warn ');

    await loadLogging();

    expect(mocks.configureLogging).toHaveBeenCalledWith(expect.objectContaining({
      root: {appender: ['CONSOLE'], level: 'WARN'},
    }));
  });

  it('should fall back to INFO and warn on an unknown level', async () => {
    vi.stubEnv('DIALOG_LAYOUT_LOG_LEVEL', 'verbose');

    await loadLogging();

    expect(mocks.configureLogging).toHaveBeenCalledWith(expect.objectContaining({
      root: {appender: ['CONSOLE'], level: 'INFO'},
    }));
    expect(mocks.useLog).toHaveBeenCalledWith('common.logging');
    expect(mocks.warn).toHaveBeenCalledWith('Unknown DIALOG_LAYOUT_LOG_LEVEL \'verbose\', using INFO');
  });

  it('should hand out loggers through useLog', async () => {
    const logging = await loadLogging();

    expect(logging.getLogger).toBe(mocks.useLog);
  });
});
