import { afterEach, describe, it, expect, vi } from 'vitest';

// Each test gets its own Logger so the once-per-run date header is predictable
async function loadLogger() {
  vi.resetModules();
  return import('../src/utils/logger');
}

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('defaults to warnings and errors', async () => {
    const { Logger, LogLevel } = await loadLogger();
    vi.stubEnv('LOG_VERBOSITY', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    Logger.info('hidden');
    Logger.warn('shown');

    expect(Logger.verbosity).toBe(LogLevel.WARN);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\n===== DATE:\d{4}-\d{2}-\d{2} =====$/);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{2}:\d{2}:\d{2} \[WARN\] 🔴 shown$/);
  });

  it('prints the date header once per run', async () => {
    const { Logger } = await loadLogger();
    vi.stubEnv('LOG_VERBOSITY', '2');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    Logger.info('first');
    Logger.info('second');

    expect(log).toHaveBeenCalledTimes(3);
    expect(log.mock.calls[0][0]).toMatch(/^\n===== DATE:/);
    expect(log.mock.calls[1][0]).toMatch(/\[INFO\] first$/);
    expect(log.mock.calls[2][0]).toMatch(/\[INFO\] second$/);
  });

  it('reads LOG_VERBOSITY', async () => {
    const { Logger } = await loadLogger();
    vi.stubEnv('LOG_VERBOSITY', '3');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    Logger.debug('details', { id: 1 });

    expect(log).toHaveBeenCalledWith(expect.stringMatching(/\[DEBUG\] details$/), { id: 1 });
  });

  it('lets an explicit verbosity win over the environment', async () => {
    const { Logger, LogLevel } = await loadLogger();
    vi.stubEnv('LOG_VERBOSITY', '3');
    Logger.setVerbosity(LogLevel.ERROR);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    Logger.warn('quiet');
    Logger.error('loud');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] 🔴🔴 loud$/);
  });
});
