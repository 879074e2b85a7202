import { afterEach, describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, createSilentLogger, parseLogLevel } from '../logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses levels case-insensitively', () => {
    expect(parseLogLevel(' Debug ')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(parseLogLevel('loud')).toBeUndefined();
  });

  it('prefixes the scope and drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger('test', 'warn');

    logger.info('hidden');
    logger.warn('careful');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[test] careful');
  });

  it('writes debug output at the debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createConsoleLogger('scope', 'debug').debug('detail');
    expect(debug).toHaveBeenCalledWith('[scope] detail');
  });

  it('can be silenced', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createConsoleLogger('scope', 'silent').error('nothing');
    createSilentLogger().error('nothing');
    expect(error).not.toHaveBeenCalled();
  });
});
