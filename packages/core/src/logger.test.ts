import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, silentLogger } from './logger.js';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix each level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    consoleLogger.info('one');
    consoleLogger.warning('two');
    consoleLogger.error('three');
    consoleLogger.debug('four');

    expect(log).toHaveBeenCalledWith('[info] one');
    expect(warn).toHaveBeenCalledWith('[warning] two');
    expect(error).toHaveBeenCalledWith('[error] three');
    expect(debug).toHaveBeenCalledWith('[debug] four');
  });
});

describe('silentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should not write anything', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    silentLogger.info('one');
    silentLogger.warning('two');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
