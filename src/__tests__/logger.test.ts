import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../utils/logger.js';

function spyOnConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

describe('Logger', () => {
  let logger: Logger;
  let consoleSpy: ReturnType<typeof spyOnConsole>;

  beforeEach(() => {
    logger = new Logger();
    consoleSpy = spyOnConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log info messages by default', () => {
    logger.info('test message');
    expect(consoleSpy.log).toHaveBeenCalledWith('test message');
  });

  it('should prefix completed and skipped steps differently', () => {
    logger.success('Staged all files');
    logger.skip('Nothing to commit');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '✓ Staged all files');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '• Nothing to commit');
  });

  it('should not log when quiet mode is enabled', () => {
    logger.setQuiet(true);
    logger.info('test message');
    logger.skip('skipped');
    logger.warn('careful');
    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).not.toHaveBeenCalled();
  });

  it('should log debug messages only in verbose mode', () => {
    logger.debug('debug message');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    logger.setVerbose(true);
    logger.debug('debug message');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] debug message');
  });

  it('should always log error messages', () => {
    logger.setQuiet(true);
    logger.error('error message');
    expect(consoleSpy.error).toHaveBeenCalledWith('✗ error message');
  });
});
