import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write enabled levels to stderr with prefix and metadata', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: 'info', prefix: 'test' });

    logger.info('hello', { count: 2 });

    expect(write).toHaveBeenCalledWith('[test] INFO: hello {"count":2}\n');
  });

  it('should skip levels below the threshold', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: 'warn' });

    logger.info('quiet');
    logger.debug('quieter');
    logger.error('loud');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[regsynth] ERROR: loud \n');
  });

  it('should change level at runtime', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: 'error' });

    logger.setLevel('debug');
    logger.debug('visible');

    expect(logger.getLevel()).toBe('debug');
    expect(write).toHaveBeenCalledTimes(1);
  });

  it('should never write to stdout', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    new Logger({ level: 'debug' }).info('to stderr');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
