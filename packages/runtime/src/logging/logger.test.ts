// Tests for loggers

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCapturingLogger, createConsoleLogger } from './logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createConsoleLogger', () => {
  it('drops entries below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger('info');
    logger.debug('hidden');
    logger.info('shown', { count: 2 });
    logger.warn('also shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] shown', { count: 2 });
    expect(warn).toHaveBeenCalledWith('[WARN] also shown', '');
  });

  it('only reports errors at the error level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger('error');
    logger.warn('quiet');
    logger.error('loud');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] loud', '');
  });
});

describe('createCapturingLogger', () => {
  it('records entries in order', () => {
    const logger = createCapturingLogger();

    logger.info('first');
    logger.warn('second', { line: 3 });

    expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ['info', 'first', undefined],
      ['warn', 'second', { line: 3 }],
    ]);
  });
});
