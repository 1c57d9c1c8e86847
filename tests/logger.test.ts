import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../src/utils/logger.js';

const TIMESTAMPED = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[Dispatcher\] sent$/;

describe('Logger', () => {
  const originalDebug = process.env.DEBUG;

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = originalDebug;
    }
  });

  it('writes to stderr by default so stdout stays free for piped input', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('Dispatcher');

    logger.info('sent');
    logger.raw('plain');

    expect(logger.channel).toBe('stderr');
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenNthCalledWith(1, expect.stringMatching(TIMESTAMPED));
    expect(error).toHaveBeenNthCalledWith(2, 'plain');
  });

  it('writes info and raw output to stdout on the stdout channel', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Dispatcher', { channel: 'stdout' });

    logger.info('sent');
    logger.raw('plain');
    logger.warn('slow');

    expect(log.mock.calls).toEqual([[expect.stringMatching(TIMESTAMPED)], ['plain']]);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/\[Dispatcher\] slow$/));
  });

  it('keeps errors on stderr even on the stdout channel', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('Dispatcher', { channel: 'stdout' }).error('failed');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\[Dispatcher\] failed$/));
  });

  it('only prints debug output when DEBUG is set', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('Dispatcher');

    delete process.env.DEBUG;
    logger.debug('hidden');
    expect(error).not.toHaveBeenCalled();

    process.env.DEBUG = '1';
    logger.debug('shown');
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\[Dispatcher\] \[DEBUG\] shown$/));
  });
});
