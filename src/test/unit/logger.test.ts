import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, type LogEntry } from '../../utils/logger';

describe('logger', () => {
  beforeEach(() => {
    logger.clear();
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to the console with a level prefix', () => {
    logger.warning('Quota nearly used');

    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[WARNING\]$/), 'Quota nearly used');
  });

  it('keeps entries in order for the log viewer', () => {
    logger.info('first');
    logger.error('second');

    expect(logger.getEntries().map((e) => [e.level, e.logger, e.message])).toEqual([
      ['info', 'email-parser', 'first'],
      ['error', 'email-parser', 'second'],
    ]);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const seen: LogEntry[] = [];
    const unsubscribe = logger.subscribe((entry) => seen.push(entry));

    logger.debug('one');
    unsubscribe();
    logger.debug('two');

    expect(seen.map((e) => e.message)).toEqual(['one']);
  });

  it('keeps only the most recent 500 entries', () => {
    for (let i = 0; i < 510; i++) {
      logger.debug(`entry ${i}`);
    }

    const entries = logger.getEntries();
    expect(entries).toHaveLength(500);
    expect(entries[0].message).toBe('entry 10');
    expect(entries[499].message).toBe('entry 509');
  });

  it('clears the buffer', () => {
    logger.info('something');
    logger.clear();

    expect(logger.getEntries()).toEqual([]);
  });
});
