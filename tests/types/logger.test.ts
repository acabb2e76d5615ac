import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, silentLogger } from '@extrato/types';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should only write warnings and errors when not verbose', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ write: (line) => lines.push(line) });

    logger.debug('normalized');
    logger.info('reading file');
    logger.warn('bank code 999 not found');

    expect(lines).toEqual(['[WARN] bank code 999 not found']);
  });

  it('should write debug and info lines when verbose', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ verbose: true, write: (line) => lines.push(line) });

    logger.debug('normalized');
    logger.info('reading file');

    expect(lines).toEqual(['[DEBUG] normalized', '[INFO] reading file']);
  });

  it('should write the stack of an error', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ write: (line) => lines.push(line) });
    const error = new Error('bad tag');

    logger.error('parsing failed', error);

    expect(lines).toEqual(['[ERROR] parsing failed', error.stack]);
  });

  it('should write a non-error detail as text', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ write: (line) => lines.push(line) });

    logger.error('parsing failed', 42);
    logger.error('no detail');

    expect(lines).toEqual(['[ERROR] parsing failed', '42', '[ERROR] no detail']);
  });

  it('should write to stderr by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger().warn('fallback used');

    expect(spy).toHaveBeenCalledWith('[WARN] fallback used');
  });
});

describe('silentLogger', () => {
  it('should accept every level without output', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    silentLogger.debug('a');
    silentLogger.info('b');
    silentLogger.warn('c');
    silentLogger.error('d', new Error('e'));

    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
