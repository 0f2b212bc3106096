import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../src/utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with the namespace and formats details', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = createLogger('Session', 'debug');

    logger.info('recognition complete', { generation: 3, words: 2 });

    expect(spy).toHaveBeenCalledWith('[recog:Session] recognition complete generation=3 words=2');
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Registry', 'warn');

    logger.debug('registered', { id: 'a' });
    logger.warn('slow');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[recog:Registry] slow');
  });

  it('passes the error object through to console.error', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('Tesseract');
    const error = new Error('worker died');

    logger.error('load failed', error);
    logger.error('plain');

    expect(spy).toHaveBeenNthCalledWith(1, '[recog:Tesseract] load failed', error);
    expect(spy).toHaveBeenNthCalledWith(2, '[recog:Tesseract] plain');
  });

  it('logs nothing when silent', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('Session', 'silent').error('hidden', new Error('x'));
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('recognizes known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
