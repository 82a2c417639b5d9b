import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from './index';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes lines with the scope', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('calendar', 'debug');

    logger.warn('placeholder synthesized');

    expect(spy).toHaveBeenCalledWith('[calendar] placeholder synthesized');
  });

  it('passes context as a second argument', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('pipeline', 'info');

    logger.info('stage finished', { stage: 'strategy' });

    expect(spy).toHaveBeenCalledWith('[pipeline] stage finished', { stage: 'strategy' });
  });

  it('drops messages below the threshold', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const infoSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('pipeline', 'warn');

    logger.debug('noise');
    logger.info('noise');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('silent suppresses errors too', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('pipeline', 'silent');

    logger.error('boom');

    expect(spy).not.toHaveBeenCalled();
  });
});
