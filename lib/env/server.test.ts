import { describe, it, expect, vi } from 'vitest';
import { parseServerEnv } from './server';

describe('parseServerEnv', () => {
  it('applies defaults when nothing is set', () => {
    const env = parseServerEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.PLANNER_SEED).toBeUndefined();
    expect(env.PLANNER_WEEK_START).toBeUndefined();
  });

  it('keeps planner settings', () => {
    const env = parseServerEnv({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      PLANNER_SEED: 'week-42',
      PLANNER_WEEK_START: '2024-01-08',
    });

    expect(env.LOG_LEVEL).toBe('silent');
    expect(env.PLANNER_SEED).toBe('week-42');
    expect(env.PLANNER_WEEK_START).toBe('2024-01-08');
  });

  it('rejects a malformed week start', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => parseServerEnv({ PLANNER_WEEK_START: 'next monday' })).toThrow(
      'Invalid server environment variables'
    );
    expect(spy).toHaveBeenCalledTimes(1);

    spy.mockRestore();
  });

  it('rejects an unknown log level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => parseServerEnv({ LOG_LEVEL: 'verbose' })).toThrow();

    spy.mockRestore();
  });
});
