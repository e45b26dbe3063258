import pino from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('takes the level from STASHKIT_LOG_LEVEL when none is given', () => {
    expect(process.env.STASHKIT_LOG_LEVEL).toBe('silent');
    expect(createLogger().level).toBe('silent');
  });

  it('prefers an explicit level', () => {
    expect(createLogger({ level: 'debug' }).level).toBe('debug');
  });

  it('writes to stderr, leaving stdout to the host', () => {
    const destination = vi.spyOn(pino, 'destination');
    createLogger();
    expect(destination).toHaveBeenCalledWith({ dest: 2, sync: true });
  });
});
