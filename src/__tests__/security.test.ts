import { MemoryRateLimiter } from '../security.js';

describe('MemoryRateLimiter', () => {
  const start = Date.UTC(2024, 5, 1);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('allows up to max hits per window and key', () => {
    jest.spyOn(Date, 'now').mockReturnValue(start);
    const limiter = new MemoryRateLimiter({ windowMs: 60_000, max: 2 });

    expect(limiter.hit('10.0.0.1')).toEqual({ allowed: true, remaining: 1, retryAfterMs: 60_000 });
    expect(limiter.hit('10.0.0.1')).toEqual({ allowed: true, remaining: 0, retryAfterMs: 60_000 });
    expect(limiter.hit('10.0.0.1')).toEqual({ allowed: false, remaining: 0, retryAfterMs: 60_000 });
    expect(limiter.hit('10.0.0.2').allowed).toBe(true);
  });

  it('starts a fresh window once the old one ends', () => {
    const nowSpy = jest.spyOn(Date, 'now').mockReturnValue(start);
    const limiter = new MemoryRateLimiter({ windowMs: 60_000, max: 1 });
    limiter.hit('client');

    nowSpy.mockReturnValue(start + 30_000);
    expect(limiter.hit('client')).toEqual({ allowed: false, remaining: 0, retryAfterMs: 30_000 });

    nowSpy.mockReturnValue(start + 60_000);
    expect(limiter.hit('client')).toEqual({ allowed: true, remaining: 0, retryAfterMs: 60_000 });
  });

  it('enforces a minimum window of one second', () => {
    jest.spyOn(Date, 'now').mockReturnValue(start);
    const limiter = new MemoryRateLimiter({ windowMs: 10, max: 1 });

    expect(limiter.hit('client').retryAfterMs).toBe(1000);
  });
});
