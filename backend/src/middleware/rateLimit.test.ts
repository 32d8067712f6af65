import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createRateLimiter, SlidingWindow } from './rateLimit.js';
import { errorHandler } from './recovery.js';

function limitedApp(now: () => number) {
  const app = express();
  app.use((req, _res, next) => {
    const user = req.header('x-user');
    if (user) req.principal = { subject: `sub-${user}`, username: user, groups: [], expiresAt: new Date(now() + 60_000) };
    next();
  });
  app.post('/sign', createRateLimiter({ windowMs: 60_000, max: 2, action: 'ssh.sign', now }), (_req, res) => {
    res.status(204).end();
  });
  app.use(errorHandler());
  return app;
}

describe('createRateLimiter', () => {
  it('allows a burst up to the limit per principal', async () => {
    let clock = 0;
    const app = limitedApp(() => clock);

    const first = await request(app).post('/sign').set('x-user', 'alice');
    expect(first.status).toBe(204);
    expect(first.headers['x-ratelimit-limit']).toBe('2');
    expect(first.headers['x-ratelimit-remaining']).toBe('1');
    expect(first.headers['x-ratelimit-reset']).toBe('60000');

    clock = 1000;
    const second = await request(app).post('/sign').set('x-user', 'alice');
    expect(second.headers['x-ratelimit-remaining']).toBe('0');

    clock = 2000;
    const third = await request(app).post('/sign').set('x-user', 'alice');
    expect(third.status).toBe(429);
    expect(third.headers['retry-after']).toBe('58');
    expect(third.headers['x-ratelimit-reset']).toBe('60000');
    expect(third.body).toEqual({ error: 'ssh.sign rate limit exceeded', code: 'RateLimited' });

    expect((await request(app).post('/sign').set('x-user', 'bob')).status).toBe(204);
  });

  it('frees capacity as old hits leave the window', async () => {
    let clock = 0;
    const app = limitedApp(() => clock);
    await request(app).post('/sign').set('x-user', 'alice');
    clock = 1000;
    await request(app).post('/sign').set('x-user', 'alice');

    clock = 60_000;
    const res = await request(app).post('/sign').set('x-user', 'alice');
    expect(res.status).toBe(204);
    expect(res.headers['x-ratelimit-remaining']).toBe('0');
    expect(res.headers['x-ratelimit-reset']).toBe('61000');
  });

  it('shares one bucket between anonymous callers', async () => {
    const app = limitedApp(() => 0);
    await request(app).post('/sign');
    await request(app).post('/sign');
    expect((await request(app).post('/sign')).status).toBe(429);
  });
});

describe('SlidingWindow', () => {
  it('forgets keys once their hits expire', () => {
    const window = new SlidingWindow(1000, 1);
    expect(window.hit('alice', 0)).toEqual({ allowed: true, remaining: 0, resetAt: 1000 });
    expect(window.hit('alice', 500)).toEqual({ allowed: false, remaining: 0, resetAt: 1000 });
    window.hit('bob', 800);
    window.sweep(1000);
    expect(window.size).toBe(1);
    window.sweep(1800);
    expect(window.size).toBe(0);
  });
});
