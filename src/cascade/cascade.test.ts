import { describe, it, expect, vi } from 'vitest';
import { firstSuccess, strategy, succeed, decline, fail, type AttemptOutcome } from './cascade.js';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe('firstSuccess', () => {
  it('should return the first successful strategy', async () => {
    const third = vi.fn(async (): Promise<AttemptOutcome<string>> => succeed('c'));

    const result = await firstSuccess([
      strategy('a', async () => decline<string>('not here')),
      strategy('b', async () => succeed('b-value')),
      strategy('c', third),
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.winner).toBe('b');
      expect(result.value).toBe('b-value');
      expect(result.attempts.map((a) => [a.name, a.status])).toEqual([
        ['a', 'declined'],
        ['b', 'success'],
      ]);
    }
    expect(third).not.toHaveBeenCalled();
  });

  it('should record reasons for declined and failed attempts', async () => {
    const result = await firstSuccess([
      strategy('a', async () => decline<number>('unavailable')),
      strategy('b', async () => fail<number>(new Error('crashed'))),
    ]);

    expect(result.ok).toBe(false);
    expect(result.attempts).toHaveLength(2);
    expect(result.attempts[0]).toMatchObject({ name: 'a', status: 'declined', reason: 'unavailable' });
    expect(result.attempts[1]).toMatchObject({ name: 'b', status: 'failed', reason: 'crashed' });
  });

  it('should treat a thrown error as a failed attempt and continue', async () => {
    const result = await firstSuccess([
      strategy('thrower', async (): Promise<AttemptOutcome<number>> => {
        throw new Error('boom');
      }),
      strategy('fallback', async () => succeed(7)),
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.winner).toBe('fallback');
      expect(result.value).toBe(7);
    }
    expect(result.attempts[0]).toMatchObject({ name: 'thrower', status: 'failed', reason: 'boom' });
  });

  it('should run strategies strictly in order', async () => {
    const order: string[] = [];
    const make = (name: string, outcome: AttemptOutcome<string>) =>
      strategy(name, async () => {
        order.push(name);
        await new Promise((resolve) => setTimeout(resolve, 1));
        return outcome;
      });

    await firstSuccess([
      make('first', decline('no')),
      make('second', fail(new Error('x'))),
      make('third', succeed('ok')),
    ]);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('should return not ok for an empty list', async () => {
    const result = await firstSuccess<string>([]);
    expect(result).toEqual({ ok: false, attempts: [] });
  });

  it('should report each attempt to onAttempt', async () => {
    const onAttempt = vi.fn();

    await firstSuccess(
      [strategy('a', async () => decline<string>('skip')), strategy('b', async () => succeed('v'))],
      { onAttempt }
    );

    expect(onAttempt).toHaveBeenCalledTimes(2);
    expect(onAttempt.mock.calls[0][0]).toBe('a');
    expect(onAttempt.mock.calls[0][1]).toEqual({ status: 'declined', reason: 'skip' });
    expect(onAttempt.mock.calls[1][1]).toEqual({ status: 'success', value: 'v' });
  });

  it('should stringify non-error failures', async () => {
    const result = await firstSuccess([strategy('a', async () => fail<string>('bad input'))]);
    expect(result.attempts[0].reason).toBe('bad input');
  });

  it('should measure each attempt', async () => {
    const result = await firstSuccess([
      strategy('slow', async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return succeed(true);
      }),
    ]);

    expect(result.attempts[0].durationMs).toBeGreaterThan(0);
  });
});
