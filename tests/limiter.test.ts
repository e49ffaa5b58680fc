import { describe, expect, it } from 'vitest';
import { ConcurrencyLimiter } from '../src/utils/limiter.js';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('rejects capacities below one', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(
      'Limiter capacity must be a positive integer (received 0)'
    );
    expect(() => new ConcurrencyLimiter(1.5)).toThrow();
  });

  it('runs at most capacity tasks and starts waiters in order', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      limiter.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(limiter.running).toBe(2);
    expect(limiter.pending).toBe(2);

    gates[1]?.resolve();
    await runs[1];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates[0]?.resolve();
    gates[2]?.resolve();
    gates[3]?.resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3]);
    expect(limiter.running).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it('releases the slot when a task fails', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(
      limiter.run(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
    expect(limiter.running).toBe(0);
  });

  it('drops a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const holder = limiter.run(() => gate.promise);

    const controller = new AbortController();
    const reason = new Error('stop waiting');
    let ran = false;
    const waiting = limiter.run(async () => {
      ran = true;
    }, controller.signal);

    expect(limiter.pending).toBe(1);
    controller.abort(reason);
    await expect(waiting).rejects.toBe(reason);
    expect(limiter.pending).toBe(0);

    gate.resolve();
    await holder;
    expect(ran).toBe(false);
    expect(limiter.running).toBe(0);
  });

  it('refuses to start with an aborted signal', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const controller = new AbortController();
    controller.abort(new Error('already gone'));

    await expect(limiter.run(async () => 1, controller.signal)).rejects.toThrow('already gone');
    expect(limiter.running).toBe(0);
  });
});
