import { describe, it, expect } from 'vitest';
import { COUNTERS, SerialQueue, SessionState } from '../index.js';

describe('@relaybot/bot - SessionState', () => {
  it('stores arbitrary values', () => {
    const state = new SessionState();
    state.set('greeting', 'hi');
    state.set('enabled', true);

    expect(state.get('greeting')).toBe('hi');
    expect(state.get('missing')).toBeUndefined();
    expect(state.delete('greeting')).toBe(true);
    expect(state.get('greeting')).toBeUndefined();
  });

  it('tracks last-seen times per node', () => {
    const state = new SessionState();
    state.markSeen('!a1b2c3d4', 1000);
    state.markSeen('!11223344', 2000);
    state.markSeen('!a1b2c3d4', 3000);

    expect(state.lastSeen('!a1b2c3d4')).toBe(3000);
    expect(state.seenNodes()).toEqual(['!a1b2c3d4', '!11223344']);
    expect(state.seenCount).toBe(2);
  });

  it('counts from zero', () => {
    const state = new SessionState();

    expect(state.counter(COUNTERS.MESSAGES_SEEN)).toBe(0);
    expect(state.increment(COUNTERS.MESSAGES_SEEN)).toBe(1);
    expect(state.increment(COUNTERS.MESSAGES_SEEN, 4)).toBe(5);
  });

  it('snapshots and clears everything', () => {
    const state = new SessionState();
    state.set('mode', 'quiet');
    state.markSeen('!a1b2c3d4', 1000);
    state.increment(COUNTERS.COMMANDS_EXECUTED);

    expect(state.snapshot()).toEqual({
      values: { mode: 'quiet' },
      seen: { '!a1b2c3d4': 1000 },
      counters: { commandsExecuted: 1 },
    });

    state.clear();
    expect(state.snapshot()).toEqual({ values: {}, seen: {}, counters: {} });
  });
});

describe('@relaybot/bot - SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`start ${name}`);
        setTimeout(() => {
          events.push(`end ${name}`);
          resolve(name);
        }, ms);
      });

    const results = await Promise.all([queue.run(task('a', 15)), queue.run(task('b', 1))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => Promise.reject(new Error('boom')));
    const next = queue.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('reports pending work and idles', async () => {
    const queue = new SerialQueue();
    const done = queue.run(async () => 1);

    expect(queue.size).toBe(1);
    await queue.onIdle();
    expect(queue.size).toBe(0);
    expect(await done).toBe(1);
  });
});
