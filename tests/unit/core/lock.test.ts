/**
 * Unit tests for KeyedMutex
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';

import { KeyedMutex } from '../../../src/core/lock.js';

describe('KeyedMutex', () => {
  it('should serialize tasks on the same key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (label: string, ms: number) => async (): Promise<string> => {
      events.push(`${label}:start`);
      await sleep(ms);
      events.push(`${label}:end`);
      return label;
    };

    const results = await Promise.all([
      mutex.run('web', task('a', 20)),
      mutex.run('web', task('b', 1)),
      mutex.run('web', task('c', 1)),
    ]);

    assert.deepStrictEqual(results, ['a', 'b', 'c']);
    assert.deepStrictEqual(events, ['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should not make different keys wait for each other', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.run('slow', async () => {
        await sleep(20);
        events.push('slow');
      }),
      mutex.run('fast', async () => {
        events.push('fast');
      }),
    ]);

    assert.deepStrictEqual(events, ['fast', 'slow']);
  });

  it('should release the lock when a task fails', async () => {
    const mutex = new KeyedMutex();

    await assert.rejects(
      mutex.run('web', async () => {
        throw new Error('boom');
      }),
      /boom/
    );

    assert.strictEqual(await mutex.run('web', async () => 'next'), 'next');
  });

  it('should start a queued task only once the holder finishes', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => {};
    const held = mutex.run('web', () => new Promise<void>((resolve) => (release = resolve)));
    const queued = mutex.run('web', async () => void events.push('queued'));

    // The holder starts on a later tick
    await sleep(5);
    assert.deepStrictEqual(events, []);

    release();
    await Promise.all([held, queued]);
    assert.deepStrictEqual(events, ['queued']);
  });
});
