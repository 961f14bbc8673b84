import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../../core/runtime/SerialQueue.js';
import { deferred } from '../helpers/fixtures.js';

describe('SerialQueue', () => {
  it('never runs a task synchronously', async () => {
    const queue = new SerialQueue();
    const ran: string[] = [];

    const done = queue.enqueue(() => {
      ran.push('task');
    });
    expect(ran).toEqual([]);

    await done;
    expect(ran).toEqual(['task']);
  });

  it('runs tasks one at a time in enqueue order', async () => {
    const queue = new SerialQueue();
    const gate = deferred<void>();
    const ran: string[] = [];

    void queue.enqueue(async () => {
      ran.push('first:start');
      await gate.promise;
      ran.push('first:end');
    });
    void queue.enqueue(() => {
      ran.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(ran).toEqual(['first:start']);

    gate.resolve();
    await queue.onIdle();
    expect(ran).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps going after a task throws', async () => {
    const queue = new SerialQueue();
    const ran: string[] = [];

    const failed = queue.enqueue(() => {
      throw new Error('boom');
    });
    void queue.enqueue(() => {
      ran.push('after');
    });

    await expect(failed).resolves.toBeUndefined();
    await queue.onIdle();
    expect(ran).toEqual(['after']);
  });

  it('waits for tasks enqueued by other tasks', async () => {
    const queue = new SerialQueue();
    const ran: string[] = [];

    void queue.enqueue(() => {
      ran.push('outer');
      void queue.enqueue(() => {
        ran.push('inner');
      });
    });

    await queue.onIdle();
    expect(ran).toEqual(['outer', 'inner']);
  });
});
