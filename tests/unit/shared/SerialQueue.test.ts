import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../../../src/shared/SerialQueue.js';

const tick = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('SerialQueue', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await tick(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task('a', 15)),
      queue.run(task('b', 1)),
      queue.run(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps running after a task fails', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('counts queued and running tasks', async () => {
    const queue = new SerialQueue();
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const first = queue.run(() => gate);
    const second = queue.run(async () => undefined);
    expect(queue.pending).toBe(2);

    await tick(0);
    expect(queue.pending).toBe(2);

    release();
    await Promise.all([first, second]);
    expect(queue.pending).toBe(0);
  });
});
