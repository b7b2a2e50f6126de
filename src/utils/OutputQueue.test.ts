import { describe, expect, it } from 'vitest';
import { OutputQueue } from './OutputQueue.js';

describe('OutputQueue', () => {
  it('returns an empty buffer when nothing is queued', () => {
    const queue = new OutputQueue();

    expect(queue.take(4096).length).toBe(0);
  });

  it('joins small chunks in arrival order', () => {
    const queue = new OutputQueue();
    queue.push(Buffer.from('ab'));
    queue.push(Buffer.from('cd'));

    expect(queue.take(4096).toString()).toBe('abcd');
    expect(queue.size).toBe(0);
  });

  it('splits a chunk larger than the slice', () => {
    const queue = new OutputQueue();
    queue.push(Buffer.from('abcdef'));

    expect(queue.take(4).toString()).toBe('abcd');
    expect(queue.size).toBe(2);
    expect(queue.take(4).toString()).toBe('ef');
  });

  it('stops at the slice boundary across chunks', () => {
    const queue = new OutputQueue();
    queue.push(Buffer.from('abc'));
    queue.push(Buffer.from('def'));

    expect(queue.take(4).toString()).toBe('abcd');
    expect(queue.take(4).toString()).toBe('ef');
  });

  it('ignores empty chunks and clears', () => {
    const queue = new OutputQueue();
    queue.push(Buffer.alloc(0));
    expect(queue.size).toBe(0);

    queue.push(Buffer.from('x'));
    queue.clear();
    expect(queue.take(10).length).toBe(0);
  });
});
