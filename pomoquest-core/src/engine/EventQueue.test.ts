import { describe, it, expect } from 'vitest';
import { EventQueue } from './EventQueue';

describe('EventQueue', () => {
  it('delivers buffered items in order', async () => {
    const q = new EventQueue<number>();
    q.push(1);
    q.push(2);
    expect(await q.next()).toEqual({ value: 1, done: false });
    expect(await q.next()).toEqual({ value: 2, done: false });
  });

  it('wakes a waiting consumer on push', async () => {
    const q = new EventQueue<string>();
    const pending = q.next();
    q.push('tick');
    expect(await pending).toEqual({ value: 'tick', done: false });
  });

  it('drains buffered items before reporting done', async () => {
    const q = new EventQueue<number>();
    q.push(7);
    q.close();
    expect(await q.next()).toEqual({ value: 7, done: false });
    expect(await q.next()).toEqual({ value: undefined, done: true });
  });

  it('releases waiting consumers on close', async () => {
    const q = new EventQueue<number>();
    const pending = q.next();
    q.close();
    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it('drops pushes after close', () => {
    const q = new EventQueue<number>();
    q.close();
    expect(q.push(1)).toBe(false);
    expect(q.size).toBe(0);
  });

  it('supports for-await iteration', async () => {
    const q = new EventQueue<number>();
    q.push(1);
    q.push(2);
    q.push(3);
    q.close();
    const seen: number[] = [];
    for await (const n of q) seen.push(n);
    expect(seen).toEqual([1, 2, 3]);
  });
});
