import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InputQueue } from '../../src/tui/terminal.js';

describe('InputQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns buffered events in arrival order', async () => {
    const queue = new InputQueue();
    queue.push({ kind: 'key', name: 'a' });
    queue.push({ kind: 'resize', columns: 80, rows: 24 });
    expect(queue.size).toBe(2);

    await expect(queue.next(10)).resolves.toEqual({ kind: 'key', name: 'a' });
    await expect(queue.next(10)).resolves.toEqual({ kind: 'resize', columns: 80, rows: 24 });
    expect(queue.size).toBe(0);
  });

  it('hands an event straight to a waiting reader', async () => {
    const queue = new InputQueue();
    const pending = queue.next(1000);
    queue.push({ kind: 'key', name: 'ENTER' });
    await expect(pending).resolves.toEqual({ kind: 'key', name: 'ENTER' });
    expect(queue.size).toBe(0);
  });

  it('resolves with null when the timeout passes', async () => {
    const queue = new InputQueue();
    const pending = queue.next(50);
    vi.advanceTimersByTime(50);
    await expect(pending).resolves.toBeNull();

    queue.push({ kind: 'key', name: 'x' });
    expect(queue.size).toBe(1);
  });

  it('releases a blocked reader on flush', async () => {
    const queue = new InputQueue();
    const pending = queue.next(1000);
    queue.flush();
    await expect(pending).resolves.toBeNull();
  });
});
