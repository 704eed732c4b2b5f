import { WorkQueue } from './work-queue';

describe('WorkQueue', () => {
  it('hands out buffered items in FIFO order', async () => {
    const queue = new WorkQueue<string>();
    queue.push('a');
    queue.push('b');
    queue.push('c');

    expect(queue.size).toBe(3);
    await expect(queue.take()).resolves.toBe('a');
    await expect(queue.take()).resolves.toBe('b');
    await expect(queue.take()).resolves.toBe('c');
    expect(queue.size).toBe(0);
  });

  it('wakes waiting takers in arrival order, one item each', async () => {
    const queue = new WorkQueue<string>();
    const first = queue.take();
    const second = queue.take();
    expect(queue.waiting).toBe(2);

    queue.push('x');
    queue.push('y');

    await expect(first).resolves.toBe('x');
    await expect(second).resolves.toBe('y');
    expect(queue.size).toBe(0);
    expect(queue.waiting).toBe(0);
  });

  it('delivers each item to exactly one of many takers', async () => {
    const queue = new WorkQueue<number>();
    const takers = Array.from({ length: 4 }, () => queue.take());
    [1, 2, 3, 4].forEach((n) => queue.push(n));

    const received = await Promise.all(takers);
    expect([...received].sort()).toEqual([1, 2, 3, 4]);
  });

  it('releases waiting takers with null on close and rejects new pushes', async () => {
    const queue = new WorkQueue<string>();
    const pending = queue.take();

    queue.close();

    await expect(pending).resolves.toBeNull();
    await expect(queue.take()).resolves.toBeNull();
    expect(() => queue.push('late')).toThrow('Work queue is closed');

    queue.reopen();
    queue.push('again');
    await expect(queue.take()).resolves.toBe('again');
  });
});
