import { describe, it, expect } from 'vitest';
import { ReadWriteLock } from '../storage/rw-lock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('ReadWriteLock', () => {
  it('lets readers hold the lock together', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();

    const first = lock.read(() => gate.promise);
    const second = lock.read(() => gate.promise);

    expect(lock.activeReaders).toBe(2);
    expect(lock.pending).toBe(0);

    gate.resolve();
    await Promise.all([first, second]);
    expect(lock.activeReaders).toBe(0);
  });

  it('holds readers back while a writer is active', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const order: string[] = [];

    const write = lock.write(async () => {
      order.push('write:start');
      await gate.promise;
      order.push('write:end');
    });
    const read = lock.read(() => { order.push('read'); });

    expect(lock.isWriting).toBe(true);
    expect(lock.pending).toBe(1);

    gate.resolve();
    await Promise.all([write, read]);
    expect(order).toEqual(['write:start', 'write:end', 'read']);
  });

  it('makes a writer wait for active readers', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const order: string[] = [];

    const read = lock.read(async () => {
      await gate.promise;
      order.push('read');
    });
    const write = lock.write(() => { order.push('write'); });

    expect(lock.isWriting).toBe(false);
    expect(lock.pending).toBe(1);

    gate.resolve();
    await Promise.all([read, write]);
    expect(order).toEqual(['read', 'write']);
  });

  it('grants in arrival order so a queued writer is not overtaken', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const order: string[] = [];

    const firstRead = lock.read(async () => {
      await gate.promise;
      order.push('read-1');
    });
    const write = lock.write(() => { order.push('write'); });
    const lateRead = lock.read(() => { order.push('read-2'); });

    // read-2 arrived after the writer, so it queues even though only readers are active
    expect(lock.activeReaders).toBe(1);
    expect(lock.pending).toBe(2);

    gate.resolve();
    await Promise.all([firstRead, write, lateRead]);
    expect(order).toEqual(['read-1', 'write', 'read-2']);
  });

  it('releases the lock when the critical section throws', async () => {
    const lock = new ReadWriteLock();

    await expect(lock.write(() => { throw new Error('boom'); })).rejects.toThrow('boom');

    expect(lock.isWriting).toBe(false);
    await expect(lock.read(() => 'ok')).resolves.toBe('ok');
  });
});
