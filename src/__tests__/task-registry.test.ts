import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryDatabase, TaskRegistry } from '../storage/task-registry.js';
import { createTask, type Task } from '../storage/schema.js';

function makeTask(title: string, overrides: Partial<Task> = {}): Task {
  return { ...createTask({ title, description: `${title} description` }, new Date('2025-01-01T00:00:00.000Z')), ...overrides };
}

describe('TaskRegistry', () => {
  let registry: TaskRegistry;

  beforeEach(() => {
    registry = new TaskRegistry();
  });

  describe('create / findById', () => {
    it('stores a task retrievable by id', async () => {
      const task = makeTask('First');
      await registry.create(task);

      await expect(registry.findById(task.id)).resolves.toEqual(task);
    });

    it('returns undefined for an unknown id', async () => {
      await expect(registry.findById('550e8400-e29b-41d4-a716-446655440000')).resolves.toBeUndefined();
    });

    it('keeps stored records isolated from caller mutation', async () => {
      const task = makeTask('Original');
      await registry.create(task);
      task.title = 'mutated after create';

      const found = await registry.findById(task.id);
      expect(found?.title).toBe('Original');

      if (found) found.title = 'mutated after read';
      const again = await registry.findById(task.id);
      expect(again?.title).toBe('Original');
    });
  });

  describe('findAll', () => {
    it('returns an empty list when nothing is stored', async () => {
      await expect(registry.findAll()).resolves.toEqual([]);
    });

    it('returns every stored task', async () => {
      const a = makeTask('A');
      const b = makeTask('B');
      await registry.create(a);
      await registry.create(b);

      const all = await registry.findAll();
      expect(all).toHaveLength(2);
      expect(all.map(t => t.id).sort()).toEqual([a.id, b.id].sort());
    });
  });

  describe('update', () => {
    it('replaces mutable fields and keeps id and created_at', async () => {
      const task = makeTask('Before');
      await registry.create(task);

      const matched = await registry.update(task.id, {
        ...task,
        id: 'ignored',
        title: 'After',
        description: 'changed',
        completed: true,
        created_at: '2030-01-01T00:00:00.000Z',
        updated_at: '2025-01-02T00:00:00.000Z',
      });

      expect(matched).toBe(true);
      await expect(registry.findById(task.id)).resolves.toEqual({
        ...task,
        title: 'After',
        description: 'changed',
        completed: true,
        updated_at: '2025-01-02T00:00:00.000Z',
      });
    });

    it('is a successful no-op for an unknown id', async () => {
      const ghost = makeTask('Ghost');

      await expect(registry.update(ghost.id, ghost)).resolves.toBe(false);
      await expect(registry.findById(ghost.id)).resolves.toBeUndefined();
      expect(registry.size).toBe(0);
    });
  });

  describe('delete', () => {
    it('removes the task permanently', async () => {
      const task = makeTask('Doomed');
      await registry.create(task);

      await expect(registry.delete(task.id)).resolves.toBe(true);
      await expect(registry.findById(task.id)).resolves.toBeUndefined();
    });

    it('is a successful no-op for an unknown id', async () => {
      await registry.create(makeTask('Keep'));

      await expect(registry.delete('550e8400-e29b-41d4-a716-446655440000')).resolves.toBe(false);
      expect(registry.size).toBe(1);
    });
  });

  describe('concurrent access', () => {
    it('keeps every one of 100 parallel creates', async () => {
      const tasks = Array.from({ length: 100 }, (_, i) => makeTask(`Task ${i}`));

      await Promise.all(tasks.map(t => registry.create(t)));

      const all = await registry.findAll();
      expect(all).toHaveLength(100);
      expect(new Set(all.map(t => t.id)).size).toBe(100);
      for (const task of tasks) {
        await expect(registry.findById(task.id)).resolves.toEqual(task);
      }
    });

    it('applies interleaved updates last-writer-wins', async () => {
      const task = makeTask('Race');
      await registry.create(task);

      await Promise.all([
        registry.update(task.id, { ...task, title: 'first' }),
        registry.findById(task.id),
        registry.update(task.id, { ...task, title: 'second' }),
      ]);

      expect((await registry.findById(task.id))?.title).toBe('second');
    });

    it('never exposes a half-written record to readers', async () => {
      const task = makeTask('v0', { description: 'v0' });
      await registry.create(task);

      const operations: Promise<unknown>[] = [];
      for (let i = 1; i <= 50; i++) {
        operations.push(registry.update(task.id, { ...task, title: `v${i}`, description: `v${i}` }));
        operations.push(registry.findById(task.id).then(found => {
          expect(found?.title).toBe(found?.description);
        }));
      }
      await Promise.all(operations);
    });
  });
});

describe('MemoryDatabase', () => {
  it('exposes one registry for its lifetime', async () => {
    const db = new MemoryDatabase();
    await db.ping();

    expect(db.getTaskRepository()).toBe(db.getTaskRepository());
    await db.disconnect();
  });
});
