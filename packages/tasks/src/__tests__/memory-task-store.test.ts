import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Clock, IEventBus, Task } from '@taskdeck/core';
import { Events, ValidationError } from '@taskdeck/core';
import { MemoryTaskStore } from '../stores/memory-task-store.js';

const T0 = '2025-06-01T12:00:00.000Z';

/** Each reading is `stepMs` after the previous one; the first is T0. */
function tickingClock(stepMs = 1000): Clock {
  let t = Date.parse(T0) - stepMs;
  return { now: () => new Date((t += stepMs)) };
}

function fixedClock(): Clock {
  return { now: () => new Date(T0) };
}

function fakeEventBus() {
  const bus = {
    on: vi.fn(() => () => {}),
    once: vi.fn(() => () => {}),
    emit: vi.fn(),
    removeAllListeners: vi.fn(),
  };
  const typed: IEventBus = bus;
  return { bus: typed, emit: bus.emit };
}

async function seed(store: MemoryTaskStore, count: number, tagsFor?: (i: number) => string[]): Promise<Task[]> {
  const created: Task[] = [];
  for (let i = 1; i <= count; i++) {
    created.push(await store.create({ title: `Task ${i}`, tags: tagsFor?.(i) ?? [] }));
  }
  return created;
}

describe('MemoryTaskStore', () => {
  let store: MemoryTaskStore;

  beforeEach(() => {
    store = new MemoryTaskStore({ clock: tickingClock() });
  });

  describe('create()', () => {
    it('assigns id 1, defaults and normalized tags', async () => {
      const task = await store.create({ title: 'Buy milk', tags: ['Home ', ' Errand'] });

      expect(task).toEqual({
        id: 1,
        title: 'Buy milk',
        status: 'active',
        priority: 'medium',
        tags: ['home', 'errand'],
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('round-trips through get()', async () => {
      const created = await store.create({
        title: '  Write report ',
        description: 'Quarterly numbers',
        status: 'completed',
        priority: 'high',
        dueDate: '2025-07-01T09:00:00Z',
        tags: ['work'],
      });

      expect(created.title).toBe('Write report');
      expect(created.dueDate).toBe('2025-07-01T09:00:00.000Z');
      expect(await store.get(created.id)).toEqual(created);
    });

    it('returns copies that do not alias stored state', async () => {
      const created = await store.create({ title: 'Copy me', tags: ['a'] });
      created.tags.push('b');
      created.title = 'changed';

      const stored = await store.get(created.id);
      expect(stored?.tags).toEqual(['a']);
      expect(stored?.title).toBe('Copy me');
    });

    it('rejects an empty title without storing anything or consuming an id', async () => {
      await expect(store.create({ title: '   ' })).rejects.toThrow(ValidationError);
      await expect(store.create({ title: '   ' })).rejects.toMatchObject({ field: 'title' });

      expect((await store.statistics()).total).toBe(0);
      expect((await store.create({ title: 'first real' })).id).toBe(1);
    });

    it('rejects more than 5 tags', async () => {
      await expect(
        store.create({ title: 't', tags: ['a', 'b', 'c', 'd', 'e', 'f'] }),
      ).rejects.toThrow('maximum 5 tags allowed');
    });

    it('hands out distinct ids to concurrent creates', async () => {
      const tasks = await Promise.all(
        Array.from({ length: 50 }, (_, i) => store.create({ title: `parallel ${i}` })),
      );
      const ids = tasks.map((t) => t.id).sort((a, b) => a - b);

      expect(new Set(ids).size).toBe(50);
      expect(ids).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    });

    it('never reuses the id of a deleted task', async () => {
      await seed(store, 3);
      await store.delete(3);
      const next = await store.create({ title: 'after delete' });
      expect(next.id).toBe(4);
    });
  });

  describe('list()', () => {
    it('returns the second page of 15 tasks', async () => {
      await seed(store, 15);

      const { tasks, total } = await store.list({ page: 2, pageSize: 10 });

      expect(total).toBe(15);
      expect(tasks.map((t) => t.id)).toEqual([5, 4, 3, 2, 1]);
    });

    it('defaults to page 1 of 10, newest first', async () => {
      await seed(store, 12);

      const { tasks, total } = await store.list();

      expect(total).toBe(12);
      expect(tasks.map((t) => t.id)).toEqual([12, 11, 10, 9, 8, 7, 6, 5, 4, 3]);
    });

    it('pages concatenate to the full ordering without gaps or repeats', async () => {
      await seed(store, 23);
      const full = (await store.list({ pageSize: 100 })).tasks.map((t) => t.id);

      const pages: number[][] = [];
      for (let page = 1; page <= 5; page++) {
        pages.push((await store.list({ page, pageSize: 5 })).tasks.map((t) => t.id));
      }

      expect(pages.flat()).toEqual(full);
      expect(pages[4]).toHaveLength(3);
    });

    it('returns an empty page past the end with the real total', async () => {
      await seed(store, 3);
      expect(await store.list({ page: 4, pageSize: 10 })).toEqual({ tasks: [], total: 3 });
    });

    it('breaks createdAt ties by ascending id', async () => {
      const sameInstant = new MemoryTaskStore({ clock: fixedClock() });
      await seed(sameInstant, 3);

      const { tasks } = await sameInstant.list();
      expect(tasks.map((t) => t.id)).toEqual([1, 2, 3]);
    });

    it('gives identical results for repeated reads', async () => {
      await seed(store, 7, (i) => (i % 2 === 0 ? ['even'] : ['odd']));
      const first = await store.list({ tags: ['even'], pageSize: 3 });
      const second = await store.list({ tags: ['even'], pageSize: 3 });
      expect(second).toEqual(first);
    });

    it('filters by status and priority together', async () => {
      await store.create({ title: 'a', status: 'completed', priority: 'high' });
      await store.create({ title: 'b', status: 'completed', priority: 'low' });
      await store.create({ title: 'c', status: 'active', priority: 'high' });

      const { tasks, total } = await store.list({ status: 'completed', priority: 'high' });
      expect(total).toBe(1);
      expect(tasks[0]?.title).toBe('a');
    });

    it('matches any of the requested tags, normalized', async () => {
      await store.create({ title: 'home only', tags: ['home'] });
      await store.create({ title: 'work only', tags: ['work'] });
      await store.create({ title: 'both', tags: ['home', 'work'] });
      await store.create({ title: 'none' });

      const { tasks } = await store.list({ tags: [' HOME', 'garden'] });
      expect(tasks.map((t) => t.title)).toEqual(['both', 'home only']);
    });

    it('returns exactly the tasks carrying a tag', async () => {
      const palette = ['red', 'green', 'blue'];
      const created = await seed(store, 12, (i) => palette.filter((_, k) => (i >> k) & 1));

      for (const tag of palette) {
        const { tasks, total } = await store.list({ tags: [tag], pageSize: 100 });
        const expected = created
          .filter((t) => t.tags.includes(tag))
          .map((t) => t.id)
          .sort((a, b) => b - a);
        expect(tasks.map((t) => t.id)).toEqual(expected);
        expect(total).toBe(expected.length);
      }
    });

    it('treats an empty tag list as no tag filter', async () => {
      await seed(store, 2);
      expect((await store.list({ tags: [] })).total).toBe(2);
    });

    it('rejects out-of-range paging', async () => {
      await expect(store.list({ page: 0 })).rejects.toMatchObject({ field: 'page' });
      await expect(store.list({ pageSize: 0 })).rejects.toMatchObject({ field: 'pageSize' });
      await expect(store.list({ pageSize: 101 })).rejects.toMatchObject({ field: 'pageSize' });
      await expect(store.list({ page: 1.5 })).rejects.toMatchObject({ field: 'page' });
    });
  });

  describe('listByStatus()', () => {
    it('returns every task with the status, newest first', async () => {
      await store.create({ title: 'old', status: 'archived' });
      await store.create({ title: 'live' });
      await store.create({ title: 'new', status: 'archived' });

      const archived = await store.listByStatus('archived');
      expect(archived.map((t) => t.title)).toEqual(['new', 'old']);
    });
  });

  describe('update()', () => {
    it('returns null for an unknown id', async () => {
      expect(await store.update(999, { title: 'nope' })).toBeNull();
    });

    it('rejects an empty patch', async () => {
      const task = await store.create({ title: 'x' });
      await expect(store.update(task.id, {})).rejects.toThrow('no fields provided');
      await expect(store.update(task.id, { title: undefined })).rejects.toThrow('no fields provided');
    });

    it('changes only the supplied fields and refreshes updatedAt', async () => {
      const task = await store.create({ title: 'Draft', description: 'keep me', tags: ['a'] });

      const updated = await store.update(task.id, { status: 'completed', tags: ['B ', 'c'] });

      expect(updated).toEqual({
        ...task,
        status: 'completed',
        tags: ['b', 'c'],
        updatedAt: '2025-06-01T12:00:01.000Z',
      });
      expect(updated?.createdAt).toBe(T0);
    });

    it('leaves updatedAt alone when nothing actually changes', async () => {
      const task = await store.create({ title: 'Same', priority: 'low' });

      const updated = await store.update(task.id, { title: ' Same ', priority: 'low' });

      expect(updated?.updatedAt).toBe(task.updatedAt);
    });

    it('applies nothing when any field is invalid', async () => {
      const task = await store.create({ title: 'Valid' });

      await expect(store.update(task.id, { status: 'archived', title: '' })).rejects.toMatchObject({
        field: 'title',
      });
      expect(await store.get(task.id)).toEqual(task);
    });

    it('clears dueDate and description with null', async () => {
      const task = await store.create({
        title: 'Has extras',
        description: 'notes',
        dueDate: '2025-08-01T00:00:00Z',
      });

      const cleared = await store.update(task.id, { dueDate: null, description: null });

      expect(cleared).not.toHaveProperty('dueDate');
      expect(cleared).not.toHaveProperty('description');
      expect(cleared?.updatedAt).not.toBe(task.updatedAt);
    });

    it('keeps createdAt <= updatedAt across repeated updates', async () => {
      const task = await store.create({ title: 'x' });
      for (const priority of ['high', 'low', 'medium'] as const) {
        const updated = await store.update(task.id, { priority });
        expect(updated && updated.createdAt <= updated.updatedAt).toBe(true);
      }
    });
  });

  describe('delete()', () => {
    it('removes the task once', async () => {
      const task = await store.create({ title: 'gone soon' });

      expect(await store.delete(task.id)).toBe(true);
      expect(await store.get(task.id)).toBeNull();
      expect(await store.delete(task.id)).toBe(false);
    });
  });

  describe('statistics()', () => {
    it('counts by status and always sums to total', async () => {
      const [a, b, c] = await seed(store, 4);
      await store.update(a.id, { status: 'completed' });
      await store.update(b.id, { status: 'archived' });
      await store.delete(c.id);
      await store.create({ title: 'late', status: 'completed' });

      const stats = await store.statistics();

      expect(stats).toEqual({ total: 4, active: 1, completed: 2, archived: 1 });
      expect(stats.active + stats.completed + stats.archived).toBe(stats.total);
    });
  });

  describe('clear()', () => {
    it('drops all tasks and restarts ids', async () => {
      await seed(store, 3);
      await store.clear();

      expect(await store.statistics()).toEqual({ total: 0, active: 0, completed: 0, archived: 0 });
      expect((await store.create({ title: 'fresh' })).id).toBe(1);
    });
  });

  describe('events', () => {
    it('emits created, updated and deleted events', async () => {
      const { bus, emit } = fakeEventBus();
      const withBus = new MemoryTaskStore({ clock: tickingClock(), eventBus: bus });

      const task = await withBus.create({ title: 'watched' });
      await withBus.update(task.id, { status: 'archived' });
      await withBus.update(task.id, { status: 'archived' });
      await withBus.delete(task.id);

      expect(emit.mock.calls.map((call) => call[0])).toEqual([
        Events.TASK_CREATED,
        Events.TASK_UPDATED,
        Events.TASK_DELETED,
      ]);
      expect(emit).toHaveBeenCalledWith(Events.TASK_UPDATED, {
        task: expect.objectContaining({ id: task.id, status: 'archived' }),
        previousStatus: 'active',
      });
      expect(emit).toHaveBeenCalledWith(Events.TASK_DELETED, { taskId: task.id });
    });
  });
});
