import type {
  Clock,
  IEventBus,
  ITaskStore,
  Task,
  TaskCreatedEvent,
  TaskCreateInput,
  TaskDeletedEvent,
  TaskPage,
  TaskPatch,
  TaskPriority,
  TaskQuery,
  TaskStatistics,
  TaskStatus,
  TaskUpdatedEvent,
} from '@taskdeck/core';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  Events,
  IdSequence,
  MAX_PAGE_SIZE,
  ValidationError,
  checkDescription,
  checkPriority,
  checkStatus,
  createLogger,
  createMonotonicClock,
  normalizeDueDate,
  normalizeTags,
  normalizeTitle,
} from '@taskdeck/core';
import { Mutex } from '../utils/mutex.js';

const log = createLogger('TaskStore');

export interface MemoryTaskStoreOptions {
  clock?: Clock;
  /** Receives task:created / task:updated / task:deleted */
  eventBus?: IEventBus;
}

type TaskFields = Omit<Task, 'id' | 'createdAt' | 'updatedAt'>;

/** A validated patch: every present key is already normalized. */
interface PreparedPatch {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string | null;
  tags?: string[];
}

function copyTask(task: Task): Task {
  return { ...task, tags: [...task.tags] };
}

function sameTags(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag === b[i]);
}

/** createdAt descending, then id ascending */
function compareNewestFirst(a: Task, b: Task): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return a.id - b.id;
}

function rejectNull(field: string, value: unknown): void {
  if (value === null) {
    throw new ValidationError(field, `${field} cannot be cleared`);
  }
}

function prepareCreate(input: TaskCreateInput): TaskFields {
  const fields: TaskFields = {
    title: normalizeTitle(input.title),
    status: checkStatus(input.status ?? 'active'),
    priority: checkPriority(input.priority ?? 'medium'),
    tags: normalizeTags(input.tags ?? []),
  };
  if (input.description !== undefined) {
    fields.description = checkDescription(input.description);
  }
  if (input.dueDate !== undefined) {
    fields.dueDate = normalizeDueDate(input.dueDate);
  }
  return fields;
}

function preparePatch(patch: TaskPatch): PreparedPatch {
  const prepared: PreparedPatch = {};
  if (patch.title !== undefined) {
    rejectNull('title', patch.title);
    prepared.title = normalizeTitle(patch.title);
  }
  if (patch.description !== undefined) {
    prepared.description = patch.description === null ? null : checkDescription(patch.description);
  }
  if (patch.status !== undefined) {
    rejectNull('status', patch.status);
    prepared.status = checkStatus(patch.status);
  }
  if (patch.priority !== undefined) {
    rejectNull('priority', patch.priority);
    prepared.priority = checkPriority(patch.priority);
  }
  if (patch.dueDate !== undefined) {
    prepared.dueDate = patch.dueDate === null ? null : normalizeDueDate(patch.dueDate);
  }
  if (patch.tags !== undefined) {
    rejectNull('tags', patch.tags);
    prepared.tags = normalizeTags(patch.tags);
  }
  if (Object.keys(prepared).length === 0) {
    throw new ValidationError('input', 'no fields provided');
  }
  return prepared;
}

/** Applies a prepared patch to a copy. Returns null when nothing would change. */
function applyPatch(existing: Task, patch: PreparedPatch): Task | null {
  const next = copyTask(existing);
  let changed = false;

  if (patch.title !== undefined && patch.title !== existing.title) {
    next.title = patch.title;
    changed = true;
  }
  if (patch.status !== undefined && patch.status !== existing.status) {
    next.status = patch.status;
    changed = true;
  }
  if (patch.priority !== undefined && patch.priority !== existing.priority) {
    next.priority = patch.priority;
    changed = true;
  }
  if (patch.tags !== undefined && !sameTags(patch.tags, existing.tags)) {
    next.tags = [...patch.tags];
    changed = true;
  }
  if (patch.description === null) {
    if (existing.description !== undefined) {
      delete next.description;
      changed = true;
    }
  } else if (patch.description !== undefined && patch.description !== existing.description) {
    next.description = patch.description;
    changed = true;
  }
  if (patch.dueDate === null) {
    if (existing.dueDate !== undefined) {
      delete next.dueDate;
      changed = true;
    }
  } else if (patch.dueDate !== undefined && patch.dueDate !== existing.dueDate) {
    next.dueDate = patch.dueDate;
    changed = true;
  }

  return changed ? next : null;
}

function checkPagination(page: number, pageSize: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError('page', 'page must be an integer >= 1');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError('pageSize', `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
}

/**
 * Volatile task store. One mutex guards the id sequence and the map for
 * every operation, reads included. Input is validated before the lock is
 * taken, so a rejected call never touches stored state.
 */
export class MemoryTaskStore implements ITaskStore {
  private readonly tasks = new Map<number, Task>();
  private readonly ids = new IdSequence();
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  private readonly eventBus: IEventBus | null;

  constructor(options: MemoryTaskStoreOptions = {}) {
    this.clock = options.clock ?? createMonotonicClock();
    this.eventBus = options.eventBus ?? null;
  }

  async create(input: TaskCreateInput): Promise<Task> {
    const fields = prepareCreate(input);

    const task = await this.mutex.withLock(() => {
      const now = this.clock.now().toISOString();
      const stored: Task = { id: this.ids.take(), ...fields, createdAt: now, updatedAt: now };
      this.tasks.set(stored.id, stored);
      return copyTask(stored);
    });

    log.info(`Task ${task.id} created`, { title: task.title });
    this.eventBus?.emit(Events.TASK_CREATED, { task: copyTask(task) } satisfies TaskCreatedEvent);
    return task;
  }

  async get(taskId: number): Promise<Task | null> {
    return this.mutex.withLock(() => {
      const task = this.tasks.get(taskId);
      return task ? copyTask(task) : null;
    });
  }

  async list(query: TaskQuery = {}): Promise<TaskPage> {
    const page = query.page ?? DEFAULT_PAGE;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;
    checkPagination(page, pageSize);

    const wanted = new Set(
      (query.tags ?? []).map((t) => t.trim().toLowerCase()).filter((t) => t !== ''),
    );

    return this.mutex.withLock(() => {
      const matches = Array.from(this.tasks.values())
        .filter((t) => !query.status || t.status === query.status)
        .filter((t) => !query.priority || t.priority === query.priority)
        .filter((t) => wanted.size === 0 || t.tags.some((tag) => wanted.has(tag)))
        .sort(compareNewestFirst);

      const start = (page - 1) * pageSize;
      return {
        tasks: matches.slice(start, start + pageSize).map(copyTask),
        total: matches.length,
      };
    });
  }

  async listByStatus(status: TaskStatus): Promise<Task[]> {
    checkStatus(status);
    return this.mutex.withLock(() =>
      Array.from(this.tasks.values())
        .filter((t) => t.status === status)
        .sort(compareNewestFirst)
        .map(copyTask),
    );
  }

  async update(taskId: number, patch: TaskPatch): Promise<Task | null> {
    const prepared = preparePatch(patch);

    const outcome = await this.mutex.withLock(() => {
      const existing = this.tasks.get(taskId);
      if (!existing) return null;

      const next = applyPatch(existing, prepared);
      if (!next) {
        return { task: copyTask(existing), previousStatus: existing.status, changed: false };
      }
      next.updatedAt = this.clock.now().toISOString();
      this.tasks.set(taskId, next);
      return { task: copyTask(next), previousStatus: existing.status, changed: true };
    });

    if (!outcome) return null;
    if (outcome.changed) {
      log.debug(`Task ${taskId} updated`);
      this.eventBus?.emit(Events.TASK_UPDATED, {
        task: copyTask(outcome.task),
        previousStatus: outcome.previousStatus,
      } satisfies TaskUpdatedEvent);
    }
    return outcome.task;
  }

  async delete(taskId: number): Promise<boolean> {
    const removed = await this.mutex.withLock(() => this.tasks.delete(taskId));
    if (removed) {
      log.info(`Task ${taskId} deleted`);
      this.eventBus?.emit(Events.TASK_DELETED, { taskId } satisfies TaskDeletedEvent);
    }
    return removed;
  }

  async statistics(): Promise<TaskStatistics> {
    return this.mutex.withLock(() => {
      const stats: TaskStatistics = { total: 0, active: 0, completed: 0, archived: 0 };
      for (const task of this.tasks.values()) {
        stats.total += 1;
        stats[task.status] += 1;
      }
      return stats;
    });
  }

  /** Drops every task and restarts ids at 1. */
  async clear(): Promise<void> {
    await this.mutex.withLock(() => {
      this.tasks.clear();
      this.ids.reset();
    });
    log.info('Task store cleared');
  }
}
