import type { ITaskStore, Task, TaskCreateInput, TaskPatch, TaskStatistics } from '@taskdeck/core';
import {
  TaskCreateSchema,
  TaskIdSchema,
  TaskPatchSchema,
  TaskQuerySchema,
  TaskStatusSchema,
  parseInput,
} from '@taskdeck/core';
import { guard, notFound, ok, type ServiceResult } from './result.js';

export interface TaskListResponse {
  tasks: Task[];
  total: number;
  page: number;
  pageSize: number;
}

export interface StatisticsResponse {
  statistics: TaskStatistics;
  timestamp: string;
}

function toCreateInput(raw: unknown): TaskCreateInput {
  const body = parseInput(TaskCreateSchema, raw);
  const input: TaskCreateInput = { title: body.title };
  if (body.description !== undefined) input.description = body.description;
  if (body.status !== undefined) input.status = body.status;
  if (body.priority !== undefined) input.priority = body.priority;
  if (body.dueDate !== undefined) input.dueDate = body.dueDate;
  if (body.tags !== undefined) input.tags = body.tags;
  return input;
}

function toPatch(raw: unknown): TaskPatch {
  const body = parseInput(TaskPatchSchema, raw);
  const patch: TaskPatch = {};
  if (body.title !== undefined) patch.title = body.title;
  if (body.description !== undefined) patch.description = body.description;
  if (body.status !== undefined) patch.status = body.status;
  if (body.priority !== undefined) patch.priority = body.priority;
  if (body.dueDate !== undefined) patch.dueDate = body.dueDate;
  if (body.tags !== undefined) patch.tags = body.tags;
  return patch;
}

/**
 * Boundary over the task store: takes untyped request input, hands typed
 * values to the store, and reports absence and validation as results.
 */
export class TaskService {
  constructor(
    private readonly store: ITaskStore,
    private readonly defaultPageSize: number,
  ) {}

  list(rawQuery: unknown = {}): Promise<ServiceResult<TaskListResponse>> {
    return guard(async () => {
      const query = parseInput(TaskQuerySchema, withDefaultPageSize(rawQuery, this.defaultPageSize));
      const { tasks, total } = await this.store.list(query);
      return ok({ tasks, total, page: query.page, pageSize: query.pageSize });
    });
  }

  listByStatus(rawStatus: unknown): Promise<ServiceResult<Task[]>> {
    return guard(async () => ok(await this.store.listByStatus(parseInput(TaskStatusSchema, rawStatus))));
  }

  get(rawId: unknown): Promise<ServiceResult<Task>> {
    return guard(async () => {
      const id = parseInput(TaskIdSchema, rawId);
      const task = await this.store.get(id);
      return task ? ok(task) : notFound<Task>('task', id);
    });
  }

  create(rawInput: unknown): Promise<ServiceResult<Task>> {
    return guard(async () => ok(await this.store.create(toCreateInput(rawInput))));
  }

  update(rawId: unknown, rawPatch: unknown): Promise<ServiceResult<Task>> {
    return guard(async () => {
      const id = parseInput(TaskIdSchema, rawId);
      const task = await this.store.update(id, toPatch(rawPatch));
      return task ? ok(task) : notFound<Task>('task', id);
    });
  }

  delete(rawId: unknown): Promise<ServiceResult<{ message: string }>> {
    return guard(async () => {
      const id = parseInput(TaskIdSchema, rawId);
      const removed = await this.store.delete(id);
      return removed ? ok({ message: `Task ${id} deleted successfully` }) : notFound<{ message: string }>('task', id);
    });
  }

  async statistics(): Promise<ServiceResult<StatisticsResponse>> {
    const statistics = await this.store.statistics();
    return ok({ statistics, timestamp: new Date().toISOString() });
  }
}

/** Fills pageSize from config when the caller left it out or undefined. */
function withDefaultPageSize(rawQuery: unknown, pageSize: number): unknown {
  if (rawQuery === null || typeof rawQuery !== 'object' || Array.isArray(rawQuery)) {
    return rawQuery;
  }
  if ('pageSize' in rawQuery && rawQuery.pageSize !== undefined) {
    return rawQuery;
  }
  return { ...rawQuery, pageSize };
}
