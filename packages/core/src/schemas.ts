import { z } from 'zod';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  JOB_DURATION_MAX,
  JOB_DURATION_MIN,
  MAX_PAGE_SIZE,
} from './constants.js';
import { ValidationError } from './errors.js';
import { TASK_PRIORITIES, TASK_STATUSES } from './models/task.js';

// Boundary schemas: they shape untyped input into core types. Field rules
// that depend on normalization (trimmed title, tag count) stay in the store.

const TIMESTAMP_SCHEMA = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
    return z.NEVER;
  }
  return date.toISOString();
});

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const TaskPrioritySchema = z.enum(TASK_PRIORITIES);

/**
 * A number, or a string of digits (path and query values). Anything else,
 * booleans and arrays included, fails before coercion can accept it.
 */
function wholeNumber(inner: z.ZodNumber) {
  return z
    .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a whole number')])
    .pipe(inner);
}

export const TaskIdSchema = wholeNumber(z.coerce.number().int().positive());

export const TaskCreateSchema = z
  .object({
    title: z.string(),
    description: z.string().optional(),
    status: TaskStatusSchema.optional(),
    priority: TaskPrioritySchema.optional(),
    dueDate: TIMESTAMP_SCHEMA.optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

export const TaskPatchSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().nullable().optional(),
    status: TaskStatusSchema.optional(),
    priority: TaskPrioritySchema.optional(),
    dueDate: TIMESTAMP_SCHEMA.nullable().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

/** Query-string shaped: numbers may arrive as strings, tags as one value or many. */
export const TaskQuerySchema = z.object({
  status: TaskStatusSchema.optional(),
  priority: TaskPrioritySchema.optional(),
  tags: z
    .union([z.string(), z.array(z.string())])
    .transform((v) => (Array.isArray(v) ? v : [v]))
    .optional(),
  page: wholeNumber(z.coerce.number().int().min(1)).default(DEFAULT_PAGE),
  pageSize: wholeNumber(z.coerce.number().int().min(1).max(MAX_PAGE_SIZE)).default(DEFAULT_PAGE_SIZE),
});

export const JobDurationSchema = wholeNumber(
  z.coerce.number().int().min(JOB_DURATION_MIN).max(JOB_DURATION_MAX),
).default(10);

/** Parse or throw a ValidationError naming the first failing field. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new ValidationError(field, issue ? `${field}: ${issue.message}` : 'Invalid input');
}
