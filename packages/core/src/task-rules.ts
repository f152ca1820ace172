import {
  DESCRIPTION_MAX_LENGTH,
  MAX_TAGS,
  TITLE_MAX_LENGTH,
} from './constants.js';
import { ValidationError } from './errors.js';
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type TaskPriority,
  type TaskStatus,
} from './models/task.js';

export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed === '') {
    throw new ValidationError('title', 'Title cannot be empty');
  }
  if (trimmed.length > TITLE_MAX_LENGTH) {
    throw new ValidationError('title', `Title must be at most ${TITLE_MAX_LENGTH} characters`);
  }
  return trimmed;
}

export function checkDescription(description: string): string {
  if (description.length > DESCRIPTION_MAX_LENGTH) {
    throw new ValidationError(
      'description',
      `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
    );
  }
  return description;
}

/** Trim + lowercase, drop empties. The limit applies to what is left. */
export function normalizeTags(tags: readonly string[]): string[] {
  const normalized = tags.map((t) => t.trim().toLowerCase()).filter((t) => t !== '');
  if (normalized.length > MAX_TAGS) {
    throw new ValidationError('tags', `maximum ${MAX_TAGS} tags allowed`);
  }
  return normalized;
}

export function normalizeDueDate(value: string): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError('dueDate', `Invalid timestamp: ${value}`);
  }
  return new Date(ms).toISOString();
}

export function checkStatus(status: string): TaskStatus {
  const match = TASK_STATUSES.find((s) => s === status);
  if (!match) {
    throw new ValidationError('status', `Unknown status "${status}"`);
  }
  return match;
}

export function checkPriority(priority: string): TaskPriority {
  const match = TASK_PRIORITIES.find((p) => p === priority);
  if (!match) {
    throw new ValidationError('priority', `Unknown priority "${priority}"`);
  }
  return match;
}
