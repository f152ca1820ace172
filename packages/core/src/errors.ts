/** Input broke a field constraint. Nothing was written. */
export class ValidationError extends Error {
  readonly kind = 'validation' as const;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type EntityKind = 'task' | 'job';

/**
 * Stores report absence as null/false; this is for callers that want
 * an error value to hand across a boundary.
 */
export class NotFoundError extends Error {
  readonly kind = 'not_found' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: string | number,
  ) {
    super(`${entity === 'task' ? 'Task' : 'Job'} with ID ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
