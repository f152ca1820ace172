import { NotFoundError, ValidationError, type EntityKind } from '@taskdeck/core';

export type ServiceError =
  | { kind: 'validation'; field: string; message: string }
  | { kind: 'not_found'; entity: EntityKind; id: string | number; message: string };

export type ServiceResult<T> = { success: true; data: T } | { success: false; error: ServiceError };

export function ok<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

export function notFound<T>(entity: EntityKind, id: string | number): ServiceResult<T> {
  const err = new NotFoundError(entity, id);
  return { success: false, error: { kind: err.kind, entity, id, message: err.message } };
}

/**
 * Runs an operation and converts a ValidationError into a failed result.
 * Anything else is a fault and propagates.
 */
export async function guard<T>(op: () => Promise<ServiceResult<T>>): Promise<ServiceResult<T>> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof ValidationError) {
      return { success: false, error: { kind: err.kind, field: err.field, message: err.message } };
    }
    throw err;
  }
}
