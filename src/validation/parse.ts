import { z } from 'zod';
import { isNotificationType, NotificationType } from '../models/notification.model';
import { FieldErrors, NotFoundError, ValidationError } from '../utils/errors';

export const NON_FIELD_ERRORS = 'nonFieldErrors';

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || NON_FIELD_ERRORS;
    errors[field] = [...(errors[field] || []), issue.message];
  }
  return errors;
}

/** Parses a request body, throwing ValidationError with per-field messages. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}

/** Route ids that are not positive integers cannot match a row. */
export function parseId(value: string | undefined, resource: string): number {
  if (!value || !/^\d+$/.test(value)) {
    throw new NotFoundError(`${resource} not found`);
  }
  const id = parseInt(value, 10);
  if (id <= 0 || !Number.isSafeInteger(id)) {
    throw new NotFoundError(`${resource} not found`);
  }
  return id;
}

export const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;

/** `true`/`1` and `false`/`0`; anything else leaves the filter off. */
export function queryBoolean(value: unknown): boolean | undefined {
  const text = queryString(value)?.toLowerCase();
  if (text === 'true' || text === '1') return true;
  if (text === 'false' || text === '0') return false;
  return undefined;
}

export function queryNotificationType(value: unknown): NotificationType | undefined {
  const text = queryString(value);
  return text && isNotificationType(text) ? text : undefined;
}
