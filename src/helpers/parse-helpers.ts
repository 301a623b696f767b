import type { z } from "zod";
import { InvalidValueError, NotFoundError } from "../errors.js";

/** Largest value of a PostgreSQL INTEGER / SERIAL column. */
const MAX_SERIAL_ID = 2_147_483_647;

/**
 * Parses a numeric path id. Anything that is not a positive integer a
 * SERIAL column can hold is reported as the resource being absent, same as a foreign id.
 */
export function parseIdParam(value: string | undefined, resource: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id) || id <= 0 || id > MAX_SERIAL_ID) {
    throw new NotFoundError(`${resource} not found`);
  }
  return id;
}

/**
 * Validates a request body against a zod schema, turning issues into an
 * InvalidValueError such as `sets: Number must be less than or equal to 99`.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const errors = parsed.error.issues.map(i => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new InvalidValueError(errors.join(", "));
  }
  return parsed.data;
}
