import { z } from 'zod';

type FieldSchema = z.core.$ZodType;

/**
 * A length of time. Serialized as a floating-point count of seconds.
 */
export class Duration {
  constructor(public readonly milliseconds: number) {}

  static fromSeconds(seconds: number): Duration {
    return new Duration(seconds * 1000);
  }

  totalSeconds(): number {
    return this.milliseconds / 1000;
  }
}

const durationSchemas = new WeakSet<FieldSchema>();

/**
 * Zod schema for a `Duration` field. Fields declared with it accept a
 * number of seconds on the wire.
 *
 * @example
 * ```ts
 * const TaskSchema = z.object({
 *   id: z.number(),
 *   estimate: duration().optional(),
 * });
 * ```
 */
export function duration() {
  const schema = z.instanceof(Duration);
  durationSchemas.add(schema);
  return schema;
}

/** Kind of temporal value a schema field holds. */
export type TemporalKind = 'datetime' | 'duration';

/**
 * Strips optional, nullable and default wrappers from a field schema.
 */
export function unwrapSchema(schema: FieldSchema): FieldSchema {
  let current = schema;
  while (
    current instanceof z.ZodOptional ||
    current instanceof z.ZodNullable ||
    current instanceof z.ZodDefault
  ) {
    current = current.unwrap();
  }
  return current;
}

/**
 * Returns the temporal kind of a field schema, or `undefined` for
 * non-temporal fields.
 */
export function temporalKind(schema: FieldSchema): TemporalKind | undefined {
  const inner = unwrapSchema(schema);
  if (inner instanceof z.ZodDate) return 'datetime';
  if (durationSchemas.has(inner)) return 'duration';
  return undefined;
}

/** Wire keywords that resolve to the current time. */
const CURRENT_TIME_KEYWORDS = new Set(['CURRENT_TIMESTAMP', 'CURRENT_DATE', 'CURRENT_TIME']);

/**
 * Converts a wire value into the temporal type of its field.
 * Values of the wrong shape are returned unchanged and left to schema
 * validation.
 */
export function parseTemporal(kind: TemporalKind, value: unknown): unknown {
  if (kind === 'datetime') {
    if (typeof value !== 'string') return value;
    if (CURRENT_TIME_KEYWORDS.has(value.toUpperCase())) return new Date();
    return new Date(value);
  }

  if (typeof value === 'number') return Duration.fromSeconds(value);
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Duration.fromSeconds(Number(value));
  }
  return value;
}

/**
 * Normalizes a temporal value for the wire: dates become ISO-8601 text and
 * durations a number of seconds. Other values pass through.
 */
export function serializeTemporal(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Duration) return value.totalSeconds();
  return value;
}
