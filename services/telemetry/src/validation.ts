import { z } from 'zod';
import { jsonValueSchema } from '@plantsight/event-bus';
import { fromZodError } from './errors';

export const jsonObjectSchema = z.record(jsonValueSchema);

/**
 * Accepts an ISO-8601 string with an explicit offset, epoch milliseconds or a Date and yields a
 * valid Date. Years are limited to 0000-9999 so chunk ids keep their fixed width.
 */
export const timestampSchema = z
  .union([z.string().datetime({ offset: true }), z.number().finite(), z.date()])
  .transform((value) => (value instanceof Date ? new Date(value.getTime()) : new Date(value)))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'must be a valid timestamp' })
  .refine((date) => date.getUTCFullYear() >= 0 && date.getUTCFullYear() <= 9999, {
    message: 'must fall between the years 0000 and 9999'
  });

export const optionalNumberSchema = z.number().finite().nullable().optional();

export const scoreSchema = z.number().finite().min(0).max(1);

export const identifierSchema = z.string().trim().min(1).max(50);

export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, context: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error, context);
  }
  return result.data;
}

export function toIsoOrNull(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}
