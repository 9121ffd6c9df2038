import { jsonValueSchema, type JsonValue } from '@plantsight/event-bus';
import type { Row } from '../../db/client';
import { TelemetryError } from '../../errors';
import type { JsonObject } from '../../tenancy/types';
import { jsonObjectSchema } from '../../validation';

function malformed(column: string, expected: string): TelemetryError {
  return new TelemetryError('internal', 'malformed_row', `Column ${column} is not a ${expected}`, { column });
}

export function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw malformed(column, 'string');
  }
  return value;
}

export function readNullableText(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : readText(row, column);
}

/** BIGINT and NUMERIC columns arrive as strings from pg; both forms are accepted. */
export function readNumber(row: Row, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw malformed(column, 'number');
  }
  return parsed;
}

export function readNullableNumber(row: Row, column: string): number | null {
  const value = row[column];
  return value === null || value === undefined ? null : readNumber(row, column);
}

export function readBoolean(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw malformed(column, 'boolean');
  }
  return value;
}

export function readTimestamp(row: Row, column: string): string {
  const value = row[column];
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw malformed(column, 'timestamp');
  }
  return date.toISOString();
}

export function readNullableTimestamp(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : readTimestamp(row, column);
}

export function readJsonObject(row: Row, column: string): JsonObject {
  const value = row[column];
  if (value === null || value === undefined) {
    return {};
  }
  const result = jsonObjectSchema.safeParse(value);
  if (!result.success) {
    throw malformed(column, 'JSON object');
  }
  return result.data;
}

export function readNullableJson(row: Row, column: string): JsonValue | null {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  const result = jsonValueSchema.safeParse(value);
  if (!result.success) {
    throw malformed(column, 'JSON value');
  }
  return result.data;
}

export function readTextArray(row: Row, column: string): string[] {
  const value = row[column];
  if (!Array.isArray(value)) {
    throw malformed(column, 'text array');
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

export function readEnum<T extends string>(row: Row, column: string, allowed: readonly T[]): T {
  const value = readText(row, column);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw malformed(column, allowed.join(' | '));
  }
  return match;
}

/** JSONB parameters are sent as text so arrays are not coerced into Postgres arrays. */
export function jsonParam(value: JsonValue | JsonObject | null): string | null {
  return value === null ? null : JSON.stringify(value);
}

/** Collects `column = $n` assignments for the defined entries of a patch. */
export class UpdateBuilder {
  private readonly assignments: string[] = [];
  readonly values: unknown[];

  constructor(initialValues: unknown[] = []) {
    this.values = [...initialValues];
  }

  set(column: string, value: unknown, cast?: string): this {
    if (value === undefined) {
      return this;
    }
    this.values.push(value);
    const placeholder = `$${this.values.length}`;
    this.assignments.push(`${column} = ${cast ? `${placeholder}::${cast}` : placeholder}`);
    return this;
  }

  toSql(): string {
    return this.assignments.join(', ');
  }
}

/** Collects `WHERE` conditions with positional parameters. */
export class WhereBuilder {
  private readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  add(condition: (placeholder: string) => string, value: unknown): this {
    if (value === undefined) {
      return this;
    }
    this.values.push(value);
    this.conditions.push(condition(`$${this.values.length}`));
    return this;
  }

  raw(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  nextPlaceholder(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  toSql(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

export function requireRow(rows: Row[], context: string): Row {
  const row = rows[0];
  if (!row) {
    throw new TelemetryError('internal', 'missing_row', `${context} returned no row`);
  }
  return row;
}
