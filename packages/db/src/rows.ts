import { type PoolClient } from 'pg';

export type Queryable = Pick<PoolClient, 'query'>;

function isQueryable(value: unknown): value is Queryable {
  return typeof value === 'object' && value !== null && 'query' in value && typeof value.query === 'function';
}

/** Repositories receive the transaction as an opaque handle from the domain. */
export function queryable(tx: unknown): Queryable {
  if (!isQueryable(tx)) {
    throw new Error('Repository called without a database client');
  }
  return tx;
}

export type Row = Record<string, unknown>;

export function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

export function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.map(String) : [];
}
