// packages/store-sql/src/where.ts
import { sql, type RawBuilder } from 'kysely';
import type { Where } from '@netlace/core';

export type Fragment = RawBuilder<unknown>;

// table name → alias in the current statement (t0, t1, ...)
export type AliasMap = Record<string, string>;

// better-sqlite3 cannot bind booleans; MySQL reads 1/0 the same way
export function bindable(v: unknown): unknown {
  return typeof v === 'boolean' ? Number(v) : v;
}

export function qualify(field: string, aliases: AliasMap, baseAlias: string): Fragment {
  const dot = field.indexOf('.');
  if (dot < 0) return sql.ref(`${baseAlias}.${field}`);
  const table = field.slice(0, dot);
  const column = field.slice(dot + 1);
  return sql.ref(`${aliases[table] ?? baseAlias}.${column}`);
}

function list(v: unknown): unknown[] {
  return (Array.isArray(v) ? v : [v]).map(bindable);
}

/** Compiles a Where into a SQL fragment; bare fields belong to `baseAlias`. */
export function whereToSql(w: Where, aliases: AliasMap, baseAlias: string): Fragment {
  if ('and' in w) {
    if (w.and.length === 0) return sql`1 = 1`;
    return sql`(${sql.join(w.and.map((x) => whereToSql(x, aliases, baseAlias)), sql` and `)})`;
  }
  if ('or' in w) {
    if (w.or.length === 0) return sql`1 = 0`;
    return sql`(${sql.join(w.or.map((x) => whereToSql(x, aliases, baseAlias)), sql` or `)})`;
  }

  const col = qualify(w.field, aliases, baseAlias);
  const v = bindable(w.value);
  switch (w.op) {
    case 'eq': return sql`${col} = ${v}`;
    case 'neq': return sql`${col} <> ${v}`;
    case 'gt': return sql`${col} > ${v}`;
    case 'gte': return sql`${col} >= ${v}`;
    case 'lt': return sql`${col} < ${v}`;
    case 'lte': return sql`${col} <= ${v}`;
    case 'between': {
      const [start, end] = list(w.value);
      return sql`(${col} >= ${start} and ${col} < ${end})`;
    }
    case 'in': {
      const arr = list(w.value);
      return arr.length ? sql`${col} in (${sql.join(arr)})` : sql`1 = 0`;
    }
    case 'nin': {
      const arr = list(w.value);
      return arr.length ? sql`${col} not in (${sql.join(arr)})` : sql`1 = 1`;
    }
    case 'exists': return w.value ? sql`${col} is not null` : sql`${col} is null`;
    case 'is': {
      if (w.value === 'null') return sql`${col} is null`;
      if (w.value === 'not_null') return sql`${col} is not null`;
      if (w.value === 'true') return sql`${col} = TRUE`;
      if (w.value === 'false') return sql`${col} = FALSE`;
      throw new Error(`Unsupported is-operand: ${String(w.value)}`);
    }
    case 'like': {
      const raw = String(w.value ?? '');
      return sql`${col} like ${/[%_]/.test(raw) ? raw : `${raw}%`}`;
    }
    case 'ilike': {
      const raw = String(w.value ?? '').toLowerCase();
      return sql`lower(${col}) like ${/[%_]/.test(raw) ? raw : `${raw}%`}`;
    }
    case 'contains':
      return sql`lower(${col}) like ${`%${String(w.value ?? '').toLowerCase()}%`}`;
  }
}
