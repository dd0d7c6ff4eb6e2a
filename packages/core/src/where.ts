import type { Id, Row, Where } from './types';

/** Resolves a (possibly table-qualified) field name against the row(s) in scope. */
export type FieldResolver = (field: string) => unknown;

export function idKey(id: Id): string {
  return String(id);
}

// rows built by stores remember their table without carrying an extra column
const rowTables = new WeakMap<Row, string>();

/** Member identity inside a union: table plus id, so different entities never collide. */
export function memberKey(row: Row): string {
  return `${rowTables.get(row) ?? ''}:${idKey(row.id)}`;
}

export function toRow(raw: Record<string, unknown>, primaryKey: string, table: string): Row {
  const id = raw[primaryKey];
  let row: Row;
  if (typeof id === 'string' || typeof id === 'number') row = { ...raw, id };
  else if (typeof id === 'bigint') row = { ...raw, id: Number(id) };
  else throw new Error(`Row in ${table} has no usable primary key "${primaryKey}"`);
  rowTables.set(row, table);
  return row;
}

// booleans compare as 1/0 so flags read back from SQL still match
function norm(v: unknown): unknown {
  return typeof v === 'boolean' ? Number(v) : v;
}

export function sameValue(a: unknown, b: unknown): boolean {
  const x = norm(a);
  const y = norm(b);
  if (x === y) return true;
  if ((typeof x === 'number' && typeof y === 'string') || (typeof x === 'string' && typeof y === 'number')) {
    return String(x) === String(y);
  }
  return false;
}

function compare(a: unknown, b: unknown): number | null {
  const x = norm(a);
  const y = norm(b);
  if (typeof x === 'number' && typeof y === 'number') return x - y;
  if (typeof x === 'string' && typeof y === 'string') return x < y ? -1 : x > y ? 1 : 0;
  return null;
}

// SQL LIKE → RegExp, case-insensitive like the default MySQL/SQLite collations
function likeToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('')
    .map((ch) => (ch === '%' ? '.*' : ch === '_' ? '.' : ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')))
    .join('');
  return new RegExp(`^${body}$`, 'is');
}

function asList(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [v];
}

export function matchesWhere(where: Where, resolve: FieldResolver): boolean {
  if ('and' in where) return where.and.every((w) => matchesWhere(w, resolve));
  if ('or' in where) return where.or.some((w) => matchesWhere(w, resolve));

  const v = resolve(where.field);
  switch (where.op) {
    case 'eq': return sameValue(v, where.value);
    case 'neq': return !sameValue(v, where.value);
    case 'gt': { const c = compare(v, where.value); return c !== null && c > 0; }
    case 'gte': { const c = compare(v, where.value); return c !== null && c >= 0; }
    case 'lt': { const c = compare(v, where.value); return c !== null && c < 0; }
    case 'lte': { const c = compare(v, where.value); return c !== null && c <= 0; }
    case 'in': return asList(where.value).some((x) => sameValue(v, x));
    case 'nin': return !asList(where.value).some((x) => sameValue(v, x));
    case 'between': {
      const [start, end] = asList(where.value);
      const lo = compare(v, start);
      const hi = compare(v, end);
      return lo !== null && hi !== null && lo >= 0 && hi < 0;
    }
    case 'exists': return where.value ? v != null : v == null;
    case 'is': {
      if (where.value === 'null') return v == null;
      if (where.value === 'not_null') return v != null;
      if (where.value === 'true') return sameValue(v, true);
      if (where.value === 'false') return sameValue(v, false);
      throw new Error(`Unsupported is-operand: ${String(where.value)}`);
    }
    case 'like': {
      const raw = String(where.value ?? '');
      const patt = /[%_]/.test(raw) ? raw : `${raw}%`;
      return typeof v === 'string' && likeToRegExp(patt).test(v);
    }
    case 'ilike': {
      const raw = String(where.value ?? '').toLowerCase();
      const patt = /[%_]/.test(raw) ? raw : `${raw}%`;
      return typeof v === 'string' && likeToRegExp(patt).test(v.toLowerCase());
    }
    case 'contains':
      return typeof v === 'string' && v.toLowerCase().includes(String(where.value ?? '').toLowerCase());
  }
}

/**
 * Builds a resolver over several rows keyed by table name. Qualified fields
 * (`invites.is_accepted`) pick the row of that table; bare fields read the
 * default row.
 */
export function scopeResolver(scope: Record<string, Record<string, unknown>>, fallback: string): FieldResolver {
  return (field) => {
    const dot = field.indexOf('.');
    if (dot < 0) return scope[fallback]?.[field];
    const table = field.slice(0, dot);
    const column = field.slice(dot + 1);
    return (scope[table] ?? scope[fallback])?.[column];
  };
}
