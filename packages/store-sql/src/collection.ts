// packages/store-sql/src/collection.ts
import { sql, type Kysely } from 'kysely';
import { toRow, type Collection, type Id, type Row } from '@netlace/core';
import type { Fragment } from './where';

export type DynamicSchema = Record<string, Record<string, unknown>>;

/** FROM clause, the alias whose rows come back, and the AND-ed conditions. */
export interface SelectShape {
  from: Fragment;
  alias: string;
  table: string;
  primaryKey: string;
  conditions: Fragment[];
}

/**
 * A lazily executed SELECT. Nothing runs until size/isEmpty/toArray; every
 * call issues a fresh query so results track the current table contents.
 */
export class SqlCollection implements Collection {
  constructor(
    private readonly db: Kysely<DynamicSchema>,
    private readonly shape: SelectShape
  ) {}

  private where(): Fragment {
    const { conditions } = this.shape;
    return conditions.length ? sql` where ${sql.join(conditions, sql` and `)}` : sql.raw('');
  }

  async size(): Promise<number> {
    const { rows } = await sql<{ n: unknown }>`select count(*) as n from ${this.shape.from}${this.where()}`.execute(this.db);
    return Number(rows[0]?.n ?? 0);
  }

  async isEmpty(): Promise<boolean> {
    const { rows } = await sql<{ hit: unknown }>`select 1 as hit from ${this.shape.from}${this.where()} limit 1`.execute(this.db);
    return rows.length === 0;
  }

  async toArray(): Promise<Row[]> {
    const { alias, table, primaryKey } = this.shape;
    const { rows } = await sql<Record<string, unknown>>`select ${sql.raw(`${alias}.*`)} from ${this.shape.from}${this.where()}`.execute(this.db);
    return rows.map((r) => toRow(r, primaryKey, table));
  }

  whereIdIn(ids: readonly Id[]): SqlCollection {
    const { alias, primaryKey } = this.shape;
    const cond = ids.length
      ? sql`${sql.ref(`${alias}.${primaryKey}`)} in (${sql.join(ids)})`
      : sql`1 = 0`;
    return new SqlCollection(this.db, { ...this.shape, conditions: [...this.shape.conditions, cond] });
  }
}
