import { ArrayCollection } from './collection';
import { matchesWhere, sameValue, scopeResolver, toRow } from './where';
import type {
  Collection,
  HasManyRelation,
  Id,
  ManyToManyRelation,
  Row,
  Store,
  ThroughRelation
} from './types';

type RawRow = Record<string, unknown>;

/**
 * In-process Store over plain row arrays. Collections read the tables on
 * every query, so writes made after a collection was created are visible.
 */
export class MemoryStore implements Store {
  name = 'memory';
  private readonly tables = new Map<string, RawRow[]>();

  constructor(seed: Record<string, RawRow[]> = {}) {
    for (const [table, rows] of Object.entries(seed)) this.tables.set(table, rows.map((r) => ({ ...r })));
  }

  private rows(table: string): RawRow[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  private findRow(table: string, primaryKey: string, id: unknown): RawRow | undefined {
    return this.rows(table).find((r) => sameValue(r[primaryKey], id));
  }

  table(name: string, primaryKey = 'id'): Collection {
    return new ArrayCollection(() => this.rows(name).map((r) => toRow(r, primaryKey, name)));
  }

  manyToMany(ownerId: Id, r: ManyToManyRelation): Collection {
    return new ArrayCollection(() => {
      const out: Row[] = [];
      for (const join of this.rows(r.joinTable)) {
        if (!sameValue(join[r.foreignKey], ownerId)) continue;
        const node = this.findRow(r.table, r.primaryKey, join[r.associationForeignKey]);
        if (!node) continue;
        if (r.filter && !matchesWhere(r.filter, scopeResolver({ [r.joinTable]: join, [r.table]: node }, r.table))) continue;
        out.push(toRow(node, r.primaryKey, r.table));
      }
      return out;
    });
  }

  hasMany(ownerId: Id, r: HasManyRelation): Collection {
    return new ArrayCollection(() =>
      this.rows(r.table)
        .filter((e) => sameValue(e[r.foreignKey], ownerId))
        .filter((e) => !r.filter || matchesWhere(r.filter, scopeResolver({ [r.table]: e }, r.table)))
        .map((e) => toRow(e, r.primaryKey, r.table))
    );
  }

  through(ownerId: Id, r: ThroughRelation): Collection {
    return new ArrayCollection(() => {
      const out: Row[] = [];
      for (const edge of this.rows(r.edge.table)) {
        if (!sameValue(edge[r.edge.foreignKey], ownerId)) continue;
        if (r.edge.filter && !matchesWhere(r.edge.filter, scopeResolver({ [r.edge.table]: edge }, r.edge.table))) continue;
        const node = this.findRow(r.table, r.primaryKey, edge[r.sourceKey]);
        if (!node) continue;
        if (r.filter && !matchesWhere(r.filter, scopeResolver({ [r.table]: node, [r.edge.table]: edge }, r.edge.table))) continue;
        out.push(toRow(node, r.primaryKey, r.table));
      }
      return out;
    });
  }

  async insert(table: string, values: RawRow): Promise<void> {
    this.rows(table).push({ ...values });
  }

  async update(table: string, primaryKey: string, id: Id, values: RawRow): Promise<void> {
    const row = this.findRow(table, primaryKey, id);
    if (!row) throw new Error(`No row in ${table} with ${primaryKey}=${String(id)}`);
    Object.assign(row, values);
  }

  async health() { return { ok: true }; }

  async close(): Promise<void> {
    this.tables.clear();
  }
}
