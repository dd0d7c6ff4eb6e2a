/* tests/helpers.ts */
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { MemoryStore, NodeType, type Id, type Row } from '@netlace/core';
import { SqlStore, type DynamicSchema } from '@netlace/store-sql';

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const FIXTURES = path.join(ROOT, 'tests', 'fixtures');

export const NETWORKS_PATH = path.join(ROOT, 'networks.json');
export const CATALOG_PATH = path.join(ROOT, 'catalog.json');

export type Seed = Record<string, Record<string, unknown>[]>;

export function loadSeed(): Seed {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES, 'seed.json'), 'utf-8'));
}

export function memoryStore(): MemoryStore {
  return new MemoryStore(loadSeed());
}

/** SqlStore over a fresh in-memory SQLite database with the fixture schema and rows. */
export function sqliteStore(): SqlStore {
  const db = new Database(':memory:');
  db.exec(fs.readFileSync(path.join(FIXTURES, 'schema.sql'), 'utf-8'));
  for (const [table, rows] of Object.entries(loadSeed())) {
    for (const row of rows) {
      const cols = Object.keys(row);
      db.prepare(`INSERT INTO ${table} (${cols.join(', ')}) VALUES (${cols.map(() => '?').join(', ')})`)
        .run(...cols.map((c) => row[c]));
    }
  }
  return new SqlStore(new Kysely<DynamicSchema>({ dialect: new SqliteDialect({ database: db }) }));
}

export const Person = new NodeType({ entity: 'person', table: 'people' })
  .declareNetwork('contacts', { through: 'invites' })
  .declareNetwork('acquaintances', {
    through: 'invites',
    filter: { field: 'invites.is_accepted', op: 'is', value: 'true' }
  })
  .declareNetwork('connections')
  .declareNetwork('friends', {
    joinTable: 'friends',
    foreignKey: 'person_id',
    associationForeignKey: 'person_id_friend'
  })
  .declareNetwork('colleagues', {
    through: 'invites',
    foreignKey: 'person_id',
    associationForeignKey: 'person_id_target',
    filter: { field: 'is_accepted', op: 'eq', value: true }
  })
  .declareUnion('associates', ['friends', 'colleagues']);

export const Channel = new NodeType({ entity: 'channel', table: 'channels' })
  .declareHasMany('shows', { table: 'shows', foreignKey: 'channel_id' })
  .declareHasMany('premium_shows', {
    table: 'shows',
    foreignKey: 'channel_id',
    filter: { field: 'package', op: 'eq', value: 'premium' }
  })
  .declareHasMany('mega_shows', {
    table: 'shows',
    foreignKey: 'channel_id',
    filter: { field: 'package', op: 'eq', value: 'mega' }
  })
  .declareUnion('pay_shows', ['premium_shows', 'mega_shows']);

/** ids of rows, sorted numerically, for order-independent comparisons */
export function sortedIds(rows: readonly Row[]): Id[] {
  return rows.map((r) => r.id).sort((a, b) => Number(a) - Number(b));
}
