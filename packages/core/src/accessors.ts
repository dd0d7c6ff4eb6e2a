// packages/core/src/accessors.ts
// Declaration-time builders: turn network / union / has-many declarations into
// named accessor definitions on a node type. Runs once per declaration.
import { ConfigError } from './errors';
import {
  HasManyOptionsSchema,
  Identifier,
  NetworkOptionsSchema
} from './schemas';
import type {
  AccessorDef,
  Catalog,
  HasManyOptions,
  HasManyRelation,
  NetworkOptions,
  Relation,
  Where
} from './types';

export type AccessorMap = Map<string, AccessorDef>;

export interface OwnerInfo {
  entity: string;
  table: string;
  primaryKey: string;
  catalog?: Catalog;
}

export interface NormalizedNetwork {
  name: string;
  through?: string;
  joinTable: string;
  foreignKey: string;
  associationForeignKey: string;
  filter?: Where;
}

function checkName(kind: string, name: string): void {
  const res = Identifier.safeParse(name);
  if (!res.success) throw new ConfigError(`${kind} name "${name}" ${res.error.issues[0]?.message ?? 'is invalid'}`);
}

// Identical redeclarations are accepted: several networks may share one
// through entity and so declare the same edge accessors.
function register(accessors: AccessorMap, name: string, def: AccessorDef): void {
  const existing = accessors.get(name);
  if (existing) {
    if (JSON.stringify(existing) === JSON.stringify(def)) return;
    throw new ConfigError(`accessor "${name}" is already declared with a different definition`);
  }
  accessors.set(name, def);
}

function requireColumns(owner: OwnerInfo, table: string, columns: string[], why: string): void {
  if (!owner.catalog) return;
  const entity = owner.catalog.entities.find((e) => e.name === table);
  if (!entity) throw new ConfigError(`${why}: entity "${table}" is not in the catalog`);
  const known = new Set(entity.fields.map((f) => f.name));
  const missing = columns.filter((c) => !known.has(c));
  if (missing.length) {
    throw new ConfigError(`${why}: entity "${table}" has no column(s) ${missing.join(', ')}`);
  }
  // key columns that declare a reference must point back at the node table
  for (const f of entity.fields) {
    if (!f.ref || !columns.includes(f.name) || f.ref.entity === owner.table) continue;
    throw new ConfigError(`${why}: column "${f.name}" references "${f.ref.entity}", not "${owner.table}"`);
  }
}

function catalogPrimaryKey(owner: OwnerInfo, table: string): string {
  return owner.catalog?.entities.find((e) => e.name === table)?.primaryKey ?? 'id';
}

/**
 * Applies the network defaults: `<entity>_id` for the foreign key, the
 * foreign key plus `_target` for the association key, and a self-referential
 * `<table>_<table>` join table when no through entity is given.
 */
export function normalizeNetwork(owner: OwnerInfo, name: string, options: unknown = {}): NormalizedNetwork {
  checkName('network', name);
  const parsed = NetworkOptionsSchema.safeParse(options);
  if (!parsed.success) throw ConfigError.fromZod(`network "${name}"`, parsed.error);

  const o = parsed.data;
  const foreignKey = o.foreignKey ?? `${owner.entity}_id`;
  const associationForeignKey = o.associationForeignKey ?? `${foreignKey}_target`;
  const joinTable = o.joinTable ?? `${owner.table}_${owner.table}`;

  checkName('foreign key', foreignKey);
  checkName('association foreign key', associationForeignKey);
  checkName('join table', joinTable);
  if (foreignKey === associationForeignKey) {
    throw new ConfigError(`network "${name}": foreignKey and associationForeignKey are both "${foreignKey}"`);
  }
  if (o.through !== undefined && o.joinTable !== undefined) {
    throw new ConfigError(`network "${name}": joinTable and through are mutually exclusive`);
  }

  return { name, through: o.through, joinTable, foreignKey, associationForeignKey, filter: o.filter };
}

/**
 * Registers `<name>_out`, `<name>_in` and the bidirectional `<name>`.
 * In through mode it also registers `<through>_out`, `<through>_in` and the
 * raw-edge union `<through>`.
 */
export function declareNetwork(
  accessors: AccessorMap,
  owner: OwnerInfo,
  name: string,
  options: NetworkOptions = {}
): NormalizedNetwork {
  const net = normalizeNetwork(owner, name, options);
  const { table, primaryKey } = owner;
  const { foreignKey: fk, associationForeignKey: afk, filter } = net;

  let out: Relation;
  let inbound: Relation;

  if (net.through === undefined) {
    if (owner.catalog?.entities.some((e) => e.name === net.joinTable)) {
      requireColumns(owner, net.joinTable, [fk, afk], `network "${name}"`);
    }
    out = { kind: 'manyToMany', table, primaryKey, joinTable: net.joinTable, foreignKey: fk, associationForeignKey: afk, filter };
    inbound = { kind: 'manyToMany', table, primaryKey, joinTable: net.joinTable, foreignKey: afk, associationForeignKey: fk, filter };
  } else {
    const through = net.through;
    requireColumns(owner, through, [fk, afk], `network "${name}" through "${through}"`);
    const edgePk = catalogPrimaryKey(owner, through);
    const edgeOut: HasManyRelation = { kind: 'hasMany', table: through, primaryKey: edgePk, foreignKey: fk };
    const edgeIn: HasManyRelation = { kind: 'hasMany', table: through, primaryKey: edgePk, foreignKey: afk };

    register(accessors, `${through}_out`, { kind: 'relation', relation: edgeOut });
    register(accessors, `${through}_in`, { kind: 'relation', relation: edgeIn });
    declareUnion(accessors, through, [`${through}_out`, `${through}_in`]);

    out = { kind: 'through', table, primaryKey, edge: edgeOut, sourceKey: afk, filter };
    inbound = { kind: 'through', table, primaryKey, edge: edgeIn, sourceKey: fk, filter };
  }

  register(accessors, `${name}_out`, { kind: 'relation', relation: out });
  register(accessors, `${name}_in`, { kind: 'relation', relation: inbound });
  declareUnion(accessors, name, [`${name}_out`, `${name}_in`]);
  return net;
}

/** Registers a union accessor over already-declared accessors. */
export function declareUnion(accessors: AccessorMap, name: string, sources: readonly string[]): void {
  checkName('union', name);
  const unknown = sources.filter((s) => !accessors.has(s));
  if (unknown.length) {
    throw new ConfigError(`union "${name}" lists undeclared accessor(s) ${unknown.join(', ')}`);
  }
  register(accessors, name, { kind: 'union', sources: [...sources] });
}

/** Registers a plain one-to-many accessor (`channel.shows`). */
export function declareHasMany(accessors: AccessorMap, name: string, options: HasManyOptions): void {
  checkName('relation', name);
  const parsed = HasManyOptionsSchema.safeParse(options);
  if (!parsed.success) throw ConfigError.fromZod(`relation "${name}"`, parsed.error);
  const o = parsed.data;
  register(accessors, name, {
    kind: 'relation',
    relation: { kind: 'hasMany', table: o.table, primaryKey: o.primaryKey ?? 'id', foreignKey: o.foreignKey, filter: o.filter }
  });
}
