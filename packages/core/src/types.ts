// --------------------
// Rows & ids
// --------------------
export type Id = string | number;

// Stores map an entity's primary-key column onto `id`.
export type Row = { id: Id } & Record<string, unknown>;

// --------------------
// Catalog (entity metadata)
// --------------------
export type Scalar =
  | 'string'
  | 'number'
  | 'boolean'
  | 'datetime'
  | 'json';

export interface CatalogField {
  name: string;
  type: Scalar;
  ref?: { entity: string; field: string };   // checked for network key columns
}

export interface CatalogEntity {
  name: string;
  primaryKey?: string;            // join tables have none
  fields: CatalogField[];
}

export interface Catalog {
  version: string;
  entities: CatalogEntity[];
}

// --------------------
// Where / operators
// --------------------
export type WhereOp =
  | 'eq' | 'neq'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'in' | 'nin'
  | 'between'
  | 'exists'
  | 'is'        // 'null' | 'not_null' | 'true' | 'false'
  | 'like'      // prefix match unless the value carries % or _
  | 'contains'  // case-insensitive substring
  | 'ilike';

// Fields are bare (`is_accepted`) or qualified by table (`invites.is_accepted`).
export type Where =
  | { and: Where[] }
  | { or: Where[] }
  | { field: string; op: WhereOp; value?: unknown };

// --------------------
// Collections
// --------------------
export interface Collection<T extends Row = Row> {
  size(): Promise<number>;
  isEmpty(): Promise<boolean>;
  toArray(): Promise<T[]>;
  whereIdIn(ids: readonly Id[]): Collection<T>;
}

// --------------------
// Relation primitives (what a store knows how to query)
// --------------------
export interface ManyToManyRelation {
  kind: 'manyToMany';
  table: string;                  // node table
  primaryKey: string;
  joinTable: string;
  foreignKey: string;             // join column holding the owner id
  associationForeignKey: string;  // join column holding the related node id
  filter?: Where;                 // node rows; qualify with joinTable to reach join rows
}

export interface HasManyRelation {
  kind: 'hasMany';
  table: string;
  primaryKey: string;
  foreignKey: string;             // column on `table` holding the owner id
  filter?: Where;
}

export interface ThroughRelation {
  kind: 'through';
  table: string;                  // node table reached through the edges
  primaryKey: string;
  edge: HasManyRelation;
  sourceKey: string;              // edge column pointing at the reached node
  filter?: Where;                 // edge rows; qualify with `table` to reach node rows
}

export type Relation = ManyToManyRelation | HasManyRelation | ThroughRelation;

// --------------------
// Store
// --------------------
export interface Store {
  name: string;
  table(name: string, primaryKey?: string): Collection;
  manyToMany(ownerId: Id, relation: ManyToManyRelation): Collection;
  hasMany(ownerId: Id, relation: HasManyRelation): Collection;
  through(ownerId: Id, relation: ThroughRelation): Collection;
  insert(table: string, values: Record<string, unknown>): Promise<void>;
  update(table: string, primaryKey: string, id: Id, values: Record<string, unknown>): Promise<void>;
  health(): Promise<{ ok: boolean; details?: string }>;
  close(): Promise<void>;
}

// --------------------
// Declarations
// --------------------
export interface NetworkOptions<T extends string = string> {
  through?: T;                    // edge entity/table; omitted means join-table mode
  joinTable?: string;
  foreignKey?: string;
  associationForeignKey?: string;
  filter?: Where;
}

export interface HasManyOptions {
  table: string;
  foreignKey: string;
  primaryKey?: string;
  filter?: Where;
}

export type AccessorDef =
  | { kind: 'relation'; relation: Relation }
  | { kind: 'union'; sources: readonly string[] };

// `friends` → friends | friends_out | friends_in, plus invites | invites_out | invites_in in through mode
export type NetworkAccessor<N extends string, T extends string> =
  | N | `${N}_out` | `${N}_in`
  | ([T] extends [never] ? never : T | `${T}_out` | `${T}_in`);
