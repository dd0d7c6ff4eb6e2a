// packages/core/src/node.ts
import {
  declareHasMany,
  declareNetwork,
  declareUnion,
  type AccessorMap,
  type OwnerInfo
} from './accessors';
import { UnknownNameError, UnsupportedError } from './errors';
import { createLogger } from './logger';
import { UnionView } from './union';
import type {
  AccessorDef,
  Catalog,
  Collection,
  HasManyOptions,
  Id,
  NetworkAccessor,
  NetworkOptions,
  Row,
  Store
} from './types';

const log = createLogger('netlace:node');

export interface NodeTypeOptions {
  entity: string;
  table?: string;        // defaults to the entity name
  primaryKey?: string;   // defaults to "id"
  catalog?: Catalog;     // enables column checks at declaration time
}

export interface AccessorInfo {
  name: string;
  kind: 'manyToMany' | 'hasMany' | 'through' | 'union';
}

/**
 * An entity type that takes part in networks. Declarations return a new
 * NodeType whose accessor names are widened in the type system:
 *
 *   const Person = new NodeType({ entity: 'person', table: 'people' })
 *     .declareNetwork('friends', { joinTable: 'friends', associationForeignKey: 'person_id_friend' })
 *     .declareNetwork('colleagues', { through: 'invites', filter: { field: 'is_accepted', op: 'is', value: 'true' } })
 *     .declareUnion('associates', ['friends', 'colleagues']);
 *
 *   const alice = Person.bind(store, 1);
 *   await alice.related('colleagues').includes(3);
 */
export class NodeType<A extends string = never> {
  readonly owner: OwnerInfo;

  constructor(options: NodeTypeOptions, private readonly accessors: ReadonlyMap<string, AccessorDef> = new Map()) {
    this.owner = {
      entity: options.entity,
      table: options.table ?? options.entity,
      primaryKey: options.primaryKey ?? 'id',
      catalog: options.catalog
    };
  }

  get entity(): string { return this.owner.entity; }

  get table(): string { return this.owner.table; }

  declareNetwork<N extends string, T extends string = never>(
    name: N,
    options: NetworkOptions<T> = {}
  ): NodeType<A | NetworkAccessor<N, T>> {
    const next = this.draft();
    const net = declareNetwork(next, this.owner, name, options);
    log.debug({ entity: this.entity, network: net }, 'network-declared');
    return new NodeType<A | NetworkAccessor<N, T>>(this.options(), next);
  }

  declareUnion<N extends string>(name: N, sources: readonly A[]): NodeType<A | N> {
    const next = this.draft();
    declareUnion(next, name, sources);
    log.debug({ entity: this.entity, union: name, sources }, 'union-declared');
    return new NodeType<A | N>(this.options(), next);
  }

  declareHasMany<N extends string>(name: N, options: HasManyOptions): NodeType<A | N> {
    const next = this.draft();
    declareHasMany(next, name, options);
    return new NodeType<A | N>(this.options(), next);
  }

  has(name: string): name is A {
    return this.accessors.has(name);
  }

  definition(name: A): AccessorDef {
    const def = this.accessors.get(name);
    if (!def) throw new UnknownNameError('accessor', name);
    return def;
  }

  describe(): AccessorInfo[] {
    return [...this.accessors].map(([name, def]) => ({
      name,
      kind: def.kind === 'union' ? 'union' : def.relation.kind
    }));
  }

  bind(store: Store, rowOrId: Row | Id): NetworkNode<A> {
    const id = typeof rowOrId === 'object' ? rowOrId.id : rowOrId;
    return new NetworkNode<A>(this, store, id);
  }

  /** Evaluates an accessor for one node; unions are built fresh on every call. */
  resolve(store: Store, ownerId: Id, name: string): Collection {
    const def = this.accessors.get(name);
    if (!def) throw new UnknownNameError('accessor', name);
    if (def.kind === 'union') {
      return new UnionView(...def.sources.map((s) => this.resolve(store, ownerId, s)));
    }
    const r = def.relation;
    switch (r.kind) {
      case 'manyToMany': return store.manyToMany(ownerId, r);
      case 'hasMany': return store.hasMany(ownerId, r);
      case 'through': return store.through(ownerId, r);
    }
  }

  private draft(): AccessorMap {
    return new Map(this.accessors);
  }

  private options(): NodeTypeOptions {
    return { ...this.owner };
  }
}

export class NetworkNode<A extends string = string> {
  constructor(
    readonly type: NodeType<A>,
    private readonly store: Store,
    readonly id: Id
  ) {}

  /**
   * Every accessor is handed out as a UnionView so callers get one API;
   * a relation accessor's view has a single source.
   */
  related(name: A): UnionView {
    const c = this.type.resolve(this.store, this.id, name);
    return c instanceof UnionView ? c : new UnionView(c);
  }

  /** Adds a join row for a join-table accessor (`friends_out`, `friends_in`). */
  async link(name: A, other: Row | Id): Promise<void> {
    const def = this.type.definition(name);
    if (def.kind !== 'relation' || def.relation.kind !== 'manyToMany') {
      throw new UnsupportedError(`accessor "${name}" is not a join-table accessor; insert edge rows instead`);
    }
    const otherId = typeof other === 'object' ? other.id : other;
    const r = def.relation;
    await this.store.insert(r.joinTable, { [r.foreignKey]: this.id, [r.associationForeignKey]: otherId });
  }
}
