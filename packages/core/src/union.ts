// packages/core/src/union.ts
import { ArrayCollection } from './collection';
import { NotFoundError } from './errors';
import { idKey, memberKey } from './where';
import type { Collection, Id, Row } from './types';

export type UnionSource<T extends Row = Row> = Collection<T> | readonly T[] | null | undefined;

function isRowArray<T extends Row>(s: Collection<T> | readonly T[]): s is readonly T[] {
  return Array.isArray(s);
}

function isIdList(v: Id | readonly Id[]): v is readonly Id[] {
  return Array.isArray(v);
}

// first occurrence wins, order preserved; rows of different tables never merge
function dedupe<T extends Row>(rows: readonly T[]): T[] {
  const seen = new Map<string, T>();
  for (const r of rows) {
    const k = memberKey(r);
    if (!seen.has(k)) seen.set(k, r);
  }
  return [...seen.values()];
}

/**
 * A deduplicated view over several collections. Members are keyed by table
 * and primary key, so a union may mix entity types.
 *
 * The view has two independent read paths:
 *
 * - `find` / `includes` / `whereIdIn` push an id filter down to every
 *   non-empty source and never load a source in full.
 * - `toArray`, `size`, `map`, `filter`, `forEach`, `ids` and async iteration
 *   load every source once, dedupe, and keep the result for the life of the
 *   instance.
 *
 * Sources listed earlier win when two sources hold the same row. Nil sources
 * are dropped and plain arrays are accepted as sources:
 *
 *   const union = new UnionView(
 *     store.table('people').whereIdIn([1]),
 *     node.related('colleagues'),
 *     null
 *   );
 *   await union.find(30);        // bare row
 *   await union.find(30, 31);    // array, or NotFoundError
 */
export class UnionView<T extends Row = Row> implements Collection<T>, AsyncIterable<T> {
  private readonly sources: Collection<T>[];
  private cache: T[] | null = null;
  private loading: Promise<T[]> | null = null;

  constructor(...sources: UnionSource<T>[]) {
    this.sources = [];
    for (const s of sources) {
      if (s == null) continue;
      this.sources.push(isRowArray(s) ? new ArrayCollection(s) : s);
    }
  }

  get sourceCount(): number {
    return this.sources.length;
  }

  /** True once a full-collection operation has loaded the sources. */
  get isMaterialized(): boolean {
    return this.cache !== null;
  }

  find(id: Id): Promise<T>;
  find(ids: readonly Id[]): Promise<T[]>;
  find(first: Id, second: Id, ...rest: Id[]): Promise<T[]>;
  async find(...args: Array<Id | readonly Id[]>): Promise<T | T[]> {
    const single = args.length === 1 && !isIdList(args[0]);
    const ids = args.flatMap((a) => (isIdList(a) ? [...a] : [a]));

    const rows = await this.lookup(ids);
    // distinct ids on both sides: find(1, 1) must resolve to one row. An id held
    // by rows of two tables resolves to both and fails the check.
    const wanted = new Set(ids.map(idKey));
    if (wanted.size !== rows.length) throw new NotFoundError(ids);

    return single ? rows[0] : rows;
  }

  async includes(rowOrId: T | Id): Promise<boolean> {
    const id = typeof rowOrId === 'object' ? rowOrId.id : rowOrId;
    return (await this.lookup([id])).length > 0;
  }

  whereIdIn(ids: readonly Id[]): UnionView<T> {
    return new UnionView(...this.sources.map((s) => s.whereIdIn(ids)));
  }

  async isEmpty(): Promise<boolean> {
    if (this.cache) return this.cache.length === 0;
    const empties = await Promise.all(this.sources.map((s) => s.isEmpty()));
    return empties.every(Boolean);
  }

  async size(): Promise<number> {
    return (await this.materialize()).length;
  }

  async toArray(): Promise<T[]> {
    return [...(await this.materialize())];
  }

  async ids(): Promise<Id[]> {
    return (await this.materialize()).map((r) => r.id);
  }

  async forEach(fn: (row: T, index: number) => void): Promise<void> {
    (await this.materialize()).forEach(fn);
  }

  async map<U>(fn: (row: T, index: number) => U): Promise<U[]> {
    return (await this.materialize()).map(fn);
  }

  async filter(fn: (row: T, index: number) => boolean): Promise<T[]> {
    return (await this.materialize()).filter(fn);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    yield* await this.materialize();
  }

  private async lookup(ids: readonly Id[]): Promise<T[]> {
    if (ids.length === 0) return [];
    const distinct = dedupeIds(ids);
    const hits = await Promise.all(
      this.sources.map(async (s) => ((await s.isEmpty()) ? [] : s.whereIdIn(distinct).toArray()))
    );
    return dedupe(hits.flat());
  }

  private materialize(): Promise<T[]> {
    if (this.cache) return Promise.resolve(this.cache);
    this.loading ??= Promise.all(this.sources.map((s) => s.toArray())).then(
      (sets) => {
        this.cache = dedupe(sets.flat());
        return this.cache;
      },
      (err: unknown) => {
        this.loading = null;
        throw err;
      }
    );
    return this.loading;
  }
}

function dedupeIds(ids: readonly Id[]): Id[] {
  const seen = new Map<string, Id>();
  for (const id of ids) if (!seen.has(idKey(id))) seen.set(idKey(id), id);
  return [...seen.values()];
}
