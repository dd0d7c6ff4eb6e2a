import { idKey } from './where';
import type { Collection, Id, Row } from './types';

type RowSource<T> = readonly T[] | (() => readonly T[]);

/**
 * In-process collection over a row array, or over a thunk that is read on
 * every query so the collection reflects the current contents of its source.
 */
export class ArrayCollection<T extends Row = Row> implements Collection<T> {
  constructor(private readonly source: RowSource<T>) {}

  private rows(): readonly T[] {
    return typeof this.source === 'function' ? this.source() : this.source;
  }

  async size() { return this.rows().length; }

  async isEmpty() { return this.rows().length === 0; }

  async toArray() { return [...this.rows()]; }

  whereIdIn(ids: readonly Id[]): ArrayCollection<T> {
    const wanted = new Set(ids.map(idKey));
    return new ArrayCollection(() => this.rows().filter((r) => wanted.has(idKey(r.id))));
  }
}
