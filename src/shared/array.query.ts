import type { PageQuery } from './paginate.js';

// PageQuery over an in-memory list that is already in its final order
export class ArrayPageQuery<T> implements PageQuery<T> {
  private readonly items: readonly T[];

  constructor(items: readonly T[], filter?: (item: T) => boolean) {
    this.items = filter ? items.filter(filter) : items;
  }

  async count(): Promise<number> {
    return this.items.length;
  }

  async fetch(offset: number, limit: number): Promise<T[]> {
    return this.items.slice(offset, offset + limit);
  }
}
