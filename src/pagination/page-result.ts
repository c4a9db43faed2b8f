export interface PageResultInit<T> {
  items: readonly T[];
  total: number;
  page: number;
  size: number;
}

export interface PageResultJSON<T> {
  items: T[];
  total: number;
  page: number;
  size: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

/**
 * One page of a query. totalPages, hasNext and hasPrev are derived from
 * total/page/size each time they are read.
 */
export class PageResult<T> {
  readonly items: readonly T[];
  readonly total: number;
  readonly page: number;
  readonly size: number;

  constructor(init: PageResultInit<T>) {
    this.items = Object.freeze([...init.items]);
    this.total = init.total;
    this.page = init.page;
    this.size = init.size;
    Object.freeze(this);
  }

  get totalPages(): number {
    if (this.size <= 0) return 0;
    return Math.ceil(this.total / this.size);
  }

  get hasNext(): boolean {
    return this.page < this.totalPages;
  }

  get hasPrev(): boolean {
    return this.page > 1;
  }

  /** Same page metadata, transformed items. */
  map<U>(fn: (item: T, index: number) => U): PageResult<U> {
    return new PageResult({ items: this.items.map(fn), total: this.total, page: this.page, size: this.size });
  }

  toJSON(): PageResultJSON<T> {
    return {
      items: [...this.items],
      total: this.total,
      page: this.page,
      size: this.size,
      totalPages: this.totalPages,
      hasNext: this.hasNext,
      hasPrev: this.hasPrev,
    };
  }
}
