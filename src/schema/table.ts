import type { ColumnDef } from './columns.js';

export class Column {
  readonly kind = 'column' as const;

  constructor(
    readonly table: Table,
    readonly name: string,
    readonly def: ColumnDef,
  ) {
    Object.freeze(this);
  }
}

/**
 * A named table and its columns, in declaration order.
 * Built via defineTable(); do not construct directly.
 */
export class Table<N extends string = string> {
  readonly kind = 'table' as const;
  readonly columns: readonly Column[];
  private readonly byName: ReadonlyMap<string, Column>;

  constructor(
    readonly name: string,
    defs: Readonly<Record<string, ColumnDef>>,
  ) {
    const columns: Column[] = [];
    for (const [key, def] of Object.entries<ColumnDef>(defs)) {
      columns.push(new Column(this, key, def));
    }
    this.columns = Object.freeze(columns);
    this.byName = new Map(columns.map((c) => [c.name, c]));
    Object.freeze(this);
  }

  /** Typed column lookup for names known at definition time. */
  column(name: N): Column {
    const found = this.byName.get(name);
    if (found === undefined) {
      throw new Error(`Table "${this.name}" has no column "${name}"`);
    }
    return found;
  }

  /** Lookup for names only known at runtime; undefined when absent. */
  findColumn(name: string): Column | undefined {
    return this.byName.get(name);
  }
}

export function defineTable<D extends Record<string, ColumnDef>>(
  name: string,
  columns: D,
): Table<keyof D & string> {
  if (Object.keys(columns).length === 0) {
    throw new Error(`Table "${name}" must define at least one column`);
  }
  return new Table<keyof D & string>(name, columns);
}
