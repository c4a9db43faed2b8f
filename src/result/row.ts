/**
 * One row of a result: an ordered tuple of values addressable by position
 * or by column name. Column order is the order of the statement's select
 * list. With duplicate column names, name lookup resolves to the first.
 */
export class Row implements Iterable<unknown> {
  readonly columns: readonly string[];
  private readonly values: readonly unknown[];

  constructor(columns: readonly string[], values: readonly unknown[]) {
    if (columns.length !== values.length) {
      throw new RangeError(`Row has ${columns.length} column name(s) but ${values.length} value(s)`);
    }
    this.columns = Object.freeze([...columns]);
    this.values = Object.freeze([...values]);
    Object.freeze(this);
  }

  get length(): number {
    return this.values.length;
  }

  /** Value at a position; undefined outside the row. */
  at(index: number): unknown {
    return this.values[index];
  }

  has(name: string): boolean {
    return this.columns.includes(name);
  }

  /** Value of the named column; undefined when the row has no such column. */
  get(name: string): unknown {
    const index = this.columns.indexOf(name);
    return index === -1 ? undefined : this.values[index];
  }

  /** Own data properties only, so a column named `__proto__` stays a key. */
  toObject(): Record<string, unknown> {
    return Object.fromEntries(
      this.columns
        .map((name, i): [string, unknown] => [name, this.values[i]])
        .filter(([name], i) => this.columns.indexOf(name) === i),
    );
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.values[Symbol.iterator]();
  }
}
