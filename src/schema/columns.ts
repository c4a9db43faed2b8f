/**
 * Column definition. Modifiers return a new definition; existing
 * instances are never mutated.
 */
export class ColumnDef {
  constructor(
    readonly sqlType: string,
    readonly isPrimaryKey: boolean = false,
    readonly isNotNull: boolean = false,
    readonly defaultSql: string | null = null,
  ) {}

  primaryKey(): ColumnDef {
    return new ColumnDef(this.sqlType, true, this.isNotNull, this.defaultSql);
  }

  notNull(): ColumnDef {
    return new ColumnDef(this.sqlType, this.isPrimaryKey, true, this.defaultSql);
  }

  /** Raw SQL expression, e.g. `'NOW()'` or `"'draft'"`. */
  default(sqlExpr: string): ColumnDef {
    return new ColumnDef(this.sqlType, this.isPrimaryKey, this.isNotNull, sqlExpr);
  }
}

export const col = {
  integer: (): ColumnDef => new ColumnDef('INTEGER'),
  bigint: (): ColumnDef => new ColumnDef('BIGINT'),
  serial: (): ColumnDef => new ColumnDef('SERIAL'),
  text: (): ColumnDef => new ColumnDef('TEXT'),
  varchar: (length: number): ColumnDef => {
    if (!Number.isInteger(length) || length <= 0) {
      throw new Error(`varchar length must be a positive integer, got ${length}`);
    }
    return new ColumnDef(`VARCHAR(${length})`);
  },
  boolean: (): ColumnDef => new ColumnDef('BOOLEAN'),
  timestamp: (): ColumnDef => new ColumnDef('TIMESTAMPTZ'),
  jsonb: (): ColumnDef => new ColumnDef('JSONB'),
};
