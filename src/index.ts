export { col, ColumnDef } from './schema/columns.js';
export { defineTable, Table, Column } from './schema/table.js';
export { compileCreateTable } from './schema/ddl.js';
export { fieldNames, parseRow } from './schema/row-shape.js';
export type { RowShape } from './schema/row-shape.js';

export { select, count, insert, update, deleteFrom, sql } from './query/factories.js';
export { eq, ne, gt, gte, lt, lte, like, inList, isNull, isNotNull, and, or, not, asc, desc } from './query/filters.js';
export { compile, producesRows } from './query/compiler.js';
export type { CompiledQuery } from './query/compiler.js';
export type {
  Statement,
  SelectStatement,
  CountStatement,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
  RawStatement,
} from './query/builder.js';
export type { FilterNode, OrderTerm, Selectable } from './query/types.js';

export { Row } from './result/row.js';
export { Result, ScalarResult } from './result/result.js';
export type { ExecutionOutcome, ResultKind } from './result/result.js';

export { getSelectColumns, selectFor } from './projection.js';
export { fetchPage } from './pagination/fetch-page.js';
export { PageResult } from './pagination/page-result.js';
export type { PageResultInit, PageResultJSON } from './pagination/page-result.js';
export { autoQuery } from './auto-query.js';
export type { AutoQueryOptions, Refine, ManyQuery, SingleQuery } from './auto-query.js';

export { Engine } from './engine.js';
export type { EngineConfig } from './engine.js';
export { Session } from './session.js';
export { engineConfigFromEnv } from './config.js';
export type { Executor, EngineLogger } from './types.js';

export {
  EmptyResultError,
  AmbiguousResultError,
  SchemaValidationError,
  ResultKindError,
} from './errors.js';
export type { SchemaIssue } from './errors.js';
