import type { Statement } from './query/builder.js';
import type { Result } from './result/result.js';

/**
 * What the pager and query helpers need from a database connection.
 * Session implements it; tests can supply their own.
 */
export interface Executor {
  /** Runs any statement; rows for row-producing statements, otherwise the affected count. */
  execute(statement: Statement): Promise<Result>;
  /** Runs a statement expected to yield one value; null when it yields none. */
  scalar(statement: Statement): Promise<unknown>;
}

export interface EngineLogger {
  info(message: string): void;
  error(message: string, error?: unknown): void;
}
