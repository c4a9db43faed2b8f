import pg from 'pg';
import { compileCreateTable } from './schema/ddl.js';
import type { Table } from './schema/table.js';
import { Session } from './session.js';
import type { EngineLogger } from './types.js';

export type EngineConfig =
  | {
      /** Caller-owned pool; disconnect() still ends it. */
      pool: pg.Pool;
      logger?: EngineLogger;
    }
  | {
      connectionString: string;
      /** Maximum pool size. Default 10. */
      max?: number;
      logger?: EngineLogger;
    };

const LOG_PREFIX = '[pg-lite-query]';

const consoleLogger: EngineLogger = {
  info: (message) => console.info(`${LOG_PREFIX} ${message}`),
  error: (message, error) => console.error(`${LOG_PREFIX} ${message}`, error),
};

export class Engine {
  readonly pool: pg.Pool;
  private readonly logger: EngineLogger;

  constructor(config: EngineConfig) {
    this.pool = 'pool' in config
      ? config.pool
      : new pg.Pool({ connectionString: config.connectionString, max: config.max ?? 10 });
    this.logger = config.logger ?? consoleLogger;
  }

  /** Checks out a connection once so a bad URL fails here, not on first query. */
  async connect(): Promise<void> {
    await this.pool.query('SELECT 1');
    this.logger.info('connected');
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.logger.info('disconnected');
  }

  /**
   * Creates every table that does not exist yet. Existing tables are
   * left as they are.
   */
  async initDb(tables: readonly Table[]): Promise<void> {
    const client = await this.pool.connect();
    try {
      for (const table of tables) {
        await client.query(compileCreateTable(table));
      }
      this.logger.info(`schema initialized (${tables.map((t) => t.name).join(', ')})`);
    } catch (err) {
      this.logger.error('schema initialization failed', err);
      throw err;
    } finally {
      client.release();
    }
  }

  /**
   * Runs `fn` with a session bound to one pooled client, releasing the
   * client however `fn` settles.
   */
  async session<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(new Session(client));
    } finally {
      client.release();
    }
  }
}
