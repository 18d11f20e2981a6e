/**
 * SQL execution collaborator
 *
 * Tools talk to the database only through SqlClient. The PostgreSQL
 * implementation runs every statement inside a READ ONLY transaction that is
 * always rolled back, so a model-written statement cannot change data.
 * Statements go through the extended query protocol, which refuses a text
 * holding more than one command.
 */

import pg from 'pg';
import { leadingKeyword } from './statement.js';

// =============================================================================
// Types
// =============================================================================

export type SqlRow = Record<string, unknown>;

export interface QueryOptions {
  /** Rows beyond this are not read and `truncated` is set */
  maxRows: number;
  signal?: AbortSignal;
}

export interface SqlQueryResult {
  columns: string[];
  rows: SqlRow[];
  /** Rows returned, at most maxRows */
  rowCount: number;
  truncated: boolean;
}

export interface ColumnDescription {
  name: string;
  type: string;
  nullable: boolean;
}

export interface TableDescription {
  name: string;
  columns: ColumnDescription[];
  sampleRows: SqlRow[];
}

export interface SqlClient {
  /** Dialect name for the system prompt, e.g. "PostgreSQL" */
  readonly dialect: string;
  query(sql: string, options: QueryOptions): Promise<SqlQueryResult>;
  listTables(): Promise<string[]>;
  /** undefined when the table does not exist */
  describeTable(table: string): Promise<TableDescription | undefined>;
  close(): Promise<void>;
}

// =============================================================================
// PostgreSQL
// =============================================================================

/**
 * The subset of a pg result this client reads
 */
export interface PgResultLike {
  command: string;
  fields: Array<{ name: string }>;
  rows: SqlRow[];
}

export interface PgConnectionLike {
  query(text: string, values?: unknown[]): Promise<PgResultLike>;
  /** An error marks the connection broken so the pool discards it */
  release(error?: Error): void;
}

export interface PgPoolLike {
  connect(): Promise<PgConnectionLike>;
  end(): Promise<void>;
}

export interface PostgresSqlClientOptions {
  pool: PgPoolLike;
  /** Schema whose tables are listed and described (default: public) */
  schema?: string;
  /** Server-side statement_timeout in milliseconds; 0 disables */
  statementTimeoutMs?: number;
  sampleRows?: number;
}

/**
 * Quote an identifier for PostgreSQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * The pool methods the adapter calls; pg.Pool satisfies it
 */
export interface PgPoolSource {
  connect(): Promise<{
    query(config: { text: string; values?: unknown[]; queryMode: 'extended' }): Promise<PgResultLike>;
    release(error?: Error): void;
  }>;
  end(): Promise<void>;
}

export function adaptPgPool(pool: PgPoolSource): PgPoolLike {
  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query({ text, values, queryMode: 'extended' }),
        release: (error) => client.release(error),
      };
    },
    end: () => pool.end(),
  };
}

/** Statements a cursor can be declared for */
const CURSOR_KEYWORDS = new Set(['select', 'with', 'values', 'table']);

const CURSOR_NAME = 'dbchat_result';

function toQueryResult(result: PgResultLike, maxRows: number): SqlQueryResult {
  const rows = result.rows.slice(0, maxRows);
  return {
    columns: result.fields.map((field) => field.name),
    rows,
    rowCount: rows.length,
    truncated: result.rows.length > maxRows,
  };
}

export class PostgresSqlClient implements SqlClient {
  readonly dialect = 'PostgreSQL';
  private readonly pool: PgPoolLike;
  private readonly schema: string;
  private readonly statementTimeoutMs: number;
  private readonly sampleRowCount: number;

  constructor(options: PostgresSqlClientOptions) {
    this.pool = options.pool;
    this.schema = options.schema ?? 'public';
    this.statementTimeoutMs = options.statementTimeoutMs ?? 0;
    this.sampleRowCount = options.sampleRows ?? 3;
  }

  static fromUrl(connectionString: string, options: Omit<PostgresSqlClientOptions, 'pool'> = {}): PostgresSqlClient {
    const pool = new pg.Pool({ connectionString, max: 5 });
    return new PostgresSqlClient({ ...options, pool: adaptPgPool(pool) });
  }

  /**
   * Reads at most `maxRows + 1` rows through a cursor; one past the limit
   * only tells whether the result was truncated.
   */
  async query(sql: string, options: QueryOptions): Promise<SqlQueryResult> {
    const maxRows = Math.max(0, Math.floor(options.maxRows));
    return this.readOnly(async (connection) => {
      if (!CURSOR_KEYWORDS.has(leadingKeyword(sql))) {
        return toQueryResult(await connection.query(sql), maxRows);
      }
      await connection.query(`DECLARE ${CURSOR_NAME} NO SCROLL CURSOR FOR ${sql}`);
      return toQueryResult(await connection.query(`FETCH FORWARD ${maxRows + 1} FROM ${CURSOR_NAME}`), maxRows);
    }, options.signal);
  }

  async listTables(): Promise<string[]> {
    const result = await this.readOnly((connection) =>
      connection.query(
        `SELECT table_name FROM information_schema.tables
         WHERE table_schema = $1 AND table_type IN ('BASE TABLE', 'VIEW')
         ORDER BY table_name`,
        [this.schema]
      )
    );
    return result.rows.map((row) => String(row['table_name']));
  }

  async describeTable(table: string): Promise<TableDescription | undefined> {
    return this.readOnly(async (connection) => {
      const columnsResult = await connection.query(
        `SELECT column_name, data_type, is_nullable FROM information_schema.columns
         WHERE table_schema = $1 AND table_name = $2
         ORDER BY ordinal_position`,
        [this.schema, table]
      );
      const columnRows = columnsResult.rows;
      if (columnRows.length === 0) {
        return undefined;
      }

      const sample = await connection.query(
        `SELECT * FROM ${quoteIdentifier(this.schema)}.${quoteIdentifier(table)} LIMIT ${this.sampleRowCount}`
      );

      return {
        name: table,
        columns: columnRows.map((row) => ({
          name: String(row['column_name']),
          type: String(row['data_type']),
          nullable: row['is_nullable'] === 'YES',
        })),
        sampleRows: sample.rows,
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Run `work` in a READ ONLY transaction that is always rolled back.
   */
  private async readOnly<T>(work: (connection: PgConnectionLike) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const connection = await this.pool.connect();
    try {
      await connection.query('BEGIN READ ONLY');
      if (this.statementTimeoutMs > 0) {
        await connection.query(`SET LOCAL statement_timeout = ${Math.floor(this.statementTimeoutMs)}`);
      }
      return await work(connection);
    } finally {
      let rollbackError: Error | undefined;
      try {
        await connection.query('ROLLBACK');
      } catch (error) {
        rollbackError = error instanceof Error ? error : new Error(String(error));
      }
      connection.release(rollbackError);
    }
  }
}
