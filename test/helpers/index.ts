/**
 * Test helpers: in-process stand-ins for the reasoner, the database and the
 * memory store, plus temp directories and log capture.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Decision, Reasoner, ReasoningRequest } from '../../src/agent/reasoner.js';
import type {
  QueryOptions,
  SqlClient,
  SqlQueryResult,
  SqlRow,
  TableDescription,
} from '../../src/database/sql-client.js';
import { StorageError } from '../../src/errors.js';
import { InMemoryMemoryStore } from '../../src/memory/in-memory-store.js';
import type { Message } from '../../src/memory/types.js';
import { StructuredLogger, createSilentLogger, type LogEntry } from '../../src/observability/logger.js';
import type { ToolContext } from '../../src/tools/types.js';

// =============================================================================
// Reasoner
// =============================================================================

export type ScriptStep = Decision | Error | ((request: ReasoningRequest) => Decision | Promise<Decision>);

/**
 * Replays a fixed list of decisions, one per reasoning step. Running past the
 * end of the script is a test bug and throws.
 */
export class ScriptedReasoner implements Reasoner {
  readonly requests: ReasoningRequest[] = [];
  private index = 0;

  constructor(private readonly script: ScriptStep[]) {}

  async decide(request: ReasoningRequest): Promise<Decision> {
    this.requests.push({ ...request, history: [...request.history] });
    const step = this.script[this.index++];
    if (step === undefined) {
      throw new Error(`ScriptedReasoner ran out of steps at step ${request.step}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === 'function' ? step(request) : step;
  }

  get calls(): number {
    return this.requests.length;
  }
}

export function answer(text: string): Decision {
  return { type: 'answer', text };
}

export function toolCall(name: string, args: Record<string, unknown> = {}, id?: string): Decision {
  return { type: 'tool_call', call: { id, name, arguments: args } };
}

// =============================================================================
// Database
// =============================================================================

export interface FakeTable {
  columns: Array<{ name: string; type: string; nullable?: boolean }>;
  rows: SqlRow[];
}

export type QueryHandler = (sql: string, options: QueryOptions) => SqlRow[] | Promise<SqlRow[]>;

/**
 * SqlClient over fixed tables. Queries go to `onQuery` when set; otherwise
 * `SELECT ... FROM <table>` returns that table's rows.
 */
export class FakeSqlClient implements SqlClient {
  readonly dialect = 'PostgreSQL';
  readonly queries: string[] = [];
  closed = false;
  onQuery: QueryHandler | undefined;

  constructor(private readonly tables: Record<string, FakeTable> = {}) {}

  async query(sql: string, options: QueryOptions): Promise<SqlQueryResult> {
    this.queries.push(sql);
    const rows = this.onQuery ? await this.onQuery(sql, options) : this.rowsFor(sql);
    const columns = rows[0] ? Object.keys(rows[0]) : [];
    const kept = rows.slice(0, options.maxRows);
    return {
      columns,
      rows: kept,
      rowCount: kept.length,
      truncated: rows.length > options.maxRows,
    };
  }

  async listTables(): Promise<string[]> {
    return Object.keys(this.tables).sort();
  }

  async describeTable(table: string): Promise<TableDescription | undefined> {
    const found = this.tables[table];
    if (!found) {
      return undefined;
    }
    return {
      name: table,
      columns: found.columns.map((column) => ({
        name: column.name,
        type: column.type,
        nullable: column.nullable ?? true,
      })),
      sampleRows: found.rows.slice(0, 3),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private rowsFor(sql: string): SqlRow[] {
    const match = /\bfrom\s+"?([a-zA-Z_][a-zA-Z0-9_]*)"?/i.exec(sql);
    const table = match?.[1] ? this.tables[match[1]] : undefined;
    if (!table) {
      throw new Error(`relation "${match?.[1] ?? '?'}" does not exist`);
    }
    return table.rows;
  }
}

export function createSalesDatabase(): FakeSqlClient {
  return new FakeSqlClient({
    sales: {
      columns: [
        { name: 'region', type: 'text' },
        { name: 'total', type: 'numeric' },
      ],
      rows: [
        { region: 'North', total: '120.50' },
        { region: 'South', total: '80' },
        { region: 'East', total: '95.25' },
      ],
    },
    customers: {
      columns: [
        { name: 'id', type: 'integer', nullable: false },
        { name: 'name', type: 'text' },
      ],
      rows: [
        { id: 1, name: 'Ada' },
        { id: 2, name: 'Grace' },
      ],
    },
  });
}

// =============================================================================
// Memory
// =============================================================================

/**
 * In-memory store whose next `failLoads` loads and `failAppends` appends
 * fail with a retryable StorageError.
 */
export class FlakyMemoryStore extends InMemoryMemoryStore {
  failLoads = 0;
  failAppends = 0;
  loadAttempts = 0;
  appendAttempts = 0;

  override async load(threadId: string): Promise<Message[]> {
    this.loadAttempts++;
    if (this.failLoads > 0) {
      this.failLoads--;
      throw new StorageError('store unavailable');
    }
    return super.load(threadId);
  }

  override async append(threadId: string, message: Message): Promise<void> {
    this.appendAttempts++;
    if (this.failAppends > 0) {
      this.failAppends--;
      throw new StorageError('store unavailable');
    }
    return super.append(threadId, message);
  }
}

// =============================================================================
// Misc
// =============================================================================

export async function createTempDir(prefix: string = 'dbchat-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

/**
 * Logger that keeps parsed entries instead of printing them
 */
export function createCapturingLogger(name: string = 'test'): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    name,
    minLevel: 'debug',
    output: (json) => {
      const entry: LogEntry = JSON.parse(json);
      entries.push(entry);
    },
  });
  return { logger, entries };
}

export function createToolContext(callId: string = 'call_test', toolName: string = 'test_tool'): ToolContext {
  return { callId, toolName, signal: new AbortController().signal, logger: createSilentLogger(toolName) };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
