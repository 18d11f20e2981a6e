/**
 * SQL query tool
 *
 * Executes one read-only statement and returns its rows. The database
 * client enforces read-only access; the checks here refuse statement lists
 * and writing keywords before a connection is taken.
 */

import { z } from 'zod';
import { ToolExecutionError, describeError } from '../errors.js';
import type { SqlClient, SqlQueryResult } from '../database/sql-client.js';
import { leadingKeyword, splitStatements } from '../database/statement.js';
import type { ToolDefinition } from './types.js';

export const SQL_QUERY_TOOL = 'sql_db_query';

export const SqlQueryInputSchema = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').describe('A single read-only SQL statement'),
});

export type SqlQueryInput = z.infer<typeof SqlQueryInputSchema>;

const READ_KEYWORDS = new Set(['select', 'with', 'explain', 'show', 'values', 'table', 'describe']);

export function assertReadOnlyStatement(sql: string): void {
  const statements = splitStatements(sql);
  if (statements.length > 1) {
    throw new ToolExecutionError(
      SQL_QUERY_TOOL,
      `Only one statement per query is allowed (got ${statements.length})`,
      { statements: statements.length }
    );
  }
  const keyword = leadingKeyword(sql);
  if (!READ_KEYWORDS.has(keyword)) {
    throw new ToolExecutionError(
      SQL_QUERY_TOOL,
      `Only read-only statements are allowed (got '${keyword || sql.slice(0, 20)}')`,
      { allowed: [...READ_KEYWORDS] }
    );
  }
}

export interface SqlQueryToolOptions {
  maxRows: number;
}

export function createSqlQueryTool(
  client: SqlClient,
  options: SqlQueryToolOptions
): ToolDefinition<typeof SqlQueryInputSchema> {
  return {
    name: SQL_QUERY_TOOL,
    description:
      `Execute a read-only ${client.dialect} query and return the result rows. ` +
      `At most ${options.maxRows} rows are returned; 'truncated' tells whether more existed. ` +
      'If the query fails, read the error, rewrite the query and try again.',
    inputSchema: SqlQueryInputSchema,
    sideEffect: 'pure',
    handler: async ({ query }, context): Promise<{ data: SqlQueryResult }> => {
      assertReadOnlyStatement(query);
      try {
        const data = await client.query(query, { maxRows: options.maxRows, signal: context.signal });
        context.logger.debug('Query executed', { rowCount: data.rowCount, truncated: data.truncated });
        return { data };
      } catch (error) {
        throw new ToolExecutionError(SQL_QUERY_TOOL, `Query failed: ${describeError(error)}`, { query });
      }
    },
  };
}
