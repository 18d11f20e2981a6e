/**
 * Schema discovery tools: table listing, table structure, column meanings
 */

import { z } from 'zod';
import { ToolExecutionError } from '../errors.js';
import { lookupTable, type ColumnGlossary } from '../database/column-glossary.js';
import type { SqlClient, TableDescription } from '../database/sql-client.js';
import type { ToolDefinition } from './types.js';

// =============================================================================
// sql_db_list_tables
// =============================================================================

export const ListTablesInputSchema = z.object({});

export function createListTablesTool(client: SqlClient): ToolDefinition<typeof ListTablesInputSchema> {
  return {
    name: 'sql_db_list_tables',
    description: 'List the tables available in the database. Call this first to see what can be queried.',
    inputSchema: ListTablesInputSchema,
    sideEffect: 'pure',
    handler: async () => ({ data: { tables: await client.listTables() } }),
  };
}

// =============================================================================
// sql_db_schema
// =============================================================================

export const TableSchemaInputSchema = z.object({
  tables: z
    .array(z.string().trim().min(1))
    .min(1, 'Name at least one table')
    .describe('Table names as returned by sql_db_list_tables'),
});

export type TableSchemaInput = z.infer<typeof TableSchemaInputSchema>;

export function createTableSchemaTool(client: SqlClient): ToolDefinition<typeof TableSchemaInputSchema> {
  return {
    name: 'sql_db_schema',
    description:
      'Get the columns (name, type, nullability) and a few sample rows of the given tables. ' +
      'Use it before writing a query against a table.',
    inputSchema: TableSchemaInputSchema,
    sideEffect: 'pure',
    handler: async ({ tables }) => {
      const described: TableDescription[] = [];
      const missing: string[] = [];
      for (const table of new Set(tables)) {
        const description = await client.describeTable(table);
        if (description) {
          described.push(description);
        } else {
          missing.push(table);
        }
      }

      if (missing.length > 0) {
        throw new ToolExecutionError('sql_db_schema', `Unknown table(s): ${missing.join(', ')}`, {
          missing,
          availableTables: await client.listTables(),
        });
      }
      return { data: { tables: described } };
    },
  };
}

// =============================================================================
// get_column_meanings
// =============================================================================

export const ColumnMeaningsInputSchema = z.object({
  tables: z.array(z.string().trim().min(1)).min(1, 'Name at least one table'),
});

/**
 * Only registered when a glossary is configured.
 */
export function createColumnMeaningsTool(glossary: ColumnGlossary): ToolDefinition<typeof ColumnMeaningsInputSchema> {
  return {
    name: 'get_column_meanings',
    description:
      'Get the real meaning of column names for the given tables. Column names in this database ' +
      'can be misleading; check their meanings before interpreting query results.',
    inputSchema: ColumnMeaningsInputSchema,
    sideEffect: 'pure',
    handler: async ({ tables }) => {
      const meanings: Record<string, Record<string, string>> = {};
      const missing: string[] = [];
      for (const table of tables) {
        const columns = lookupTable(glossary, table);
        if (columns) {
          meanings[table] = columns;
        } else {
          missing.push(table);
        }
      }
      if (missing.length > 0) {
        throw new ToolExecutionError('get_column_meanings', `No column meanings for table(s): ${missing.join(', ')}`, {
          missing,
          documentedTables: Object.keys(glossary),
        });
      }
      return { data: { meanings } };
    },
  };
}
