/**
 * CSV export tool
 *
 * Runs a read-only query with the (larger) export row limit and publishes
 * the full result as a CSV download instead of returning rows to the model.
 */

import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ToolExecutionError, describeError } from '../errors.js';
import type { ArtifactPublisher } from '../artifacts/publisher.js';
import type { SqlClient, SqlQueryResult } from '../database/sql-client.js';
import { assertReadOnlyStatement } from './sql-query.js';
import type { ToolDefinition } from './types.js';

export const CSV_EXPORT_TOOL = 'export_query_to_csv';

export const CsvExportInputSchema = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').describe('A single read-only SQL statement'),
  title: z.string().min(1).default('query_results').describe('Used to name the file'),
});

export type CsvExportInput = z.infer<typeof CsvExportInputSchema>;

function cellValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return value;
}

export function toCsv(result: Pick<SqlQueryResult, 'columns' | 'rows'>): string {
  const rows = result.rows.map((row) => result.columns.map((column) => cellValue(row[column])));
  return stringify(rows, { header: true, columns: result.columns });
}

export interface CsvExportToolOptions {
  maxRows: number;
}

export function createCsvExportTool(
  client: SqlClient,
  publisher: ArtifactPublisher,
  options: CsvExportToolOptions
): ToolDefinition<typeof CsvExportInputSchema> {
  return {
    name: CSV_EXPORT_TOOL,
    description:
      'Run a read-only query and save the complete result as a CSV file the user can download. ' +
      `Use it when the user asks for an export or a download. Up to ${options.maxRows} rows are written.`,
    inputSchema: CsvExportInputSchema,
    sideEffect: 'external-write',
    handler: async ({ query, title }, context) => {
      assertReadOnlyStatement(query);

      let result: SqlQueryResult;
      try {
        result = await client.query(query, { maxRows: options.maxRows, signal: context.signal });
      } catch (error) {
        throw new ToolExecutionError(CSV_EXPORT_TOOL, `Query failed: ${describeError(error)}`, { query });
      }

      const artifact = await publisher.publish({
        kind: 'csv',
        callId: context.callId,
        baseName: title,
        extension: 'csv',
        content: toCsv(result),
      });

      return {
        data: {
          rowCount: result.rowCount,
          truncated: result.truncated,
          fileName: artifact.fileName,
          url: artifact.url,
        },
        artifact,
      };
    },
  };
}
