/**
 * Registration of the database agent's tool set
 */

import type { ArtifactPublisher } from '../artifacts/publisher.js';
import type { ColumnGlossary } from '../database/column-glossary.js';
import type { SqlClient } from '../database/sql-client.js';
import { analyzeDataTool } from './analyze-data.js';
import { createChartTool } from './chart.js';
import { createCsvExportTool } from './csv-export.js';
import { createPdfReportTool } from './pdf-report.js';
import type { ToolRegistry } from './registry.js';
import { createSqlQueryTool } from './sql-query.js';
import { createColumnMeaningsTool, createListTablesTool, createTableSchemaTool } from './sql-schema.js';

export interface DatabaseToolsOptions {
  sqlClient: SqlClient;
  publisher: ArtifactPublisher;
  sqlMaxRows: number;
  csvMaxRows: number;
  glossary?: ColumnGlossary | undefined;
}

/**
 * Register every built-in tool. The registry is left unfrozen so callers
 * can add their own tools first.
 */
export function registerDatabaseTools(registry: ToolRegistry, options: DatabaseToolsOptions): void {
  const { sqlClient, publisher } = options;

  registry.register(createListTablesTool(sqlClient));
  registry.register(createTableSchemaTool(sqlClient));
  if (options.glossary) {
    registry.register(createColumnMeaningsTool(options.glossary));
  }
  registry.register(createSqlQueryTool(sqlClient, { maxRows: options.sqlMaxRows }));
  registry.register(analyzeDataTool);
  registry.register(createChartTool(publisher));
  registry.register(createCsvExportTool(sqlClient, publisher, { maxRows: options.csvMaxRows }));
  registry.register(createPdfReportTool(publisher));
}
