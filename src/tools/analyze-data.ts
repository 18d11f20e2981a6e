/**
 * Data analysis tool
 *
 * Describes a row set the model already holds (usually the rows of an
 * earlier sql_db_query result): column types and null counts, or
 * descriptive statistics of the numeric columns.
 */

import { z } from 'zod';
import type { ToolDefinition } from './types.js';

export const AnalyzeDataInputSchema = z.object({
  rows: z.array(z.record(z.unknown())).describe('Rows as objects keyed by column name'),
  analysisType: z.enum(['summary', 'stats']).default('summary'),
});

export type AnalyzeDataInput = z.infer<typeof AnalyzeDataInputSchema>;

export type ColumnKind = 'number' | 'string' | 'boolean' | 'date' | 'mixed' | 'empty';

export interface ColumnSummary {
  name: string;
  kind: ColumnKind;
  nullCount: number;
  distinctCount: number;
}

export interface NumericColumnStats {
  column: string;
  count: number;
  sum: number;
  mean: number;
  /** Sample standard deviation; null with fewer than two values */
  std: number | null;
  min: number;
  p25: number;
  median: number;
  p75: number;
  max: number;
}

const NUMERIC_STRING = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Numbers, and numeric strings (drivers return NUMERIC and BIGINT as strings)
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && NUMERIC_STRING.test(value.trim())) {
    return Number(value);
  }
  return undefined;
}

function kindOf(value: unknown): Exclude<ColumnKind, 'mixed' | 'empty'> {
  if (toNumber(value) !== undefined) return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date || (typeof value === 'string' && ISO_DATE.test(value))) return 'date';
  return 'string';
}

/**
 * Column names in first-seen order across all rows
 */
export function columnNames(rows: ReadonlyArray<Record<string, unknown>>): string[] {
  const names = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      names.add(key);
    }
  }
  return [...names];
}

export function summarizeColumns(rows: ReadonlyArray<Record<string, unknown>>): ColumnSummary[] {
  return columnNames(rows).map((name) => {
    let nullCount = 0;
    const kinds = new Set<ColumnKind>();
    const distinct = new Set<string>();
    for (const row of rows) {
      const value = row[name];
      if (value === null || value === undefined) {
        nullCount++;
        continue;
      }
      kinds.add(kindOf(value));
      distinct.add(typeof value === 'string' ? value : JSON.stringify(value));
    }
    const kind: ColumnKind = kinds.size > 1 ? 'mixed' : ([...kinds][0] ?? 'empty');
    return { name, kind, nullCount, distinctCount: distinct.size };
  });
}

/**
 * Linear interpolation between closest ranks
 */
export function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function describeNumericColumns(rows: ReadonlyArray<Record<string, unknown>>): NumericColumnStats[] {
  const stats: NumericColumnStats[] = [];
  for (const column of columnNames(rows)) {
    const values: number[] = [];
    let numeric = true;
    for (const row of rows) {
      const value = row[column];
      if (value === null || value === undefined) {
        continue;
      }
      const number = toNumber(value);
      if (number === undefined) {
        numeric = false;
        break;
      }
      values.push(number);
    }
    if (!numeric || values.length === 0) {
      continue;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;
    const sum = sorted.reduce((total, value) => total + value, 0);
    const mean = sum / count;
    const variance =
      count > 1 ? sorted.reduce((total, value) => total + (value - mean) ** 2, 0) / (count - 1) : undefined;

    stats.push({
      column,
      count,
      sum,
      mean,
      std: variance === undefined ? null : Math.sqrt(variance),
      min: sorted[0] ?? 0,
      p25: quantile(sorted, 0.25),
      median: quantile(sorted, 0.5),
      p75: quantile(sorted, 0.75),
      max: sorted[count - 1] ?? 0,
    });
  }
  return stats;
}

export const analyzeDataTool: ToolDefinition<typeof AnalyzeDataInputSchema> = {
  name: 'analyze_data',
  description:
    "Analyze rows you already have. analysisType 'summary' reports row count, column types, null and " +
    "distinct counts; 'stats' reports count, sum, mean, std, min, quartiles and max of numeric columns.",
  inputSchema: AnalyzeDataInputSchema,
  sideEffect: 'pure',
  handler: async ({ rows, analysisType }) => {
    if (rows.length === 0) {
      return { data: { rowCount: 0, message: 'No data available for analysis.' } };
    }
    if (analysisType === 'summary') {
      return { data: { rowCount: rows.length, columns: summarizeColumns(rows) } };
    }
    const numeric = describeNumericColumns(rows);
    if (numeric.length === 0) {
      return { data: { rowCount: rows.length, message: 'No numeric columns found for statistical analysis.' } };
    }
    return { data: { rowCount: rows.length, statistics: numeric } };
  },
};
