/**
 * Chart tool
 *
 * Renders bar, line, pie and histogram charts from query rows to SVG with
 * Vega-Lite and publishes the file as an artifact.
 */

import { z } from 'zod';
import { compile, type TopLevelSpec } from 'vega-lite';
import { parse, View } from 'vega';
import { ToolExecutionError } from '../errors.js';
import type { ArtifactPublisher } from '../artifacts/publisher.js';
import { columnNames, toNumber } from './analyze-data.js';
import type { ToolDefinition } from './types.js';

export const CHART_TOOL = 'create_chart';

export const ChartTypeSchema = z.enum(['bar', 'line', 'pie', 'histogram']);

export type ChartType = z.infer<typeof ChartTypeSchema>;

export const ChartInputSchema = z.object({
  type: ChartTypeSchema,
  data: z.array(z.record(z.unknown())).min(1, 'Provide at least one row').describe('Rows, e.g. from sql_db_query'),
  x: z.string().optional().describe('Category/label column (histogram: the numeric column)'),
  y: z.string().optional().describe('Numeric value column'),
  title: z.string().optional(),
  xLabel: z.string().optional(),
  yLabel: z.string().optional(),
  bins: z.number().int().min(2).max(100).optional().describe('Histogram bin count'),
});

export type ChartInput = z.infer<typeof ChartInputSchema>;

export interface ChartSeries {
  type: ChartType;
  x: string;
  /** Absent for histograms, which count rows per bin */
  y?: string;
  rows: Array<Record<string, string | number | null>>;
}

const WIDTH = 640;
const HEIGHT = 400;

function isNumericColumn(rows: ReadonlyArray<Record<string, unknown>>, column: string): boolean {
  let seen = false;
  for (const row of rows) {
    const value = row[column];
    if (value === null || value === undefined) {
      continue;
    }
    if (toNumber(value) === undefined) {
      return false;
    }
    seen = true;
  }
  return seen;
}

function labelOf(value: unknown): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Pick the columns to plot and normalize values (numeric strings become numbers).
 * @throws ToolExecutionError when a named column is missing or not numeric
 */
export function resolveSeries(input: Pick<ChartInput, 'type' | 'data' | 'x' | 'y'>): ChartSeries {
  const columns = columnNames(input.data);
  const requireColumn = (name: string): string => {
    if (!columns.includes(name)) {
      throw new ToolExecutionError(CHART_TOOL, `Column '${name}' not found in data`, { columns });
    }
    return name;
  };
  const numericColumns = columns.filter((column) => isNumericColumn(input.data, column));

  if (input.type === 'histogram') {
    const field = input.x ?? input.y ?? numericColumns[0];
    if (field === undefined) {
      throw new ToolExecutionError(CHART_TOOL, 'A histogram needs a numeric column', { columns });
    }
    requireColumn(field);
    if (!numericColumns.includes(field)) {
      throw new ToolExecutionError(CHART_TOOL, `Column '${field}' is not numeric`, { numericColumns });
    }
    return {
      type: input.type,
      x: field,
      rows: input.data.map((row) => ({ [field]: toNumber(row[field]) ?? null })),
    };
  }

  const x = requireColumn(input.x ?? columns[0] ?? '');
  const y = input.y ?? numericColumns.find((column) => column !== x);
  if (y === undefined) {
    throw new ToolExecutionError(CHART_TOOL, 'No numeric value column found; name one with "y"', { columns });
  }
  requireColumn(y);
  if (!numericColumns.includes(y)) {
    throw new ToolExecutionError(CHART_TOOL, `Column '${y}' is not numeric`, { numericColumns });
  }

  return {
    type: input.type,
    x,
    y,
    rows: input.data.map((row) => ({ [x]: labelOf(row[x]), [y]: toNumber(row[y]) ?? null })),
  };
}

export interface ChartLabels {
  title?: string | undefined;
  xLabel?: string | undefined;
  yLabel?: string | undefined;
  bins?: number | undefined;
}

/**
 * Vega-Lite specification for a resolved series
 */
export function buildChartSpec(series: ChartSeries, labels: ChartLabels = {}): TopLevelSpec {
  const title = labels.title ?? '';
  const xTitle = labels.xLabel ?? series.x;
  const values = series.rows;

  switch (series.type) {
    case 'histogram':
      return {
        title,
        width: WIDTH,
        height: HEIGHT,
        data: { values },
        mark: { type: 'bar' },
        encoding: {
          x: { field: series.x, type: 'quantitative', bin: { maxbins: labels.bins ?? 10 }, title: xTitle },
          y: { aggregate: 'count', type: 'quantitative', title: labels.yLabel ?? 'Count' },
        },
      };
    case 'pie':
      return {
        title,
        width: HEIGHT,
        height: HEIGHT,
        data: { values },
        mark: { type: 'arc' },
        encoding: {
          theta: { field: series.y ?? '', type: 'quantitative' },
          color: { field: series.x, type: 'nominal', title: xTitle },
        },
      };
    case 'line':
      return {
        title,
        width: WIDTH,
        height: HEIGHT,
        data: { values },
        mark: { type: 'line', point: true },
        encoding: {
          x: { field: series.x, type: 'ordinal', sort: null, title: xTitle },
          y: { field: series.y ?? '', type: 'quantitative', title: labels.yLabel ?? series.y ?? '' },
        },
      };
    case 'bar':
      return {
        title,
        width: WIDTH,
        height: HEIGHT,
        data: { values },
        mark: { type: 'bar' },
        encoding: {
          x: { field: series.x, type: 'nominal', sort: null, title: xTitle },
          y: { field: series.y ?? '', type: 'quantitative', title: labels.yLabel ?? series.y ?? '' },
        },
      };
  }
}

/**
 * Render a Vega-Lite spec to an SVG document without a browser or canvas
 */
export async function renderSvg(spec: TopLevelSpec): Promise<string> {
  const view = new View(parse(compile(spec).spec), { renderer: 'none' });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export function createChartTool(publisher: ArtifactPublisher): ToolDefinition<typeof ChartInputSchema> {
  return {
    name: CHART_TOOL,
    description:
      'Create a bar, line, pie or histogram chart from rows (typically sql_db_query rows) and save it as an SVG file. ' +
      "'x' is the label column, 'y' the numeric column; both default to the first suitable column.",
    inputSchema: ChartInputSchema,
    sideEffect: 'external-write',
    handler: async (input, context) => {
      const series = resolveSeries(input);
      const svg = await renderSvg(
        buildChartSpec(series, { title: input.title, xLabel: input.xLabel, yLabel: input.yLabel, bins: input.bins })
      );
      const artifact = await publisher.publish({
        kind: 'chart',
        callId: context.callId,
        baseName: input.title ?? `${input.type}_chart`,
        extension: 'svg',
        content: svg,
      });
      return {
        data: {
          chartType: series.type,
          x: series.x,
          y: series.y ?? null,
          points: series.rows.length,
          fileName: artifact.fileName,
          url: artifact.url,
        },
        artifact,
      };
    },
  };
}
