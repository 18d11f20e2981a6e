/**
 * PDF report tool
 *
 * Lays out a title, an optional description and a list of sections (styled
 * text, tables, charts, spacers, page breaks) with PDFKit, then publishes the
 * file. Charts are rendered to SVG and drawn as vector graphics.
 */

import PDFDocument from 'pdfkit';
import SVGtoPDF from 'svg-to-pdfkit';
import { z } from 'zod';
import type { ArtifactPublisher } from '../artifacts/publisher.js';
import { columnNames } from './analyze-data.js';
import { ChartInputSchema, ChartTypeSchema, buildChartSpec, renderSvg, resolveSeries } from './chart.js';
import type { ToolDefinition } from './types.js';

// =============================================================================
// Input Schema
// =============================================================================

export const TextSectionSchema = z.object({
  type: z.literal('text'),
  content: z.string(),
  style: z.enum(['normal', 'heading', 'subheading']).default('normal'),
});

export const TableSectionSchema = z.object({
  type: z.literal('table'),
  title: z.string().optional(),
  headers: z.array(z.string()).optional(),
  rows: z.array(z.union([z.array(z.unknown()), z.record(z.unknown())])),
});

export const ChartSectionSchema = ChartInputSchema.omit({ type: true }).extend({
  type: z.literal('chart'),
  chartType: ChartTypeSchema.default('bar'),
});

export const SpacerSectionSchema = z.object({
  type: z.literal('spacer'),
  height: z.number().min(0).max(500).default(20),
});

export const PageBreakSectionSchema = z.object({
  type: z.literal('page_break'),
});

export const ReportSectionSchema = z.discriminatedUnion('type', [
  TextSectionSchema,
  TableSectionSchema,
  ChartSectionSchema,
  SpacerSectionSchema,
  PageBreakSectionSchema,
]);

export const PdfReportInputSchema = z.object({
  title: z.string().min(1).default('Data Report'),
  description: z.string().optional(),
  filename: z.string().optional().describe('Desired file name without extension'),
  sections: z.array(ReportSectionSchema).default([]),
});

export type PdfReportInput = z.infer<typeof PdfReportInputSchema>;
export type ReportSection = z.infer<typeof ReportSectionSchema>;
export type TableSection = z.infer<typeof TableSectionSchema>;
export type ChartSection = z.infer<typeof ChartSectionSchema>;

// =============================================================================
// Layout
// =============================================================================

const MARGIN = 50;
const CELL_PADDING = 4;
const FONT_SIZES = { title: 20, heading: 16, subheading: 13, normal: 11, table: 9 } as const;
const CHART_ASPECT = 0.65;

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Headers plus string cells for a table section. Object rows take their
 * headers from their keys unless headers are given.
 */
export function normalizeTable(section: Pick<TableSection, 'headers' | 'rows'>): { headers: string[]; rows: string[][] } {
  const records: Array<Record<string, unknown>> = [];
  const arrays: unknown[][] = [];
  for (const row of section.rows) {
    if (Array.isArray(row)) {
      arrays.push(row);
    } else {
      records.push(row);
    }
  }

  const headers = section.headers ?? columnNames(records);
  const rows = [
    ...records.map((record) => headers.map((header) => formatCell(record[header]))),
    ...arrays.map((cells) => cells.map((cell) => formatCell(cell))),
  ];
  return { headers, rows };
}

function ensureSpace(doc: PDFKit.PDFDocument, height: number): void {
  if (doc.y + height > doc.page.height - MARGIN) {
    doc.addPage();
  }
}

function drawRow(doc: PDFKit.PDFDocument, cells: string[], columnWidth: number, bold: boolean): void {
  doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(FONT_SIZES.table);
  const height =
    Math.max(...cells.map((cell) => doc.heightOfString(cell, { width: columnWidth - CELL_PADDING * 2 })), 10) +
    CELL_PADDING * 2;
  ensureSpace(doc, height);

  const top = doc.y;
  cells.forEach((cell, index) => {
    const left = MARGIN + index * columnWidth;
    doc.rect(left, top, columnWidth, height).stroke('#999999');
    doc.fillColor('#000000').text(cell, left + CELL_PADDING, top + CELL_PADDING, {
      width: columnWidth - CELL_PADDING * 2,
    });
  });
  doc.x = MARGIN;
  doc.y = top + height;
}

function drawTable(doc: PDFKit.PDFDocument, section: TableSection): void {
  if (section.title) {
    ensureSpace(doc, 40);
    doc.font('Helvetica-Bold').fontSize(FONT_SIZES.subheading).text(section.title);
    doc.moveDown(0.5);
  }

  const { headers, rows } = normalizeTable(section);
  const columnCount = Math.max(headers.length, ...rows.map((row) => row.length), 1);
  const columnWidth = (doc.page.width - MARGIN * 2) / columnCount;

  if (headers.length > 0) {
    drawRow(doc, headers, columnWidth, true);
  }
  for (const row of rows) {
    drawRow(doc, row, columnWidth, false);
  }
  doc.moveDown();
}

async function drawChart(doc: PDFKit.PDFDocument, section: ChartSection): Promise<void> {
  const series = resolveSeries({ type: section.chartType, data: section.data, x: section.x, y: section.y });
  const svg = await renderSvg(
    buildChartSpec(series, { title: section.title, xLabel: section.xLabel, yLabel: section.yLabel, bins: section.bins })
  );

  const width = doc.page.width - MARGIN * 2;
  const height = Math.round(width * CHART_ASPECT);
  ensureSpace(doc, height);
  SVGtoPDF(doc, svg, MARGIN, doc.y, { width, height, preserveAspectRatio: 'xMidYMin meet' });
  doc.x = MARGIN;
  doc.y += height;
  doc.moveDown();
}

async function drawSection(doc: PDFKit.PDFDocument, section: ReportSection): Promise<void> {
  switch (section.type) {
    case 'text':
      doc
        .font(section.style === 'normal' ? 'Helvetica' : 'Helvetica-Bold')
        .fontSize(FONT_SIZES[section.style])
        .text(section.content, { align: 'left' });
      doc.moveDown(section.style === 'normal' ? 0.8 : 0.4);
      break;
    case 'table':
      drawTable(doc, section);
      break;
    case 'chart':
      await drawChart(doc, section);
      break;
    case 'spacer':
      doc.y = Math.min(doc.y + section.height, doc.page.height - MARGIN);
      break;
    case 'page_break':
      doc.addPage();
      break;
  }
}

/**
 * Render the whole report into memory
 */
export async function renderPdf(report: Pick<PdfReportInput, 'title' | 'description' | 'sections'>): Promise<Buffer> {
  const doc = new PDFDocument({ size: 'A4', margin: MARGIN, info: { Title: report.title } });
  const chunks: Buffer[] = [];
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  doc.font('Helvetica-Bold').fontSize(FONT_SIZES.title).text(report.title, { align: 'center' });
  doc.moveDown(0.5);
  if (report.description) {
    doc.font('Helvetica-Oblique').fontSize(FONT_SIZES.normal).text(report.description, { align: 'center' });
  }
  doc.moveDown();

  try {
    for (const section of report.sections) {
      await drawSection(doc, section);
    }
  } finally {
    doc.end();
  }
  return finished;
}

export function createPdfReportTool(publisher: ArtifactPublisher): ToolDefinition<typeof PdfReportInputSchema> {
  return {
    name: 'create_pdf_report',
    description:
      'Generate a PDF report. Sections: {type:"text", content, style: normal|heading|subheading}, ' +
      '{type:"table", title?, headers?, rows}, ' +
      '{type:"chart", chartType: bar|line|pie|histogram, data: rows, x?, y?, title?, xLabel?, yLabel?, bins?}, ' +
      '{type:"spacer", height?}, {type:"page_break"}.',
    inputSchema: PdfReportInputSchema,
    sideEffect: 'external-write',
    handler: async (input, context) => {
      const content = await renderPdf(input);
      const artifact = await publisher.publish({
        kind: 'pdf',
        callId: context.callId,
        baseName: input.filename ?? input.title,
        extension: 'pdf',
        content,
      });
      return {
        data: { fileName: artifact.fileName, url: artifact.url, sections: input.sections.length },
        artifact,
      };
    },
  };
}
