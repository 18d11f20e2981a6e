import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { ArtifactPublisher } from '../../../src/artifacts/publisher.js';
import {
  PdfReportInputSchema,
  createPdfReportTool,
  formatCell,
  normalizeTable,
  renderPdf,
} from '../../../src/tools/pdf-report.js';
import { createTempDir, createToolContext, removeTempDir } from '../../helpers/index.js';

describe('formatCell', () => {
  it('should render scalars, dates and objects as text', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(undefined)).toBe('');
    expect(formatCell(12.5)).toBe('12.5');
    expect(formatCell(false)).toBe('false');
    expect(formatCell(new Date('2026-03-01T00:00:00.000Z'))).toBe('2026-03-01T00:00:00.000Z');
    expect(formatCell({ a: 1 })).toBe('{"a":1}');
  });
});

describe('normalizeTable', () => {
  it('should take headers from object rows', () => {
    expect(
      normalizeTable({
        rows: [
          { region: 'North', total: 120 },
          { region: 'South', total: null },
        ],
      })
    ).toEqual({
      headers: ['region', 'total'],
      rows: [
        ['North', '120'],
        ['South', ''],
      ],
    });
  });

  it('should keep array rows and explicit headers', () => {
    expect(normalizeTable({ headers: ['A', 'B'], rows: [[1, 'x']] })).toEqual({
      headers: ['A', 'B'],
      rows: [['1', 'x']],
    });
  });
});

describe('create_pdf_report tool', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(directory);
  });

  it('should render a PDF document', async () => {
    const pdf = await renderPdf(
      PdfReportInputSchema.parse({
        title: 'Quarterly Sales',
        description: 'Totals per region',
        sections: [
          { type: 'text', content: 'Overview', style: 'heading' },
          { type: 'table', title: 'Totals', rows: [{ region: 'North', total: 120 }] },
          { type: 'spacer' },
          { type: 'page_break' },
          { type: 'text', content: 'The end.' },
        ],
      })
    );

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('should publish under the requested file name', async () => {
    const tool = createPdfReportTool(new ArtifactPublisher({ directory, ttlMs: 60_000 }));

    const output = await tool.handler(
      PdfReportInputSchema.parse({ title: 'Sales', filename: 'Sales Q1', sections: [{ type: 'spacer', height: 10 }] }),
      createToolContext('call_pdf', 'create_pdf_report')
    );

    expect(output.artifact?.kind).toBe('pdf');
    expect(output.artifact?.fileName).toMatch(/^sales_q1_[0-9a-f]{12}\.pdf$/);
    expect(output.data).toEqual({ fileName: output.artifact?.fileName, url: output.artifact?.url, sections: 1 });
    const written = await readFile(output.artifact?.location ?? '');
    expect(written.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('should draw chart sections into the document', async () => {
    const rows = [
      { region: 'North', total: 120 },
      { region: 'South', total: 80 },
    ];
    const withChart = await renderPdf(
      PdfReportInputSchema.parse({
        title: 'Sales',
        sections: [{ type: 'chart', chartType: 'pie', data: rows, title: 'Share by Region' }],
      })
    );
    const withoutChart = await renderPdf(PdfReportInputSchema.parse({ title: 'Sales', sections: [] }));

    expect(withChart.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(withChart.length).toBeGreaterThan(withoutChart.length);
  });

  it('should default chart sections to bars', () => {
    const input = PdfReportInputSchema.parse({ sections: [{ type: 'chart', data: [{ a: 'x', b: 1 }] }] });
    expect(input.sections[0]).toMatchObject({ type: 'chart', chartType: 'bar' });
  });

  it('should fail a chart section that names a missing column', async () => {
    const report = PdfReportInputSchema.parse({
      title: 'Sales',
      sections: [{ type: 'chart', data: [{ region: 'North', total: 1 }], y: 'profit' }],
    });

    await expect(renderPdf(report)).rejects.toThrow("Column 'profit' not found in data");
  });

  it('should reject chart sections without rows and unknown section types', () => {
    expect(PdfReportInputSchema.safeParse({ sections: [{ type: 'chart', data: [] }] }).success).toBe(false);
    expect(PdfReportInputSchema.safeParse({ sections: [{ type: 'image' }] }).success).toBe(false);
  });
});
