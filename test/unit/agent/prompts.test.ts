import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, formatDate } from '../../../src/agent/prompts.js';

describe('formatDate', () => {
  it('should format as YYYY-MM-DD', () => {
    expect(formatDate(new Date('2026-10-18T22:15:00.000Z'))).toBe('2026-10-18');
  });
});

describe('buildSystemPrompt', () => {
  const base = { dialect: 'PostgreSQL', topK: 25, today: '2026-10-18' };

  it('should name the dialect, date and row limit', () => {
    const prompt = buildSystemPrompt(base);

    expect(prompt.split('\n')[0]).toBe(
      'You are a helpful assistant with access to a PostgreSQL database. Answer questions by querying it with the tools provided.'
    );
    expect(prompt).toContain('Current date: 2026-10-18');
    expect(prompt).toContain('limit exploratory queries to 25 rows');
    expect(prompt).not.toContain('Tables:');
    expect(prompt).not.toContain('get_column_meanings');
  });

  it('should number the rules', () => {
    const lines = buildSystemPrompt(base).split('\n');
    const start = lines.indexOf('RULES:');
    expect(lines[start + 1]?.startsWith('1. ')).toBe(true);
    expect(lines.at(-1)).toBe('9. When a tool created a file, include its download URL in your answer.');
  });

  it('should list known tables and the column meanings rule', () => {
    const prompt = buildSystemPrompt({ ...base, tables: ['sales', 'customers'], columnMeanings: true });

    expect(prompt).toContain('Tables: sales, customers');
    expect(prompt).toContain(
      '3. Use get_column_meanings to learn what the columns of a table represent before interpreting them.'
    );
    expect(prompt.split('\n').at(-1)?.startsWith('10. ')).toBe(true);
  });
});
