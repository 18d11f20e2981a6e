import { describe, it, expect } from 'vitest';
import { leadingKeyword, splitStatements } from '../../../src/database/statement.js';

describe('leadingKeyword', () => {
  it('should skip comments, whitespace and parentheses', () => {
    expect(leadingKeyword('  -- totals\n/* by region */ (SELECT 1)')).toBe('select');
  });

  it('should return an empty string when there is no keyword', () => {
    expect(leadingKeyword('   ')).toBe('');
  });
});

describe('splitStatements', () => {
  it('should split on top-level semicolons', () => {
    expect(splitStatements('SELECT 1; COMMIT; DELETE FROM orders')).toEqual([
      'SELECT 1',
      'COMMIT',
      'DELETE FROM orders',
    ]);
  });

  it('should ignore a trailing semicolon and trailing comments', () => {
    expect(splitStatements('SELECT 1;  -- done\n')).toEqual(['SELECT 1']);
  });

  it('should not split inside quoted strings and identifiers', () => {
    expect(splitStatements(`SELECT 'a;b', 'it''s;' AS "x;y" FROM t`)).toHaveLength(1);
  });

  it('should honour backslash escapes in E strings', () => {
    expect(splitStatements(`SELECT E'\\';' ; SELECT 2`)).toEqual([`SELECT E'\\';'`, 'SELECT 2']);
  });

  it('should not split inside comments', () => {
    expect(splitStatements('SELECT 1 /* a; /* nested; */ b; */ -- c;\n FROM t')).toHaveLength(1);
  });

  it('should not split inside dollar-quoted bodies', () => {
    expect(splitStatements('SELECT $tag$ ; $tag$, $$;$$')).toHaveLength(1);
    expect(splitStatements('SELECT $$a$$; SELECT 2')).toHaveLength(2);
  });

  it('should return nothing for blank text', () => {
    expect(splitStatements('  ;  ')).toEqual([]);
  });
});
