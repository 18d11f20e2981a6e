import { describe, it, expect } from 'vitest';
import { fingerprintCall, stableStringify } from '../../../src/agent/fingerprint.js';

describe('stableStringify', () => {
  it('should sort keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: [2, { y: 1, x: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"x":0,"y":1}]},"b":1}'
    );
  });

  it('should drop undefined properties', () => {
    expect(stableStringify({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('should render a bare undefined as null', () => {
    expect(stableStringify(undefined)).toBe('null');
  });
});

describe('fingerprintCall', () => {
  it('should ignore argument key order', () => {
    expect(fingerprintCall('sql_db_query', { query: 'SELECT 1', limit: 5 })).toBe(
      fingerprintCall('sql_db_query', { limit: 5, query: 'SELECT 1' })
    );
  });

  it('should differ by tool name and by argument values', () => {
    const base = fingerprintCall('sql_db_query', { query: 'SELECT 1' });
    expect(fingerprintCall('export_query_to_csv', { query: 'SELECT 1' })).not.toBe(base);
    expect(fingerprintCall('sql_db_query', { query: 'SELECT 2' })).not.toBe(base);
  });

  it('should prefix the digest with the tool name', () => {
    expect(fingerprintCall('analyze_data', {})).toMatch(/^analyze_data:[0-9a-f]{64}$/);
  });
});
