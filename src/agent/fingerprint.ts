import { createHash } from 'node:crypto';

/**
 * JSON with object keys sorted at every level, so argument maps that differ
 * only in key order serialize identically
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Dedup key of a tool call: tool name plus a hash of its arguments
 */
export function fingerprintCall(name: string, args: Record<string, unknown>): string {
  const digest = createHash('sha256').update(stableStringify(args)).digest('hex');
  return `${name}:${digest}`;
}
