import { describe, it, expect } from 'vitest';
import { RESPONSE_TEXTS, assembleResponse } from '../../../src/agent/assembler.js';
import type { Artifact } from '../../../src/artifacts/types.js';
import type { ToolResult } from '../../../src/tools/types.js';

function artifact(fileName: string): Artifact {
  return {
    kind: 'chart',
    fileName,
    location: `/exports/${fileName}`,
    url: `/downloads/${fileName}`,
    callId: 'c1',
    createdAt: '2026-01-01T00:00:00.000Z',
    expiresAt: '2026-01-02T00:00:00.000Z',
  };
}

function result(status: ToolResult['status'], file?: string): ToolResult {
  return {
    callId: 'c1',
    toolName: 'create_chart',
    status,
    durationMs: 1,
    ...(file ? { artifact: artifact(file) } : {}),
  };
}

describe('assembleResponse', () => {
  it('should return the answer with artifacts of successful results', () => {
    const response = assembleResponse({
      status: 'completed',
      answer: 'Here is your chart.',
      results: [result('success', 'a.svg'), result('failure', 'b.svg'), result('success', 'a.svg')],
    });

    expect(response.text).toBe('Here is your chart.');
    expect(response.artifacts.map((item) => item.fileName)).toEqual(['a.svg']);
  });

  it('should keep artifacts when the step limit is hit', () => {
    const response = assembleResponse({ status: 'step_limit_exceeded', results: [result('success', 'a.svg')] });
    expect(response).toEqual({ text: RESPONSE_TEXTS.step_limit_exceeded, artifacts: [artifact('a.svg')] });
  });

  it.each(['cancelled', 'storage_error', 'reasoning_error'] as const)('should return no artifacts when %s', (status) => {
    expect(assembleResponse({ status, results: [result('success', 'a.svg')] })).toEqual({
      text: RESPONSE_TEXTS[status],
      artifacts: [],
    });
  });

  it('should default a missing answer to an empty string', () => {
    expect(assembleResponse({ status: 'completed', results: [] }).text).toBe('');
  });
});
