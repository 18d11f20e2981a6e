/**
 * Vitest Global Test Setup
 *
 * Suppresses console output during tests. The structured logger writes to
 * console.log by default, which would otherwise flood the reporter.
 */

import { beforeAll, afterAll, vi } from 'vitest';

// Keep telemetry exporters off regardless of the developer's shell
process.env['DBCHAT_TELEMETRY_ENABLED'] = 'false';

const originalConsole = {
  log: console.log,
  error: console.error,
  warn: console.warn,
  info: console.info,
  debug: console.debug,
};

beforeAll(() => {
  console.log = vi.fn();
  console.error = vi.fn();
  console.warn = vi.fn();
  console.info = vi.fn();
  console.debug = vi.fn();
});

afterAll(() => {
  console.log = originalConsole.log;
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.info = originalConsole.info;
  console.debug = originalConsole.debug;
});
