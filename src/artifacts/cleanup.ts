/**
 * Expiry-driven deletion of exported files
 *
 * Anything in the export directory older than the artifact TTL is removed,
 * including temp files abandoned by interrupted publishes.
 */

import type { Stats } from 'node:fs';
import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { describeError } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';

export interface SweepOptions {
  directory: string;
  ttlMs: number;
  now?: Date;
}

export interface SweepResult {
  removed: string[];
  kept: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function sweepExpiredArtifacts(options: SweepOptions): Promise<SweepResult> {
  const directory = path.resolve(options.directory);
  const cutoff = (options.now ?? new Date()).getTime() - options.ttlMs;

  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (isNotFound(error)) {
      return { removed: [], kept: 0 };
    }
    throw error;
  }

  const removed: string[] = [];
  let kept = 0;
  for (const entry of entries) {
    const location = path.join(directory, entry);
    let stats: Stats;
    try {
      stats = await stat(location);
    } catch (error) {
      // removed concurrently
      if (isNotFound(error)) {
        continue;
      }
      throw error;
    }
    if (!stats.isFile()) {
      continue;
    }
    if (stats.mtimeMs < cutoff) {
      await rm(location, { force: true });
      removed.push(entry);
    } else {
      kept++;
    }
  }
  return { removed: removed.sort(), kept };
}

export interface ArtifactSweeperOptions {
  directory: string;
  ttlMs: number;
  intervalMs: number;
  logger?: StructuredLogger;
}

/**
 * Periodic sweep. The timer is unref'd so it never keeps the process alive.
 */
export class ArtifactSweeper {
  private timer: NodeJS.Timeout | null = null;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: ArtifactSweeperOptions) {
    this.logger = options.logger ?? createSilentLogger('sweeper');
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.sweepOnce();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async sweepOnce(now: Date = new Date()): Promise<SweepResult> {
    try {
      const result = await sweepExpiredArtifacts({
        directory: this.options.directory,
        ttlMs: this.options.ttlMs,
        now,
      });
      if (result.removed.length > 0) {
        this.logger.info('Removed expired artifacts', { count: result.removed.length, files: result.removed });
      }
      return result;
    } catch (error) {
      this.logger.error('Artifact sweep failed', { error: describeError(error) });
      return { removed: [], kept: 0 };
    }
  }
}
