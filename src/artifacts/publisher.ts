/**
 * Idempotent artifact publishing
 *
 * File names are derived from the call id, so re-running the same call finds
 * the file it already published instead of writing a second one. Content is
 * written to a temp file in the export directory, fsynced and renamed into
 * place: a reader (or a caller that timed out) sees either no file or the
 * complete one.
 */

import { createHash, randomUUID } from 'node:crypto';
import { mkdir, open, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { Artifact, ArtifactKind } from './types.js';

export interface ArtifactPublisherOptions {
  directory: string;
  /** Lifetime of a published file before the sweeper may delete it */
  ttlMs: number;
  /** Prefix for download URLs (default: /downloads) */
  baseUrl?: string;
  logger?: StructuredLogger;
  clock?: () => Date;
}

export interface PublishRequest {
  kind: ArtifactKind;
  callId: string;
  /** Human-readable stem; reduced to a filesystem-safe slug */
  baseName: string;
  extension: string;
  content: string | Uint8Array;
}

const MAX_SLUG_LENGTH = 48;

/**
 * Lowercase alphanumerics and single underscores, never empty
 */
export function slugify(value: string): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/g, '');
  return slug === '' ? 'artifact' : slug;
}

export function callIdSuffix(callId: string): string {
  return createHash('sha256').update(callId).digest('hex').slice(0, 12);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ArtifactPublisher {
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly baseUrl: string;
  private readonly logger: StructuredLogger;
  private readonly clock: () => Date;

  constructor(options: ArtifactPublisherOptions) {
    this.directory = path.resolve(options.directory);
    this.ttlMs = options.ttlMs;
    this.baseUrl = (options.baseUrl ?? '/downloads').replace(/\/+$/, '');
    this.logger = options.logger ?? createSilentLogger('artifacts');
    this.clock = options.clock ?? (() => new Date());
  }

  getDirectory(): string {
    return this.directory;
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  fileNameFor(request: Pick<PublishRequest, 'baseName' | 'callId' | 'extension'>): string {
    const extension = request.extension.replace(/^\.+/, '');
    return `${slugify(request.baseName)}_${callIdSuffix(request.callId)}.${extension}`;
  }

  urlFor(fileName: string): string {
    return `${this.baseUrl}/${encodeURIComponent(fileName)}`;
  }

  /**
   * Publish content and return the artifact only after the file is durable.
   */
  async publish(request: PublishRequest): Promise<Artifact> {
    const fileName = this.fileNameFor(request);
    const location = path.join(this.directory, fileName);

    const existing = await this.statIfExists(location);
    if (existing) {
      this.logger.debug('Artifact already published for call', { callId: request.callId, fileName });
      return this.describe(request, fileName, location, existing.mtime);
    }

    await mkdir(this.directory, { recursive: true });
    const tempPath = path.join(this.directory, `.${fileName}.${randomUUID()}.tmp`);

    try {
      const handle = await open(tempPath, 'wx');
      try {
        await handle.writeFile(request.content);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, location);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    this.logger.info('Artifact published', { kind: request.kind, fileName, callId: request.callId });
    return this.describe(request, fileName, location, this.clock());
  }

  private describe(request: PublishRequest, fileName: string, location: string, createdAt: Date): Artifact {
    return {
      kind: request.kind,
      fileName,
      location,
      url: this.urlFor(fileName),
      callId: request.callId,
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.ttlMs).toISOString(),
    };
  }

  private async statIfExists(location: string): Promise<{ mtime: Date } | undefined> {
    try {
      const stats = await stat(location);
      return stats.isFile() ? { mtime: stats.mtime } : undefined;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }
}
