/**
 * File-backed memory store
 *
 * One NDJSON file per thread (`<encoded thread id>.ndjson`). An append writes
 * a single line and fsyncs before resolving; appends to the same thread are
 * serialized through a KeyedMutex. A failed write or sync truncates the file
 * back to its previous length, and a message whose line is already durable
 * is not written again, so a retried append stores it once.
 */

import { mkdir, open, readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { StorageError, toStorageError } from '../errors.js';
import { KeyedMutex } from './thread-lock.js';
import {
  MessageSchema,
  sortThreads,
  summarizeThread,
  type MemoryStore,
  type Message,
  type ThreadInfo,
} from './types.js';

const FILE_EXTENSION = '.ndjson';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * undefined for names this store did not write (malformed escapes)
 */
function decodeThreadId(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch {
    return undefined;
  }
}

export interface FileMemoryStoreOptions {
  directory: string;
}

export class FileMemoryStore implements MemoryStore {
  private readonly directory: string;
  private readonly writes = new KeyedMutex();
  /** Id of the last message made durable, per thread */
  private readonly lastDurable = new Map<string, string>();

  constructor(options: FileMemoryStoreOptions) {
    this.directory = path.resolve(options.directory);
  }

  getDirectory(): string {
    return this.directory;
  }

  /**
   * Thread ids are opaque; percent-encoding keeps any id inside the directory.
   */
  fileFor(threadId: string): string {
    return path.join(this.directory, `${encodeURIComponent(threadId)}${FILE_EXTENSION}`);
  }

  async load(threadId: string): Promise<Message[]> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(threadId), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw toStorageError(error, `Failed to read thread '${threadId}'`);
    }
    return this.parse(threadId, raw);
  }

  async append(threadId: string, message: Message): Promise<void> {
    const line = `${JSON.stringify(message)}\n`;
    await this.writes.runExclusive(threadId, async () => {
      if (this.lastDurable.get(threadId) === message.id) {
        return;
      }
      try {
        await mkdir(this.directory, { recursive: true });
        const handle = await open(this.fileFor(threadId), 'a');
        try {
          const { size } = await handle.stat();
          try {
            await handle.writeFile(line, 'utf8');
            await handle.sync();
          } catch (error) {
            await handle.truncate(size);
            throw error;
          }
          this.lastDurable.set(threadId, message.id);
        } finally {
          await handle.close();
        }
      } catch (error) {
        throw toStorageError(error, `Failed to append to thread '${threadId}'`);
      }
    });
  }

  async getThread(threadId: string): Promise<ThreadInfo | undefined> {
    return summarizeThread(threadId, await this.load(threadId));
  }

  async listThreads(): Promise<ThreadInfo[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw toStorageError(error, 'Failed to list threads');
    }

    const threads: ThreadInfo[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(FILE_EXTENSION)) {
        continue;
      }
      const threadId = decodeThreadId(entry.slice(0, -FILE_EXTENSION.length));
      if (threadId === undefined) {
        continue;
      }
      const info = await this.getThread(threadId);
      if (info) {
        threads.push(info);
      }
    }
    return sortThreads(threads);
  }

  private parse(threadId: string, raw: string): Message[] {
    const messages: Message[] = [];
    const lines = raw.split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') {
        continue;
      }
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        throw new StorageError(`Thread '${threadId}' has a corrupt record at line ${index + 1}`, false);
      }
      const parsed = MessageSchema.safeParse(json);
      if (!parsed.success) {
        throw new StorageError(`Thread '${threadId}' has an invalid record at line ${index + 1}`, false);
      }
      messages.push(Object.freeze(parsed.data));
    }
    return messages;
  }
}
