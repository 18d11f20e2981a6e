import { summarizeThread, sortThreads, type MemoryStore, type Message, type ThreadInfo } from './types.js';

/**
 * Process-local memory store: one arena slot per thread id.
 * Appends complete synchronously, so each one is atomic.
 */
export class InMemoryMemoryStore implements MemoryStore {
  private readonly threads: Map<string, Message[]> = new Map();

  async load(threadId: string): Promise<Message[]> {
    return [...(this.threads.get(threadId) ?? [])];
  }

  async append(threadId: string, message: Message): Promise<void> {
    const messages = this.threads.get(threadId);
    if (messages) {
      messages.push(message);
    } else {
      this.threads.set(threadId, [message]);
    }
  }

  async getThread(threadId: string): Promise<ThreadInfo | undefined> {
    return summarizeThread(threadId, this.threads.get(threadId) ?? []);
  }

  async listThreads(): Promise<ThreadInfo[]> {
    const threads: ThreadInfo[] = [];
    for (const [id, messages] of this.threads) {
      const info = summarizeThread(id, messages);
      if (info) {
        threads.push(info);
      }
    }
    return sortThreads(threads);
  }

  clear(): void {
    this.threads.clear();
  }
}
