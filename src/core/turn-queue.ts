import { createLogger, Logger } from '../utils/logger';

type QueuedOperation<T> = () => Promise<T>;

interface QueueItem {
  run: () => Promise<void>;
  label: string;
}

/**
 * FIFO queues keyed by (character, user). Operations sharing a key run one at a
 * time in submission order; different keys run fully in parallel.
 */
export class KeyedTurnQueue {
  private queues: Map<string, QueueItem[]> = new Map();
  private active: Set<string> = new Set();
  private idleWaiters: Map<string, Array<() => void>> = new Map();
  private log: Logger;

  constructor(name: string) {
    this.log = createLogger(name);
  }

  static key(characterId: string, userId: string): string {
    return `${characterId}/${userId}`;
  }

  enqueue<T>(key: string, operation: QueuedOperation<T>, label: string = 'operation'): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      queue.push({
        label,
        run: async () => {
          try {
            resolve(await operation());
          } catch (error) {
            this.log.debug(`📋 ${label} for ${key} failed`);
            reject(error);
          }
        }
      });
      this.queues.set(key, queue);
      this.log.debug(`📋 Enqueued ${label} for ${key} (${queue.length} waiting)`);

      if (!this.active.has(key)) {
        void this.process(key);
      }
    });
  }

  // Resolves once everything queued for the key so far has settled
  drain(key: string): Promise<void> {
    if (!this.active.has(key)) return Promise.resolve();

    return new Promise<void>(resolve => {
      const waiters = this.idleWaiters.get(key) ?? [];
      waiters.push(resolve);
      this.idleWaiters.set(key, waiters);
    });
  }

  async drainAll(): Promise<void> {
    await Promise.all(Array.from(this.active, key => this.drain(key)));
  }

  pending(key: string): number {
    return (this.queues.get(key)?.length ?? 0) + (this.active.has(key) ? 1 : 0);
  }

  private async process(key: string): Promise<void> {
    this.active.add(key);

    let item = this.queues.get(key)?.shift();
    while (item) {
      await item.run();
      item = this.queues.get(key)?.shift();
    }

    this.queues.delete(key);
    this.active.delete(key);
    for (const waiter of this.idleWaiters.get(key) ?? []) waiter();
    this.idleWaiters.delete(key);
  }
}
