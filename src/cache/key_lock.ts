import pLimit, { type LimitFunction } from "p-limit";

interface KeyQueue {
  limit: LimitFunction;
  users: number;
}

/**
 * Runs tasks for the same key one at a time. Tasks for different keys
 * never wait on each other. Idle queues are dropped.
 */
export class KeyedLock {
  private readonly queues = new Map<string, KeyQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = { limit: pLimit(1), users: 0 };
      this.queues.set(key, queue);
    }

    queue.users++;
    try {
      return await queue.limit(task);
    } finally {
      queue.users--;
      if (queue.users === 0) {
        this.queues.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}
