/**
 * In-process FIFO list store for tests.
 *
 * Structurally matches the server's `QueueStore`: blocking pop from the head
 * with a bounded wait, append to the tail. A pop waiting on an empty list is
 * served by the next append, in arrival order, as Redis serves BLPOP clients.
 */
export class MemoryQueueStore {
  private readonly lists = new Map<string, string[]>();
  private readonly waiters = new Map<string, Array<(value: string | null) => void>>();
  private closed = false;

  async popHead(queue: string, timeoutMs: number): Promise<string | null> {
    this.assertOpen();
    const list = this.lists.get(queue);
    const head = list?.shift();
    if (head !== undefined) return head;

    return new Promise((resolve) => {
      const waiting = this.waiters.get(queue) ?? [];
      const waiter = (value: string | null) => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        const index = waiting.indexOf(waiter);
        if (index >= 0) waiting.splice(index, 1);
        resolve(null);
      }, timeoutMs);
      waiting.push(waiter);
      this.waiters.set(queue, waiting);
    });
  }

  async pushTail(queue: string, payload: string): Promise<number> {
    this.assertOpen();
    const list = this.lists.get(queue) ?? [];
    list.push(payload);
    this.lists.set(queue, list);
    const length = list.length;

    const waiter = this.waiters.get(queue)?.shift();
    if (waiter) waiter(list.shift() ?? null);
    return length;
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiting of this.waiters.values()) {
      for (const waiter of waiting.splice(0)) waiter(null);
    }
  }

  /** Snapshot of a list's current contents, head first. */
  items(queue: string): string[] {
    return [...(this.lists.get(queue) ?? [])];
  }

  /** Parsed JSON of every element in a list, head first. */
  itemsJson(queue: string): unknown[] {
    return this.items(queue).map((item): unknown => JSON.parse(item));
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('Queue store is closed');
  }
}
