/**
 * FIFO list store used for both the source and target queues.
 *
 * Implementations must tolerate concurrent use: the queue consumer may hold a
 * blocking pop open while HTTP requests append work-orders.
 */
export interface QueueStore {
  /**
   * Remove and return the head of `queue`, waiting up to `timeoutMs` for an
   * element to arrive. Resolves `null` when the wait elapses.
   */
  popHead(queue: string, timeoutMs: number): Promise<string | null>;
  /** Append `payload` to the tail of `queue`. Resolves the queue length after the append. */
  pushTail(queue: string, payload: string): Promise<number>;
  /** Round-trip check used at startup. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** The write half of a {@link QueueStore}, all the dispatcher needs. */
export type QueueWriter = Pick<QueueStore, 'pushTail'>;
