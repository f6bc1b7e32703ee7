import { setTimeout as sleep } from 'node:timers/promises';
import type { QueueStore } from './queue-store.js';
import { DispatchError, type Dispatcher } from '../dispatch/dispatcher.js';
import { logger } from '../../lib/logger.js';

/** Configuration for the queue consumer. */
export interface QueueConsumerConfig {
  /** Queue the consumer pops directives from. */
  sourceQueue: string;
  /** Upper bound on each blocking read; also bounds how long `stop()` can take to be observed. */
  pollTimeoutMs: number;
  /** Pause after a failed read before trying again. */
  errorBackoffMs: number;
}

export type QueueConsumerState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * Long-running loop that pops directives from the source queue and hands
 * each one to the dispatcher.
 *
 * Failed messages are logged and dropped, never requeued. Read failures are
 * retried after a backoff. Cancellation is observed at the top of every
 * iteration, so `stop()` settles within one poll interval plus whatever
 * dispatch is already in flight.
 */
export class QueueConsumer {
  private readonly store: Pick<QueueStore, 'popHead'>;
  private readonly dispatcher: Pick<Dispatcher, 'dispatchMessage'>;
  private readonly config: QueueConsumerConfig;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private _state: QueueConsumerState = 'idle';

  constructor(
    store: Pick<QueueStore, 'popHead'>,
    dispatcher: Pick<Dispatcher, 'dispatchMessage'>,
    config: QueueConsumerConfig,
  ) {
    this.store = store;
    this.dispatcher = dispatcher;
    this.config = config;
  }

  get state(): QueueConsumerState {
    return this._state;
  }

  /** Start the loop. Calling it while already started is a no-op. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this._state = 'running';
    logger.info(`[Consumer] Listening for messages on list: ${this.config.sourceQueue}`);
    this.loop = this.run(controller.signal)
      .catch((err) => {
        logger.error('[Consumer] Loop exited unexpectedly:', err);
      })
      .finally(() => {
        this._state = 'stopped';
        logger.info('[Consumer] Stopped');
      });
  }

  /** Signal cancellation and wait for the loop to exit. */
  async stop(): Promise<void> {
    if (!this.loop || !this.controller) {
      this._state = 'stopped';
      return;
    }
    if (this._state === 'running') this._state = 'stopping';
    this.controller.abort();
    await this.loop;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: string | null;
      try {
        message = await this.store.popHead(this.config.sourceQueue, this.config.pollTimeoutMs);
      } catch (err) {
        if (signal.aborted) break;
        logger.error(`[Consumer] Error reading from ${this.config.sourceQueue}:`, err);
        await this.backoff(signal);
        continue;
      }

      // Timeout: nothing arrived within the bound
      if (message === null) continue;

      // Already removed from the source queue, so it is dispatched even if stop() raced the pop
      await this.handle(message);
    }
  }

  private async handle(message: string): Promise<void> {
    logger.debug(`[Consumer] Received message: ${message}`);
    try {
      await this.dispatcher.dispatchMessage(message);
    } catch (err) {
      if (err instanceof DispatchError && err.code !== 'DELIVERY_FAILED') {
        logger.warn(`[Consumer] Dropped message (${err.code}): ${err.message}`);
      } else {
        logger.error('[Consumer] Error processing message:', err);
      }
    }
  }

  private async backoff(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.config.errorBackoffMs, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }
}
