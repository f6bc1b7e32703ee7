import type { QueueConsumer } from '../queue/queue-consumer.js';
import type { QueueStore } from '../queue/queue-store.js';
import { SHUTDOWN_SIGNALS, type ShutdownSignal } from '../../config/constants.js';
import { logger } from '../../lib/logger.js';

/** Minimal event source the coordinator subscribes to; `process` in production. */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

/** The parts of `http.Server` used to stop accepting and drain connections. */
export interface ClosableServer {
  close(callback?: (err?: Error) => void): unknown;
  closeIdleConnections(): void;
  closeAllConnections(): void;
}

/** Collaborators stopped during shutdown, in order. */
export interface ShutdownTargets {
  server: ClosableServer;
  consumer: Pick<QueueConsumer, 'stop'>;
  store: Pick<QueueStore, 'close'>;
}

/** Configuration for the shutdown coordinator. */
export interface ShutdownConfig {
  /** Upper bound applied separately to draining HTTP requests, the consumer exit and the store close. */
  graceMs: number;
  /** Called with the final exit code. Defaults to `process.exit`. */
  exit?: (code: number) => void;
}

/** Resolve true if `task` settles within `ms`, false if the deadline passes first. */
function settlesWithin(task: Promise<void>, ms: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), ms);
    task.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Drives orderly stop of both ingress paths on a termination signal.
 *
 * Order: stop accepting HTTP connections and drain in-flight requests, cancel
 * the queue consumer and wait for its loop to exit, close the store, exit.
 * Each wait is bounded by the grace period; a second signal is ignored.
 */
export class ShutdownCoordinator {
  private readonly targets: ShutdownTargets;
  private readonly graceMs: number;
  private readonly exit: (code: number) => void;
  private pending: Promise<number> | null = null;

  constructor(targets: ShutdownTargets, config: ShutdownConfig) {
    this.targets = targets;
    this.graceMs = config.graceMs;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  /**
   * Subscribe to termination signals.
   *
   * @returns A function that removes the listeners again
   */
  install(source: SignalSource = process): () => void {
    const listeners = SHUTDOWN_SIGNALS.map((signal) => {
      const listener = () => {
        void this.shutdown(signal);
      };
      source.on(signal, listener);
      return [signal, listener] as const;
    });
    return () => {
      for (const [signal, listener] of listeners) {
        source.off(signal, listener);
      }
    };
  }

  /**
   * Run the shutdown sequence once. Later calls return the same result.
   *
   * @returns The exit code passed to `exit`
   */
  shutdown(reason: string): Promise<number> {
    if (this.pending) {
      logger.debug(`[Shutdown] Ignoring ${reason}; shutdown already in progress`);
      return this.pending;
    }
    logger.info(`[Shutdown] Received ${reason}, cleaning up...`);
    this.pending = this.run().then((code) => {
      this.exit(code);
      return code;
    });
    return this.pending;
  }

  private async run(): Promise<number> {
    let failed = false;

    try {
      await this.closeServer();
    } catch (err) {
      failed = true;
      logger.error('[Shutdown] HTTP server shutdown error:', err);
    }

    try {
      const stopped = await settlesWithin(this.targets.consumer.stop(), this.graceMs);
      if (!stopped) {
        logger.warn(`[Shutdown] Queue consumer did not stop within ${this.graceMs}ms`);
      }
    } catch (err) {
      failed = true;
      logger.error('[Shutdown] Queue consumer stop error:', err);
    }

    try {
      const closed = await settlesWithin(this.targets.store.close(), this.graceMs);
      if (!closed) {
        logger.warn(`[Shutdown] Queue store did not close within ${this.graceMs}ms`);
      }
    } catch (err) {
      failed = true;
      logger.error('[Shutdown] Queue store close error:', err);
    }

    logger.info('[Shutdown] Complete');
    return failed ? 1 : 0;
  }

  private async closeServer(): Promise<void> {
    const { server } = this.targets;
    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    server.closeIdleConnections();

    const drained = await settlesWithin(closed, this.graceMs);
    if (!drained) {
      logger.warn(`[Shutdown] Forcing open HTTP connections closed after ${this.graceMs}ms`);
      server.closeAllConnections();
      await closed;
    }
  }
}
