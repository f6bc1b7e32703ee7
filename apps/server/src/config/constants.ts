/** Timeouts applied to the HTTP server socket lifecycle (ms). */
export const HTTP_TIMEOUTS = {
  REQUEST_MS: 10_000,
  HEADERS_MS: 10_000,
} as const;

/** Signals that trigger graceful shutdown. */
export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];
