import { createConsola, type LogObject } from 'consola';
import fs from 'fs';
import path from 'path';

/**
 * Central logger module for the relay server.
 *
 * Provides a singleton logger backed by consola. Before `initLogger()` is called,
 * the logger outputs to console only at info level. After `initLogger()`, it uses
 * the configured level and, when a log file is given, also appends structured
 * NDJSON entries to that file.
 *
 * @module lib/logger
 */

/**
 * Create an NDJSON file reporter that appends structured log entries to disk.
 */
function createFileReporter(logFile: string) {
  return {
    log(logObj: LogObject) {
      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: logObj.args.map(String).join(' '),
        tag: logObj.tag || undefined,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

/** Default logger instance (console-only until initLogger is called). */
export let logger = createConsola({
  level: 3, // info
});

/** Options accepted by {@link initLogger}. */
export interface LoggerOptions {
  /** Numeric log level (0=fatal … 5=trace). Defaults to 4 (debug) in dev, 3 (info) in production. */
  level?: number;
  /** Optional NDJSON log file. Its directory is created if missing. */
  file?: string;
}

/**
 * Initialize the logger with the configured level and optional file persistence.
 * Call once at server startup after the environment is parsed.
 */
export function initLogger(options: LoggerOptions = {}): void {
  const level = options.level ?? (process.env.NODE_ENV === 'production' ? 3 : 4);

  logger = createConsola({ level });

  if (options.file) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    logger.addReporter(createFileReporter(options.file));
  }
}
