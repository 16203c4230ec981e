/**
 * packages/node/src/log.ts — Console log sink.
 */

import { LOG_LEVEL_RANK, type LogEvent, type LogLevel, type LogSink } from "@commwheel/core";

export type LogStream = Readonly<{ write: (chunk: string) => unknown }>;

export type ConsoleLogOptions = Readonly<{
  /** Defaults to process.stderr. */
  stream?: LogStream;
  /** Events below this level are dropped. Defaults to "info". */
  minLevel?: LogLevel;
}>;

export function formatLogEvent(event: LogEvent): string {
  return `[${event.level}] ${event.source}: ${event.message}`;
}

export function createConsoleLog(opts: ConsoleLogOptions = {}): LogSink {
  const stream = opts.stream ?? process.stderr;
  const minRank = LOG_LEVEL_RANK[opts.minLevel ?? "info"];
  const verbose = minRank === LOG_LEVEL_RANK.debug;

  return (event) => {
    if (LOG_LEVEL_RANK[event.level] < minRank) return;
    stream.write(`${formatLogEvent(event)}\n`);
    if (verbose && event.error instanceof Error && event.error.stack !== undefined) {
      stream.write(`${event.error.stack}\n`);
    }
  };
}
