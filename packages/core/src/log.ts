/**
 * packages/core/src/log.ts — Log event contract.
 *
 * Core never writes to a console. Components accept an optional `log` sink and
 * hand it structured events; hosts decide where the lines go.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = Readonly<{
  level: LogLevel;
  message: string;
  /** Component that produced the event (e.g. "menu", "playback"). */
  source: string;
  error?: unknown;
}>;

export type LogSink = (event: LogEvent) => void;

export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
});

/**
 * Bind a sink to a source name. Returns a no-op logger when `log` is undefined.
 */
export function createLogger(
  log: LogSink | undefined,
  source: string,
): (level: LogLevel, message: string, error?: unknown) => void {
  if (log === undefined) return () => {};
  return (level, message, error) => {
    log(error === undefined ? { level, message, source } : { level, message, source, error });
  };
}
