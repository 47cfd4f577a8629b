import type { LogLevel, Logger } from "@fwsync/core";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LoggerOptions = {
  timestamps?: boolean;
  now?: () => Date;
};

// Level-filtered logger over a sink such as `console`. Debug lines fall back to the
// sink's info channel when it has no debug method.
export function createLogger(level: LogLevel, sink: Logger, options: LoggerOptions = {}): Logger {
  const timestamps = options.timestamps ?? true;
  const now = options.now ?? (() => new Date());
  const threshold = LEVEL_RANK[level];

  const emit = (lineLevel: LogLevel, write: ((message: string) => void) | undefined) =>
    (message: string): void => {
      if (LEVEL_RANK[lineLevel] < threshold || !write) {
        return;
      }
      const prefix = timestamps ? `${now().toISOString()} ` : "";
      write(`${prefix}${lineLevel.toUpperCase().padEnd(5)} ${message}`);
    };

  return {
    debug: emit("debug", sink.debug ?? sink.info),
    info: emit("info", sink.info),
    warn: emit("warn", sink.warn),
    error: emit("error", sink.error)
  };
}
