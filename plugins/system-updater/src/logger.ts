// Log sink construction. One logger per process, built by the entry point and
// passed down explicitly; the core never reaches for a module-level logger.
// Destinations are written synchronously, one JSON line per record, so
// concurrent managers cannot interleave mid-line in the log file.
import pino from "pino";
import type { Logger, Level } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  /** Append-only log file; parent directories are created on demand. */
  logFile?: string | null;
  name?: string;
}

const LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function resolveLevel(...candidates: Array<string | undefined>): Level {
  for (const candidate of candidates) {
    const match = LEVELS.find((level) => level === candidate);
    if (match) return match;
  }
  return "info";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = resolveLevel(process.env.LOG_LEVEL, options.level);
  const streams = [{ level, stream: pino.destination({ dest: 2, sync: true }) }];
  if (options.logFile) {
    streams.push({
      level,
      stream: pino.destination({ dest: options.logFile, append: true, sync: true, mkdir: true }),
    });
  }

  return pino(
    {
      name: options.name ?? "system-updater",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );
}
