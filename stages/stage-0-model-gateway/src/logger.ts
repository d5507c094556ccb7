import type {
  ErrorLog,
  EventLevel,
  EventLog,
  Logger,
  RequestLog,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/** Unknown or empty level names fall back to info. */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

function toJson(entry: RequestLog | ResponseLog | ErrorLog | EventLog): string {
  return JSON.stringify(entry);
}

export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const enabled = (at: EventLevel) => LEVEL_RANK[at] <= LEVEL_RANK[level];

  return {
    logRequest(entry: RequestLog) {
      if (enabled("debug")) {
        console.log(toJson(entry));
      }
    },
    logResponse(entry: ResponseLog) {
      if (enabled("info")) {
        console.log(toJson(entry));
      }
    },
    logError(entry: ErrorLog) {
      if (enabled("error")) {
        console.error(toJson(entry));
      }
    },
    logEvent(entry: EventLog) {
      if (!enabled(entry.level)) {
        return;
      }
      if (entry.level === "error" || entry.level === "warn") {
        console.error(toJson(entry));
      } else {
        console.log(toJson(entry));
      }
    },
  };
}

/** Logger that drops everything; handy in tests and embedded use. */
export function createSilentLogger(): Logger {
  return createConsoleLogger("silent");
}
