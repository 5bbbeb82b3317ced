/** Structured console logger shared by the library and the CLI. */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  level: LogLevel;
  module: string;
  msg: string;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let configuredLevel: LogLevel | undefined;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

/** Fix the threshold for every logger; `undefined` goes back to LOG_LEVEL. */
export function setLogLevel(level: LogLevel | undefined) {
  configuredLevel = level;
}

function threshold(): number {
  if (configuredLevel) return LEVELS[configuredLevel];
  const level = process.env.LOG_LEVEL;
  return LEVELS[isLogLevel(level) ? level : "info"];
}

function formatDev(entry: LogEntry): string {
  const { level, module, msg, ts: _ts, ...rest } = entry;
  const tag = `[${module}]`;
  const extras = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";

  return `${level.toUpperCase().padEnd(5)} ${tag} ${msg}${extras}`;
}

function emit(entry: LogEntry) {
  const isDev = process.env.NODE_ENV !== "production";
  const out = isDev ? formatDev(entry) : JSON.stringify(entry);

  switch (entry.level) {
    case "error":
      console.error(out);
      break;
    case "warn":
      console.warn(out);
      break;
    case "debug":
      console.debug(out);
      break;
    default:
      console.log(out);
  }
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  time(operation: string): (data?: Record<string, unknown>) => void;
}

/**
 * @param module tag printed with every line
 * @param opts.force emit regardless of LOG_LEVEL (used for trace output,
 * which has its own on/off switch)
 */
export function logger(module: string, opts: { force?: boolean } = {}): Logger {
  function log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
    if (!opts.force && LEVELS[level] < threshold()) return;
    emit({ level, module, msg, ts: new Date().toISOString(), ...data });
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),

    /**
     * Start a timer. Returns a function to call when the operation completes.
     * Logs at `info` level with duration in ms.
     *
     *   const done = log.time("embedAll");
     *   await embedAll(ctx, texts);
     *   done({ embedded: 42 });
     */
    time(operation) {
      const start = performance.now();
      return (data) => {
        const durationMs = Math.round(performance.now() - start);
        log("info", `${operation} completed`, { durationMs, ...data });
      };
    },
  };
}
