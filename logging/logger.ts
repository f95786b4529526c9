export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type LogEntry = {
  level: LogLevel;
  scope: string;
  msg: string;
  time: string;
} & LogMeta;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
};

const order: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return order.some((lvl) => lvl === value);
}

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === "error" || entry.level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(
  level: LogLevel = "info",
  sink: (entry: LogEntry) => void = consoleSink,
  scope = "gemini"
): Logger {
  const minIdx = order.indexOf(level);
  function log(lvl: LogLevel, msg: string, meta?: LogMeta) {
    if (order.indexOf(lvl) < minIdx) return;
    sink({ ...(meta ?? {}), level: lvl, scope, msg, time: new Date().toISOString() });
  }
  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
}

// Error objects serialize to {} in JSON.
export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) {
    const code = Reflect.get(err, "code");
    return {
      error: err.name,
      message: err.message,
      ...(typeof code === "string" ? { code } : {}),
      stack: err.stack,
    };
  }
  return { error: String(err) };
}
