export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveLogLevel(): LogLevel {
  const fromEnv = String(process.env.STUDY_PLANNER_LOG_LEVEL || "")
    .trim()
    .toLowerCase();
  if (fromEnv === "debug" || fromEnv === "info" || fromEnv === "warn" || fromEnv === "error") {
    return fromEnv;
  }
  return "warn";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogLevel()];
}

function write(level: LogLevel, message: string, ...args: unknown[]): void {
  if (!shouldLog(level)) return;
  const line = `[study-planner] ${message}`;
  if (level === "error") {
    console.error(line, ...args);
    return;
  }
  if (level === "warn") {
    console.warn(line, ...args);
    return;
  }
  if (level === "info") {
    console.info(line, ...args);
    return;
  }
  console.debug(line, ...args);
}

/**
 * Leveled console logger. The threshold is read from the
 * `STUDY_PLANNER_LOG_LEVEL` environment variable on every call and
 * defaults to `warn`.
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => write("debug", message, ...args),
  info: (message: string, ...args: unknown[]) => write("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => write("warn", message, ...args),
  error: (message: string, ...args: unknown[]) => write("error", message, ...args),
};
