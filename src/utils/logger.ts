const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;

export type LogLevel = keyof typeof LEVELS;
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(name: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function formatContext(context?: LogContext): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value instanceof Error) return `${key}=${value.name}: ${value.message}`;
      if (value instanceof Date) return `${key}=${value.toISOString()}`;
      return `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`;
    })
    .join(" ");
}

/**
 * Console logger writing `[Name] message key=value ...` lines.
 */
export function createLogger(name: string, level: LogLevel = "info"): Logger {
  const write = (at: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
    if (LEVELS[at] < LEVELS[level]) return;
    const extra = formatContext(context);
    const line = `${new Date().toISOString()} ${at.toUpperCase().padEnd(5)} [${name}] ${message}${extra ? " " + extra : ""}`;
    if (at === "error") console.error(line);
    else if (at === "warn") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (child) => createLogger(`${name}:${child}`, level),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
