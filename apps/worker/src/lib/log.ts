import { env } from "../env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function formatLine(level: LogLevel, scope: string, message: string, meta?: Record<string, unknown>) {
  const tail = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${tail}\n`;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (ORDER[level] < ORDER[env.LOG_LEVEL]) return;
    const line = formatLine(level, scope, message, meta);
    if (level === "warn" || level === "error") process.stderr.write(line);
    else process.stdout.write(line);
  };
  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
