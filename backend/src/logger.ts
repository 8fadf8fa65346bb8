export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (message: string, ...details: unknown[]) => void>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type Sink = Pick<Console, "log" | "warn" | "error">;

export function createLogger(threshold: LogLevel = "info", sink: Sink = console): Logger {
  const emit = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    if (RANK[level] < RANK[threshold]) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
    if (level === "error") sink.error(line, ...details);
    else if (level === "warn") sink.warn(line, ...details);
    else sink.log(line, ...details);
  };

  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}

// Swallows everything; handy where a logger is required but output is not wanted.
export const silentLogger: Logger = createLogger("error", {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
