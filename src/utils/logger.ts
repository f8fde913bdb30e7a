export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: { write(chunk: string): unknown };
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// Writes to stderr unless a stream is given.
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "warn"];
  const stream = options.stream ?? process.stderr;

  const emit = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    stream.write(`[${level}] ${message}\n`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

export const defaultLogger: Logger = createLogger();

const warnedStatements = new WeakMap<Logger, Set<string>>();

/**
 * Emits a warning only the first time the given logger sees the message.
 */
export function warnOnce(logger: Logger, message: string): void {
  let seen = warnedStatements.get(logger);
  if (!seen) {
    seen = new Set<string>();
    warnedStatements.set(logger, seen);
  }
  if (seen.has(message)) {
    return;
  }
  seen.add(message);
  logger.warn(message);
}
