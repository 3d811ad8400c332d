export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(input: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = input?.trim().toLowerCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  return fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

// Everything goes to stderr so stdout only carries the summary.
export const logger = {
  debug(message: string) {
    if (enabled("debug")) {
      console.error(`[debug] ${message}`);
    }
  },
  info(message: string) {
    if (enabled("info")) {
      console.error(`[info] ${message}`);
    }
  },
  warn(message: string) {
    if (enabled("warn")) {
      console.warn(`[warn] ${message}`);
    }
  },
  error(message: string) {
    if (enabled("error")) {
      console.error(`[error] ${message}`);
    }
  },
};
