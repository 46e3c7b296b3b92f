// Tagged console logging, e.g. "[season] Updated Jan de Vries: 83.76 pts"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLevel(v: string): v is LogLevel {
  return v in ORDER;
}

export function currentLevel(): LogLevel {
  const raw = (process.env.SEASON_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLevel(raw) ? raw : "warn";
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const enabled = (level: LogLevel) => ORDER[level] >= ORDER[currentLevel()];
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
