import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

function getTimestamp(): string {
  return `[${new Date().toISOString()}]`;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Timestamped console logger. */
export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) {
      console.debug(chalk.gray(getTimestamp()), ...args);
    }
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) {
      console.log(chalk.white(getTimestamp()), ...args);
    }
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) {
      console.warn(chalk.yellow(getTimestamp()), ...args);
    }
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) {
      console.error(chalk.red(getTimestamp()), ...args);
    }
  },
};
