export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelRank: Record<Exclude<LogLevel, "silent">, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

const prefix = "[idlebreak]";

export function createLogger(threshold: LogLevel = "info"): Logger {
  if (threshold === "silent") {
    return silentLogger;
  }

  const rank = levelRank[threshold];

  return {
    debug: (message, ...rest) => {
      if (rank <= levelRank.debug) {
        console.debug(`${stamp()} ${prefix} ${message}`, ...rest);
      }
    },
    info: (message, ...rest) => {
      if (rank <= levelRank.info) {
        console.info(`${stamp()} ${prefix} ${message}`, ...rest);
      }
    },
    warn: (message, ...rest) => {
      if (rank <= levelRank.warn) {
        console.warn(`${stamp()} ${prefix} ${message}`, ...rest);
      }
    },
    error: (message, ...rest) => {
      if (rank <= levelRank.error) {
        console.error(`${stamp()} ${prefix} ${message}`, ...rest);
      }
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};

function stamp(): string {
  return new Date().toISOString();
}
