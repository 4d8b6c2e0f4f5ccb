import { getConfig, type LogLevel } from "../config/index.js";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  setLevel(level: LogLevel): void;
}

/**
 * Leveled logger on stderr. stdout is reserved for the MCP stdio transport
 * and for CLI output.
 */
export function createLogger(scope: string, initialLevel?: LogLevel): Logger {
  let level: LogLevel | undefined = initialLevel;

  function write(lv: LogLevel, message: string) {
    const min = level ?? getConfig().logLevel;
    if (LEVELS[lv] < LEVELS[min]) return;
    console.error(`[${scope}] ${lv.toUpperCase()} ${message}`);
  }

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    setLevel(next) {
      level = next;
    },
  };
}

export const logger = createLogger("android-touch");
