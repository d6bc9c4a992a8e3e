import fs from "node:fs";
import { format } from "node:util";

// ---------- Logger interface ----------

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleLogger(): Logger {
  return {
    debug: (...args: unknown[]) => console.debug("[ebc]", ...args),
    info: (...args: unknown[]) => console.info("[ebc]", ...args),
    warn: (...args: unknown[]) => console.warn("[ebc]", ...args),
    error: (...args: unknown[]) => console.error("[ebc]", ...args),
  };
}

/** Pick the logger for a component from its `logger` / `verbose` options. */
export function resolveLogger(options: { logger?: Logger; verbose?: boolean }): Logger {
  if (options.logger) return options.logger;
  if (options.verbose) return createConsoleLogger();
  return nullLogger;
}

// ---------- CLI logger ----------

type Level = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Record<Level, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export interface CliLoggerOptions {
  /** Enable DEBUG output. Default: false */
  debug?: boolean;
  /** Send DEBUG output to this file instead of stderr */
  debugFile?: string;
  /** Stream for console output. Default: process.stderr */
  stream?: NodeJS.WritableStream;
  /** Clock used for timestamps. Default: () => new Date() */
  now?: () => Date;
}

/**
 * Logger writing `<ISO time> [LEVEL] message` lines.
 *
 * The console always gets INFO and above. With `debug` set, DEBUG lines go
 * to `debugFile` when one is given (the file also receives everything else),
 * otherwise to the console.
 */
export function createLogger(options: CliLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());
  const debug = options.debug ?? false;
  const debugFile = debug ? options.debugFile : undefined;
  const consoleLevel = debug && !debugFile ? LEVEL_ORDER.DEBUG : LEVEL_ORDER.INFO;

  const emit = (level: Level, message: string, args: unknown[]) => {
    const line = `${now().toISOString()} [${level}] ${format(message, ...args)}\n`;
    if (LEVEL_ORDER[level] >= consoleLevel) {
      stream.write(line);
    }
    if (debugFile) {
      fs.appendFileSync(debugFile, line);
    }
  };

  return {
    debug: (message, ...args) => emit("DEBUG", message, args),
    info: (message, ...args) => emit("INFO", message, args),
    warn: (message, ...args) => emit("WARNING", message, args),
    error: (message, ...args) => emit("ERROR", message, args),
  };
}
