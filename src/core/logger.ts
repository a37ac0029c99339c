export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR"
};

export function formatLogLine(level: LogLevel, message: string): string {
  return `[${LEVEL_TAGS[level]}] ${message}`;
}

export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  const out = options.stdout ?? ((line: string) => console.log(line));
  const err = options.stderr ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    debug(message) {
      if (verbose) out(formatLogLine("debug", message));
    },
    info(message) {
      out(formatLogLine("info", message));
    },
    warn(message) {
      err(formatLogLine("warn", message));
    },
    error(message) {
      err(formatLogLine("error", message));
    }
  };
}

let processLogger: Logger | null = null;

/**
 * Initializes the process-wide logger. Called once at CLI start; the pipeline engine never reads
 * this and takes its logger from the run context instead.
 */
export function configureLogging(options: LoggerOptions = {}): Logger {
  if (processLogger) {
    throw new Error("Logging is already configured");
  }
  processLogger = createConsoleLogger(options);
  return processLogger;
}

export function getLogger(): Logger {
  if (!processLogger) {
    throw new Error("Logging is not configured; call configureLogging() first");
  }
  return processLogger;
}
