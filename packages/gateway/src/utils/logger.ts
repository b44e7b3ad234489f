import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";

interface LogContext {
  service?: string;
  provider?: string;
  taskId?: string;
  sessionId?: string;
  model?: string;
  [key: string]: unknown;
}

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

class Logger {
  private context: LogContext;
  private level: LogLevel = LogLevel.INFO;
  private logDir: string;
  private enableFileLogging: boolean;
  private logFileTimestamp: string;

  constructor(initialContext: LogContext = {}) {
    this.context = initialContext;

    // One log file per process run: YYYY-MM-DD_HH-MM-SS
    const isoString = new Date().toISOString();
    const dateTimePart = isoString.split(".")[0] || isoString;
    this.logFileTimestamp = dateTimePart.replace(/[:.]/g, "-").replace("T", "_");

    this.level = parseLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
    if (process.env.NODE_ENV === "test" && !process.env.LOG_LEVEL) {
      this.level = LogLevel.ERROR;
    }

    this.enableFileLogging = process.env.LOG_TO_FILE === "true";
    this.logDir = process.env.LOG_DIR || join(process.cwd(), "logs");

    if (this.enableFileLogging && !existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true });
    }
  }

  child(additionalContext: LogContext): Logger {
    const childLogger = new Logger({ ...this.context, ...additionalContext });
    childLogger.level = this.level;
    childLogger.enableFileLogging = this.enableFileLogging;
    childLogger.logDir = this.logDir;
    childLogger.logFileTimestamp = this.logFileTimestamp;
    return childLogger;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (level < this.level) return;

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];

    const logEntry = {
      timestamp,
      level: levelStr,
      message,
      context: this.context,
      ...(data && { data }),
    };

    if (this.enableFileLogging) {
      const logFile = join(this.logDir, `gateway-${this.logFileTimestamp}.log`);
      try {
        appendFileSync(logFile, `${JSON.stringify(logEntry)}\n`);
      } catch (error) {
        console.error("Failed to write to log file:", error);
      }
    }

    if (process.env.NODE_ENV === "development") {
      const contextStr =
        Object.keys(this.context).length > 0
          ? ` [${Object.entries(this.context)
              .map(([k, v]) => `${k}=${String(v)}`)
              .join(", ")}]`
          : "";

      console.log(`${timestamp} ${levelStr.padEnd(5)} ${message}${contextStr}`, data ? data : "");
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown) {
    const data: Record<string, unknown> =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : error && typeof error === "object"
          ? { ...error }
          : { error };

    this.log(LogLevel.ERROR, message, data);
  }
}

const logger = new Logger({ service: "gateway" });

export { Logger, logger, type LogContext };
