type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.SCHEMAVEC_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function formatMessage(level: LogLevel, component: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const componentStr = component.padEnd(10);

  let output = `[${timestamp}] ${levelStr} [${componentStr}] ${message}`;

  if (data !== undefined) {
    output += ` ${JSON.stringify(data)}`;
  }

  return output;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(component: string): Logger {
  return {
    debug(message, data) {
      if (shouldLog("debug")) {
        console.debug(formatMessage("debug", component, message, data));
      }
    },

    info(message, data) {
      if (shouldLog("info")) {
        console.info(formatMessage("info", component, message, data));
      }
    },

    warn(message, data) {
      if (shouldLog("warn")) {
        console.warn(formatMessage("warn", component, message, data));
      }
    },

    error(message, data) {
      if (shouldLog("error")) {
        console.error(formatMessage("error", component, message, data));
      }
    },
  };
}

// Pre-configured loggers for main components
export const embeddingLogger = createLogger("embedding");
export const schemaLogger = createLogger("schema");
export const dbLogger = createLogger("database");
export const cliLogger = createLogger("cli");
