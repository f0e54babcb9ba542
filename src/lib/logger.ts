// ============================================
// Structured JSON logging
// One line per event: timestamp, level, stage, requestId, threadId
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "api"
  | "classifier"
  | "retrieval"
  | "vector"
  | "fusion"
  | "generation"
  | "pipeline"
  | "conversation"
  | "db"
  | "llm";

interface LogContext {
  requestId?: string;
  stage?: Stage;
  threadId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * LOG_LEVEL wins when set; otherwise debug is dropped in production.
 * Read per call so tests and scripts can flip it at runtime.
 */
function minimumLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  });
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { errorMessage: error.message, errorCode: code, errorStack: error.stack };
  }
  return error ? { errorMessage: String(error) } : {};
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) console.log(formatLog("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    if (enabled("info")) console.log(formatLog("info", message, context));
  },

  warn(message: string, context?: LogContext & { error?: unknown }): void {
    if (!enabled("warn")) return;
    const { error, ...rest } = context || {};
    console.warn(formatLog("warn", message, { ...rest, ...describeError(error) }));
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context || {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

/** Create a logger bound to a request (and optionally a conversation thread) */
export function createRequestLogger(requestId: string, stage?: Stage, threadId?: string) {
  const bound = { requestId, stage, ...(threadId ? { threadId } : {}) };

  return {
    debug(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.debug(message, { ...context, ...bound });
    },

    info(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.info(message, { ...context, ...bound });
    },

    warn(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.warn(message, { ...context, ...bound });
    },

    error(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.error(message, { ...context, ...bound });
    },

    /** Create a child logger for a different stage */
    withStage(newStage: Stage) {
      return createRequestLogger(requestId, newStage, threadId);
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
