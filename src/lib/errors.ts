// ============================================
// Error taxonomy for the query pipeline
// Only GENERATION_FAILED changes what the user sees
// ============================================

export type ErrorCode =
  | "CLASSIFICATION_FAILED"
  | "FETCH_FAILED"
  | "GENERATION_FAILED"
  | "VALIDATION_ERROR"
  | "TIMEOUT"
  | "CANCELLED"
  | "CONFIG_ERROR"
  | "UNKNOWN_ERROR"
  // API-specific error codes
  | "API_VALIDATION_ERROR"
  | "API_NOT_FOUND"
  | "API_INTERNAL_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class AssistantError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "AssistantError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** External classifier failed or returned something unusable */
export function classificationError(message: string, cause?: unknown): AssistantError {
  return new AssistantError({ code: "CLASSIFICATION_FAILED", message, cause });
}

/** A structured-store or vector-store call failed */
export function fetchError(
  message: string,
  context?: Record<string, unknown>,
  cause?: unknown
): AssistantError {
  return new AssistantError({ code: "FETCH_FAILED", message, context, cause });
}

/** The generation boundary failed or returned nothing */
export function generationError(message: string, requestId?: string, cause?: unknown): AssistantError {
  return new AssistantError({ code: "GENERATION_FAILED", message, requestId, cause });
}

/** A payload did not match its expected shape */
export function validationError(message: string, context?: Record<string, unknown>): AssistantError {
  return new AssistantError({ code: "VALIDATION_ERROR", message, context });
}

export function timeoutError(label: string, timeoutMs: number): AssistantError {
  return new AssistantError({
    code: "TIMEOUT",
    message: `${label} timed out after ${timeoutMs}ms`,
    context: { label, timeoutMs },
  });
}

export function cancelledError(label: string, cause?: unknown): AssistantError {
  return new AssistantError({
    code: "CANCELLED",
    message: `${label} was cancelled`,
    context: { label },
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): AssistantError {
  if (err instanceof AssistantError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new AssistantError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

export function isAssistantError(err: unknown, code?: ErrorCode): err is AssistantError {
  return err instanceof AssistantError && (code === undefined || err.code === code);
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "GENERATION_FAILED":
    case "CANCELLED":
      return "I apologize, but I encountered an error generating a response. Please try again or contact customer service.";
    case "API_VALIDATION_ERROR":
      return "Invalid request parameters.";
    case "API_NOT_FOUND":
      return "Conversation not found.";
    case "API_INTERNAL_ERROR":
      return "An internal error occurred. Please try again.";
    default:
      return "Something went wrong. Please try again.";
  }
}
