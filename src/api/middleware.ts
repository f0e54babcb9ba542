// ============================================
// API Middleware — Request IDs, CORS, Validation
// ============================================

import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { config } from "../config/env.js";

export type RequestWithId = Request & { requestId?: string };

// ============================================
// Input Validation
// ============================================

const threadIdSchema = z.string().min(1).max(100);

export const chatRequestSchema = z.object({
  message: z
    .string()
    .trim()
    .min(1, "Message cannot be empty")
    .max(2000, "Message cannot exceed 2000 characters")
    .refine((m) => !containsSuspiciousPatterns(m), "Message contains invalid content"),
  threadId: threadIdSchema.optional(),
});

export const regenerateRequestSchema = z.object({
  threadId: threadIdSchema,
});

export const cleanupRequestSchema = z.object({
  maxAgeHours: z.number().positive().max(24 * 365).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;
export type RegenerateRequest = z.infer<typeof regenerateRequestSchema>;
export type CleanupRequest = z.infer<typeof cleanupRequestSchema>;

/**
 * Validation middleware factory.
 * Replaces the body with the parsed value.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      res.status(400).json({
        error: "API_VALIDATION_ERROR",
        message: "Invalid request body",
        details: result.error.issues.map((issue) => ({
          field: issue.path.join("."),
          message: issue.message,
        })),
      });
      return;
    }

    req.body = result.data;
    next();
  };
}

/**
 * Basic prompt-injection screen. Not a complete defence.
 */
function containsSuspiciousPatterns(input: string): boolean {
  const suspiciousPatterns = [
    /ignore\s+(all\s+)?(previous|above|prior)\s+instructions/i,
    /disregard\s+(all\s+)?(previous|above|prior)/i,
    /you\s+are\s+now\s+(a|an)\s+/i,
    /system\s*prompt:/i,
    /repeat\s+your\s+(system\s+)?instructions/i,
  ];

  return suspiciousPatterns.some((pattern) => pattern.test(input));
}

// ============================================
// Request ID
// ============================================

/**
 * Tag each request with an id, taken from X-Request-Id when present.
 */
export function addRequestId(req: RequestWithId, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header.length > 0 ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// CORS
// ============================================

export function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const allowedOrigins = config.api.allowedOrigins;
  const origin = req.headers.origin;

  if (origin && (allowedOrigins.includes("*") || allowedOrigins.includes(origin))) {
    res.setHeader("Access-Control-Allow-Origin", origin);
  }

  res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
  res.setHeader("Access-Control-Max-Age", "86400");

  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }

  next();
}
