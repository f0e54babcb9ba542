// ============================================
// API Handlers — chat and conversation endpoints
// ============================================

import type { Response } from "express";
import type { ChatResult, PartsAssistant } from "../app/assistant.js";
import { config } from "../config/env.js";
import { getUserMessage, wrapError, type ErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ChatRequest, CleanupRequest, RegenerateRequest, RequestWithId } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface ChatResponse {
  requestId?: string;
  threadId: string;
  response: string;
  intent: string;
  sourceCounts: { primary: number; supplementary: number };
  sources: string[];
  error?: string;
  conversationHistory: ChatResult["history"];
  conversationStats: ChatResult["stats"];
  metadata: {
    latencyMs: number;
    classifiedBy: string;
    pipelineVersion: string;
    classifierVersion: string;
  };
}

export interface ApiErrorResponse {
  error: ErrorCode | "INTERNAL_ERROR";
  message: string;
  requestId?: string;
}

export interface HealthResponse {
  status: "ok";
  timestamp: string;
}

// ============================================
// Helpers
// ============================================

function toChatResponse(result: ChatResult, requestId?: string): ChatResponse {
  return {
    requestId,
    threadId: result.threadId,
    response: result.response,
    intent: result.intent,
    sourceCounts: result.sourceCounts,
    sources: result.sources,
    ...(result.error && { error: result.error }),
    conversationHistory: result.history,
    conversationStats: result.stats,
    metadata: {
      latencyMs: result.metadata.latencyMs,
      classifiedBy: result.metadata.classifiedBy,
      pipelineVersion: result.metadata.pipelineVersion,
      classifierVersion: result.metadata.classifierVersion,
    },
  };
}

function sendNotFound(res: Response, requestId?: string): void {
  const body: ApiErrorResponse = {
    error: "API_NOT_FOUND",
    message: getUserMessage({ code: "API_NOT_FOUND", message: "" }),
    requestId,
  };
  res.status(404).json(body);
}

function sendInternalError(res: Response, err: unknown, requestId: string | undefined, route: string): void {
  const appError = wrapError(err, requestId);
  logger.error("API request failed", {
    stage: "api",
    requestId,
    route,
    errorCode: appError.code,
    error: err,
  });

  // Never leak internals
  const body: ApiErrorResponse = {
    error: "INTERNAL_ERROR",
    message: getUserMessage({ code: "API_INTERNAL_ERROR", message: "" }),
    requestId,
  };
  res.status(500).json(body);
}

/** Abort the pipeline when the client goes away before we answer. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

// ============================================
// Handlers
// ============================================

export type ApiHandlers = ReturnType<typeof createHandlers>;

/**
 * Build the route handlers around one assistant instance.
 */
export function createHandlers(assistant: PartsAssistant) {
  return {
    async chat(req: RequestWithId & { body: ChatRequest }, res: Response): Promise<void> {
      const { requestId } = req;
      const { message, threadId } = req.body;

      logger.info("Chat request received", {
        stage: "api",
        requestId,
        threadId,
        messageLength: message.length,
      });

      try {
        const result = await assistant.chat(message, threadId, {
          requestId,
          signal: abortOnDisconnect(res),
        });
        res.status(200).json(toChatResponse(result, requestId));
      } catch (err) {
        sendInternalError(res, err, requestId, "chat");
      }
    },

    async newChat(req: RequestWithId, res: Response): Promise<void> {
      try {
        const { threadId, history } = await assistant.newChat();
        res.status(200).json({
          requestId: req.requestId,
          threadId,
          conversationHistory: history,
        });
      } catch (err) {
        sendInternalError(res, err, req.requestId, "newChat");
      }
    },

    async regenerate(req: RequestWithId & { body: RegenerateRequest }, res: Response): Promise<void> {
      const { requestId } = req;
      try {
        const result = await assistant.regenerate(req.body.threadId, {
          requestId,
          signal: abortOnDisconnect(res),
        });
        if (!result) {
          sendNotFound(res, requestId);
          return;
        }
        res.status(200).json(toChatResponse(result, requestId));
      } catch (err) {
        sendInternalError(res, err, requestId, "regenerate");
      }
    },

    async listConversations(req: RequestWithId, res: Response): Promise<void> {
      try {
        const conversations = await assistant.list();
        res.status(200).json({ conversations, total: conversations.length });
      } catch (err) {
        sendInternalError(res, err, req.requestId, "listConversations");
      }
    },

    async getConversation(req: RequestWithId, res: Response): Promise<void> {
      const threadId = req.params["threadId"];
      try {
        const stats = threadId ? await assistant.stats(threadId) : null;
        if (!threadId || !stats) {
          sendNotFound(res, req.requestId);
          return;
        }
        res.status(200).json({
          threadId,
          conversationHistory: await assistant.history(threadId),
          conversationStats: stats,
        });
      } catch (err) {
        sendInternalError(res, err, req.requestId, "getConversation");
      }
    },

    async getConversationStats(req: RequestWithId, res: Response): Promise<void> {
      const threadId = req.params["threadId"];
      try {
        const stats = threadId ? await assistant.stats(threadId) : null;
        if (!stats) {
          sendNotFound(res, req.requestId);
          return;
        }
        res.status(200).json(stats);
      } catch (err) {
        sendInternalError(res, err, req.requestId, "getConversationStats");
      }
    },

    async resetConversation(req: RequestWithId, res: Response): Promise<void> {
      const threadId = req.params["threadId"];
      if (!threadId) {
        sendNotFound(res, req.requestId);
        return;
      }
      try {
        await assistant.reset(threadId);
        logger.info("Conversation reset", { stage: "api", requestId: req.requestId, threadId });
        res.status(200).json({
          threadId,
          conversationHistory: await assistant.history(threadId),
        });
      } catch (err) {
        sendInternalError(res, err, req.requestId, "resetConversation");
      }
    },

    async cleanup(req: RequestWithId & { body: CleanupRequest }, res: Response): Promise<void> {
      const maxAgeHours = req.body.maxAgeHours ?? config.conversations.maxAgeHours;
      try {
        const removed = await assistant.cleanup(maxAgeHours);
        res.status(200).json({ removed, maxAgeHours });
      } catch (err) {
        sendInternalError(res, err, req.requestId, "cleanup");
      }
    },

    health(_req: RequestWithId, res: Response): void {
      const body: HealthResponse = { status: "ok", timestamp: new Date().toISOString() };
      res.status(200).json(body);
    },
  };
}
