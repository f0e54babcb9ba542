// ============================================
// API Module — Express app for the chat service
// ============================================

import express from "express";
import type { PartsAssistant } from "../app/assistant.js";
import { createHandlers } from "./handler.js";
import {
  addRequestId,
  chatRequestSchema,
  cleanupRequestSchema,
  corsMiddleware,
  regenerateRequestSchema,
  validateBody,
} from "./middleware.js";

export { createHandlers, type ApiHandlers, type ChatResponse, type ApiErrorResponse } from "./handler.js";
export { chatRequestSchema, regenerateRequestSchema, cleanupRequestSchema, validateBody } from "./middleware.js";

/**
 * Build the Express app around an assistant.
 * Does not listen; the caller owns the server.
 */
export function createApp(assistant: PartsAssistant): express.Express {
  const app = express();
  const handlers = createHandlers(assistant);

  app.use(express.json({ limit: "100kb" }));
  app.use(addRequestId);
  app.use(corsMiddleware);

  app.get("/health", handlers.health);

  const api = express.Router();
  api.post("/chat", validateBody(chatRequestSchema), handlers.chat);
  api.post("/chat/new", handlers.newChat);
  api.post("/chat/regenerate", validateBody(regenerateRequestSchema), handlers.regenerate);
  api.get("/conversations", handlers.listConversations);
  api.get("/conversations/:threadId", handlers.getConversation);
  api.get("/conversations/:threadId/stats", handlers.getConversationStats);
  api.delete("/conversations/:threadId", handlers.resetConversation);
  api.post("/conversations/cleanup", validateBody(cleanupRequestSchema), handlers.cleanup);

  app.use("/api/v1", api);
  return app;
}
