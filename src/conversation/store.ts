// ============================================
// Conversation Memory — injected thread store
// ============================================

import crypto from "node:crypto";
import { logger } from "../lib/logger.js";
import { WELCOME_MESSAGE } from "../llm/prompts.js";
import type { ConversationMessage } from "../router/types.js";

/** A turn as stored; the id lets a caller remove exactly the turns it added. */
export type StoredMessage = ConversationMessage & { id: string };

export type Conversation = {
  threadId: string;
  createdAt: Date;
  lastActivity: Date;
  /** Ordered turns, starting with the welcome message */
  messages: StoredMessage[];
  /** Number of user turns */
  messageCount: number;
};

export type ConversationStats = {
  threadId: string;
  createdAt: string;
  lastActivity: string;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  estimatedTokens: number;
};

export type ConversationSummary = {
  threadId: string;
  createdAt: string;
  lastActivity: string;
  messageCount: number;
  totalMessages: number;
};

/**
 * Thread storage used by the assistant service.
 * Async so a persistent implementation can replace the in-memory one.
 */
export interface ConversationStore {
  /** Create (or re-create) a thread; returns its id */
  create(threadId?: string): Promise<string>;
  /** Snapshot of a thread, or null if unknown */
  get(threadId: string): Promise<Conversation | null>;
  /** Append a turn, creating the thread if unknown; returns the turn's id */
  append(threadId: string, message: ConversationMessage): Promise<string>;
  /** Remove the given turns; returns how many were found */
  removeMessages(threadId: string, messageIds: string[]): Promise<number>;
  reset(threadId: string): Promise<string>;
  /** Drop the trailing assistant turn and the user turn before it */
  removeLastExchange(threadId: string): Promise<boolean>;
  stats(threadId: string): Promise<ConversationStats | null>;
  list(): Promise<ConversationSummary[]>;
  /** Remove threads idle longer than maxAgeHours; returns how many */
  cleanup(maxAgeHours: number): Promise<number>;
}

/** Rough tokens-per-word ratio for stats. */
const TOKENS_PER_WORD = 1.3;

export function estimateTokens(messages: ConversationMessage[]): number {
  const words = messages.reduce((sum, m) => sum + m.content.split(/\s+/).filter(Boolean).length, 0);
  return Math.floor(words * TOKENS_PER_WORD);
}

/**
 * Process-local store. One instance per service; never a module singleton.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(threadId?: string): Promise<string> {
    return this.open(threadId ?? crypto.randomUUID()).threadId;
  }

  private open(threadId: string): Conversation {
    const timestamp = this.now();
    const conversation: Conversation = {
      threadId,
      createdAt: timestamp,
      lastActivity: timestamp,
      messages: [{ id: crypto.randomUUID(), role: "assistant", content: WELCOME_MESSAGE }],
      messageCount: 0,
    };

    this.conversations.set(threadId, conversation);
    logger.info("Created conversation", { stage: "conversation", threadId });
    return conversation;
  }

  async get(threadId: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(threadId);
    if (!conversation) return null;
    return { ...conversation, messages: conversation.messages.map((m) => ({ ...m })) };
  }

  async append(threadId: string, message: ConversationMessage): Promise<string> {
    let conversation = this.conversations.get(threadId);
    if (!conversation) {
      logger.warn("Thread not found, creating it", { stage: "conversation", threadId });
      conversation = this.open(threadId);
    }

    const id = crypto.randomUUID();
    conversation.messages.push({ id, role: message.role, content: message.content });
    conversation.lastActivity = this.now();
    if (message.role === "user") {
      conversation.messageCount += 1;
    }

    logger.debug("Appended message", {
      stage: "conversation",
      threadId,
      role: message.role,
      totalMessages: conversation.messages.length,
    });
    return id;
  }

  async removeMessages(threadId: string, messageIds: string[]): Promise<number> {
    const conversation = this.conversations.get(threadId);
    if (!conversation) return 0;

    const ids = new Set(messageIds);
    const removed = conversation.messages.filter((m) => ids.has(m.id));
    conversation.messages = conversation.messages.filter((m) => !ids.has(m.id));
    conversation.messageCount = Math.max(
      0,
      conversation.messageCount - removed.filter((m) => m.role === "user").length
    );

    logger.debug("Removed messages", { stage: "conversation", threadId, removed: removed.length });
    return removed.length;
  }

  async reset(threadId: string): Promise<string> {
    this.conversations.delete(threadId);
    return this.create(threadId);
  }

  async removeLastExchange(threadId: string): Promise<boolean> {
    const conversation = this.conversations.get(threadId);
    if (!conversation) return false;

    const { messages } = conversation;
    if (messages.at(-1)?.role === "assistant") {
      messages.pop();
    }
    if (messages.at(-1)?.role === "user") {
      messages.pop();
      conversation.messageCount = Math.max(0, conversation.messageCount - 1);
    }

    logger.debug("Removed last exchange", { stage: "conversation", threadId });
    return true;
  }

  async stats(threadId: string): Promise<ConversationStats | null> {
    const conversation = this.conversations.get(threadId);
    if (!conversation) return null;

    const { messages } = conversation;
    return {
      threadId,
      createdAt: conversation.createdAt.toISOString(),
      lastActivity: conversation.lastActivity.toISOString(),
      totalMessages: messages.length,
      userMessages: messages.filter((m) => m.role === "user").length,
      assistantMessages: messages.filter((m) => m.role === "assistant").length,
      estimatedTokens: estimateTokens(messages),
    };
  }

  async list(): Promise<ConversationSummary[]> {
    return [...this.conversations.values()].map((c) => ({
      threadId: c.threadId,
      createdAt: c.createdAt.toISOString(),
      lastActivity: c.lastActivity.toISOString(),
      messageCount: c.messageCount,
      totalMessages: c.messages.length,
    }));
  }

  async cleanup(maxAgeHours: number): Promise<number> {
    const cutoff = this.now().getTime() - maxAgeHours * 60 * 60 * 1000;
    let removed = 0;

    for (const [threadId, conversation] of this.conversations) {
      if (conversation.lastActivity.getTime() < cutoff) {
        this.conversations.delete(threadId);
        removed += 1;
        logger.info("Cleaned up idle conversation", { stage: "conversation", threadId });
      }
    }
    return removed;
  }
}
