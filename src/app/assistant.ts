// ============================================
// Parts Assistant — conversation-aware service over the pipeline
// ============================================

import type {
  ConversationStats,
  ConversationStore,
  ConversationSummary,
  StoredMessage,
} from "../conversation/store.js";
import { logger } from "../lib/logger.js";
import type { ConversationMessage, QueryIntent } from "../router/types.js";
import { processQuery } from "./pipeline.js";
import type { PipelineDeps, PipelineErrorCode, ProcessQueryOptions, ProcessQueryResult } from "./types.js";

export type ChatResult = {
  threadId: string;
  response: string;
  intent: QueryIntent;
  sourceCounts: ProcessQueryResult["sourceCounts"];
  sources: string[];
  error?: PipelineErrorCode;
  history: ConversationMessage[];
  stats: ConversationStats | null;
  metadata: ProcessQueryResult["metadata"];
};

/** Role and content only; store ids stay inside the service. */
function toHistory(messages: StoredMessage[]): ConversationMessage[] {
  return messages.map(({ role, content }) => ({ role, content }));
}

export type AssistantDeps = {
  pipeline: PipelineDeps;
  conversations: ConversationStore;
};

/**
 * Chat service. Owns thread bookkeeping; the pipeline itself is stateless.
 */
export class PartsAssistant {
  constructor(private readonly deps: AssistantDeps) {}

  /**
   * Answer one user turn.
   * Unknown or missing thread ids start a new thread. A cancelled turn is
   * rolled back so the thread is left as it was.
   */
  async chat(message: string, threadId?: string, options: ProcessQueryOptions = {}): Promise<ChatResult> {
    const { conversations } = this.deps;

    const existing = threadId ? await conversations.get(threadId) : null;
    const id = existing ? existing.threadId : await conversations.create(threadId);
    const prior = existing ? toHistory(existing.messages) : await this.history(id);

    const userTurnId = await conversations.append(id, { role: "user", content: message });

    const result = await processQuery(message, prior, this.deps.pipeline, options);

    if (result.error === "CANCELLED") {
      await conversations.removeMessages(id, [userTurnId]);
    } else {
      await conversations.append(id, { role: "assistant", content: result.response });
    }

    return this.toChatResult(id, result);
  }

  /**
   * Answer the last user turn again and replace the replies after it.
   * Returns null when the thread is unknown or has no user turn. A cancelled
   * regeneration leaves the thread as it was.
   */
  async regenerate(threadId: string, options: ProcessQueryOptions = {}): Promise<ChatResult | null> {
    const { conversations } = this.deps;
    const conversation = await conversations.get(threadId);
    if (!conversation) return null;

    const { messages } = conversation;
    const userIndex = messages.map((m) => m.role).lastIndexOf("user");
    const lastUser = messages[userIndex];
    if (!lastUser) return null;

    logger.info("Regenerating last response", { stage: "conversation", threadId });
    const replaced = messages
      .slice(userIndex + 1)
      .filter((m) => m.role === "assistant")
      .map((m) => m.id);

    const result = await processQuery(
      lastUser.content,
      toHistory(messages.slice(0, userIndex)),
      this.deps.pipeline,
      options
    );

    if (result.error !== "CANCELLED") {
      await conversations.removeMessages(threadId, replaced);
      await conversations.append(threadId, { role: "assistant", content: result.response });
    }

    return this.toChatResult(threadId, result);
  }

  /** Start a fresh thread; returns its id and welcome history. */
  async newChat(): Promise<{ threadId: string; history: ConversationMessage[] }> {
    const threadId = await this.deps.conversations.create();
    return { threadId, history: await this.history(threadId) };
  }

  async reset(threadId: string): Promise<string> {
    return this.deps.conversations.reset(threadId);
  }

  async history(threadId: string): Promise<ConversationMessage[]> {
    const conversation = await this.deps.conversations.get(threadId);
    return toHistory(conversation?.messages ?? []);
  }

  async stats(threadId: string): Promise<ConversationStats | null> {
    return this.deps.conversations.stats(threadId);
  }

  async list(): Promise<ConversationSummary[]> {
    return this.deps.conversations.list();
  }

  private async toChatResult(threadId: string, result: ProcessQueryResult): Promise<ChatResult> {
    return {
      threadId,
      response: result.response,
      intent: result.intent,
      sourceCounts: result.sourceCounts,
      sources: result.context.sources,
      ...(result.error && { error: result.error }),
      history: await this.history(threadId),
      stats: await this.deps.conversations.stats(threadId),
      metadata: result.metadata,
    };
  }

  async cleanup(maxAgeHours: number): Promise<number> {
    const removed = await this.deps.conversations.cleanup(maxAgeHours);
    logger.info("Conversation cleanup complete", { stage: "conversation", maxAgeHours, removed });
    return removed;
  }
}
