// ============================================
// Conversation Store + Assistant Tests
// ============================================

import { describe, it, expect, beforeEach } from "vitest";
import { estimateTokens, InMemoryConversationStore } from "../src/conversation/store.js";
import { PartsAssistant } from "../src/app/assistant.js";
import { FALLBACK_RESPONSE, WELCOME_MESSAGE } from "../src/llm/prompts.js";
import { createPipelineDeps, makePart, untilAborted } from "./fakes.js";

describe("estimateTokens", () => {
  it("counts words at 1.3 tokens each, rounded down", () => {
    expect(
      estimateTokens([
        { role: "user", content: "one two three" },
        { role: "assistant", content: "  four   five " },
      ])
    ).toBe(6);
  });

  it("is zero for no messages", () => {
    expect(estimateTokens([])).toBe(0);
  });
});

describe("InMemoryConversationStore", () => {
  let clock: Date;
  let store: InMemoryConversationStore;

  beforeEach(() => {
    clock = new Date("2026-03-01T10:00:00.000Z");
    store = new InMemoryConversationStore(() => clock);
  });

  it("opens every thread with the welcome message", async () => {
    const threadId = await store.create("t-1");

    const conversation = await store.get(threadId);
    expect(threadId).toBe("t-1");
    expect(conversation?.messages.map(({ role, content }) => ({ role, content }))).toEqual([
      { role: "assistant", content: WELCOME_MESSAGE },
    ]);
    expect(conversation?.messages[0]?.id).toEqual(expect.any(String));
    expect(conversation?.messageCount).toBe(0);
  });

  it("returns null for unknown threads", async () => {
    expect(await store.get("missing")).toBeNull();
    expect(await store.stats("missing")).toBeNull();
    expect(await store.removeLastExchange("missing")).toBe(false);
  });

  it("creates the thread when appending to an unknown id", async () => {
    await store.append("t-2", { role: "user", content: "hello" });

    const conversation = await store.get("t-2");
    expect(conversation?.messages.map((m) => m.role)).toEqual(["assistant", "user"]);
    expect(conversation?.messageCount).toBe(1);
  });

  it("hands out copies that do not alias stored state", async () => {
    await store.create("t-3");
    const snapshot = await store.get("t-3");
    snapshot?.messages.push({ id: "sneaky", role: "user", content: "sneaky" });

    expect((await store.get("t-3"))?.messages).toHaveLength(1);
  });

  it("removes the trailing exchange", async () => {
    await store.create("t-4");
    await store.append("t-4", { role: "user", content: "q" });
    await store.append("t-4", { role: "assistant", content: "a" });

    expect(await store.removeLastExchange("t-4")).toBe(true);

    const conversation = await store.get("t-4");
    expect(conversation?.messages).toHaveLength(1);
    expect(conversation?.messageCount).toBe(0);
  });

  it("removes exactly the turns it is given", async () => {
    await store.create("t-7");
    const first = await store.append("t-7", { role: "user", content: "first" });
    await store.append("t-7", { role: "user", content: "second" });
    await store.append("t-7", { role: "assistant", content: "reply" });

    expect(await store.removeMessages("t-7", [first])).toBe(1);

    const conversation = await store.get("t-7");
    expect(conversation?.messages.map((m) => m.content)).toEqual([WELCOME_MESSAGE, "second", "reply"]);
    expect(conversation?.messageCount).toBe(1);
    expect(await store.removeMessages("missing", [first])).toBe(0);
  });

  it("reports stats with ISO timestamps", async () => {
    await store.create("t-5");
    clock = new Date("2026-03-01T10:05:00.000Z");
    await store.append("t-5", { role: "user", content: "door gasket please" });

    const stats = await store.stats("t-5");
    expect(stats).toMatchObject({
      threadId: "t-5",
      createdAt: "2026-03-01T10:00:00.000Z",
      lastActivity: "2026-03-01T10:05:00.000Z",
      totalMessages: 2,
      userMessages: 1,
      assistantMessages: 1,
    });
  });

  it("resets a thread back to the welcome message", async () => {
    await store.append("t-6", { role: "user", content: "q" });

    const threadId = await store.reset("t-6");

    expect(threadId).toBe("t-6");
    expect((await store.get("t-6"))?.messages).toHaveLength(1);
  });

  it("lists and cleans up idle threads", async () => {
    await store.create("old");
    clock = new Date("2026-03-02T12:00:00.000Z");
    await store.create("fresh");

    expect((await store.list()).map((c) => c.threadId)).toEqual(["old", "fresh"]);

    const removed = await store.cleanup(24);

    expect(removed).toBe(1);
    expect((await store.list()).map((c) => c.threadId)).toEqual(["fresh"]);
  });
});

describe("PartsAssistant", () => {
  function createAssistant() {
    const pipeline = createPipelineDeps();
    const conversations = new InMemoryConversationStore();
    return { assistant: new PartsAssistant({ pipeline, conversations }), pipeline, conversations };
  }

  /** Make the next generation hang until cancelled; resolves once it has started. */
  function hangNextGeneration(pipeline: ReturnType<typeof createPipelineDeps>): Promise<void> {
    return new Promise<void>((resolve) => {
      pipeline.generator.generate.mockImplementationOnce((_request, signal) => {
        resolve();
        return untilAborted<string>(signal);
      });
    });
  }

  it("starts a thread and records both turns", async () => {
    const { assistant, pipeline } = createAssistant();

    const result = await assistant.chat("Looking for a door gasket");

    expect(result.response).toBe("Here is what I found.");
    expect(result.history.map((m) => m.role)).toEqual(["assistant", "user", "assistant"]);
    expect(result.stats?.userMessages).toBe(1);
    expect(pipeline.generator.generate.mock.calls[0]?.[0].history).toEqual([
      { role: "assistant", content: WELCOME_MESSAGE },
    ]);
  });

  it("passes prior turns, not the current one, as history", async () => {
    const { assistant, pipeline } = createAssistant();

    const first = await assistant.chat("Looking for a door gasket");
    await assistant.chat("Is it in stock?", first.threadId);

    const history = pipeline.generator.generate.mock.calls[1]?.[0].history;
    expect(history?.map((m) => m.content)).toEqual([WELCOME_MESSAGE, "Looking for a door gasket", "Here is what I found."]);
  });

  it("surfaces sources from the fused context", async () => {
    const { assistant, pipeline } = createAssistant();
    pipeline.structured.getPartByNumber.mockResolvedValue(makePart({ price: 44.95 }));

    const result = await assistant.chat("PS11752778");

    expect(result.intent).toBe("specific_part");
    expect(result.sources).toEqual(["Part: Refrigerator Door Shelf Bin (PS11752778) - $44.95"]);
  });

  it("records the fallback reply when generation fails", async () => {
    const { assistant, pipeline } = createAssistant();
    pipeline.generator.generate.mockRejectedValue(new Error("boom"));

    const result = await assistant.chat("Looking for a door gasket");

    expect(result.error).toBe("GENERATION_FAILED");
    expect(result.history.at(-1)).toEqual({ role: "assistant", content: FALLBACK_RESPONSE });
  });

  it("rolls back a cancelled turn", async () => {
    const { assistant } = createAssistant();
    const { threadId } = await assistant.newChat();
    const controller = new AbortController();
    controller.abort();

    const result = await assistant.chat("Looking for a door gasket", threadId, { signal: controller.signal });

    expect(result.error).toBe("CANCELLED");
    expect(result.history).toEqual([{ role: "assistant", content: WELCOME_MESSAGE }]);
    expect(result.stats?.userMessages).toBe(0);
  });

  it("rolls back a turn cancelled during generation", async () => {
    const { assistant, pipeline } = createAssistant();
    const { threadId } = await assistant.newChat();
    const controller = new AbortController();
    const generating = hangNextGeneration(pipeline);

    const pending = assistant.chat("Looking for a door gasket", threadId, { signal: controller.signal });
    await generating;
    controller.abort();
    const result = await pending;

    expect(result.error).toBe("CANCELLED");
    expect(result.response).toBe(FALLBACK_RESPONSE);
    expect(result.history).toEqual([{ role: "assistant", content: WELCOME_MESSAGE }]);
  });

  it("rolls back only its own turn when another turn on the thread completes first", async () => {
    const { assistant, pipeline } = createAssistant();
    const { threadId } = await assistant.newChat();
    const controller = new AbortController();
    const generating = hangNextGeneration(pipeline);

    const cancelled = assistant.chat("first question", threadId, { signal: controller.signal });
    await generating;
    await assistant.chat("second question", threadId);
    controller.abort();
    await cancelled;

    expect((await assistant.history(threadId)).map((m) => m.content)).toEqual([
      WELCOME_MESSAGE,
      "second question",
      "Here is what I found.",
    ]);
  });

  it("regenerates the last answer in place", async () => {
    const { assistant, pipeline } = createAssistant();
    const first = await assistant.chat("Looking for a door gasket");
    pipeline.generator.generate.mockResolvedValue("Second answer.");

    const again = await assistant.regenerate(first.threadId);

    expect(again?.response).toBe("Second answer.");
    expect(again?.history.map((m) => m.content)).toEqual([
      WELCOME_MESSAGE,
      "Looking for a door gasket",
      "Second answer.",
    ]);
  });

  it("leaves the thread as it was when regeneration is cancelled", async () => {
    const { assistant, pipeline } = createAssistant();
    const first = await assistant.chat("Looking for a door gasket");
    const controller = new AbortController();
    const generating = hangNextGeneration(pipeline);

    const pending = assistant.regenerate(first.threadId, { signal: controller.signal });
    await generating;
    controller.abort();
    const result = await pending;

    expect(result?.error).toBe("CANCELLED");
    expect(result?.history.map((m) => m.content)).toEqual([
      WELCOME_MESSAGE,
      "Looking for a door gasket",
      "Here is what I found.",
    ]);
    expect(result?.stats?.userMessages).toBe(1);
  });

  it("hands regeneration the history before the last user turn", async () => {
    const { assistant, pipeline } = createAssistant();
    const first = await assistant.chat("Looking for a door gasket");

    await assistant.regenerate(first.threadId);

    expect(pipeline.generator.generate.mock.calls[1]?.[0].history).toEqual([
      { role: "assistant", content: WELCOME_MESSAGE },
    ]);
  });

  it("returns null when there is nothing to regenerate", async () => {
    const { assistant } = createAssistant();
    const { threadId } = await assistant.newChat();

    expect(await assistant.regenerate(threadId)).toBeNull();
    expect(await assistant.regenerate("missing")).toBeNull();
  });
});
