// ============================================
// Test Setup — Mock external services
// ============================================

import { vi } from "vitest";

// Placeholder environment; validated by src/config/env.ts at import
process.env.OPENAI_API_KEY = "test-key";
process.env.SUPABASE_URL = "https://test.supabase.co";
process.env.SUPABASE_SERVICE_ROLE_KEY = "test-key";

// Mock OpenAI so no test can reach the network
vi.mock("openai", () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: vi.fn().mockResolvedValue({
            choices: [{ message: { content: "mock completion" } }],
          }),
        },
      };
      embeddings = {
        create: vi.fn().mockResolvedValue({
          data: [{ embedding: new Array(1536).fill(0) }],
        }),
      };
    },
  };
});

// Mock logger to suppress output during tests
vi.mock("../src/lib/logger.js", () => {
  function requestLogger(): Record<string, unknown> {
    return {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      withStage: () => requestLogger(),
    };
  }

  return {
    logger: {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    },
    createRequestLogger: () => requestLogger(),
  };
});
