import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Supabase (parts catalog + vector index)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // LLM provider (any OpenAI-compatible endpoint)
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  LLM_BASE_URL: z.string().url().optional(),
  CHAT_MODEL: z.string().default("gpt-4o"),
  CLASSIFIER_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.string().default("1536").transform(Number),

  // Per-call timeouts
  CLASSIFIER_TIMEOUT_MS: z.string().default("8000").transform(Number),
  FETCH_TIMEOUT_MS: z.string().default("5000").transform(Number),
  GENERATION_TIMEOUT_MS: z.string().default("30000").transform(Number),

  // Conversations
  CONVERSATION_MAX_AGE_HOURS: z.string().default("24").transform(Number),

  // HTTP
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

/**
 * Parse allowed origins from environment variable.
 */
function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr.split(",").map((o) => o.trim()).filter(Boolean);
}

// Derived config for convenience
export const config = {
  port: env.PORT,
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  },

  llm: {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.LLM_BASE_URL,
    chatModel: env.CHAT_MODEL,
    classifierModel: env.CLASSIFIER_MODEL,
    embeddingModel: env.EMBEDDING_MODEL,
    embeddingDimensions: env.EMBEDDING_DIMENSIONS,
  },

  timeouts: {
    classifierMs: env.CLASSIFIER_TIMEOUT_MS,
    fetchMs: env.FETCH_TIMEOUT_MS,
    generationMs: env.GENERATION_TIMEOUT_MS,
  },

  conversations: {
    maxAgeHours: env.CONVERSATION_MAX_AGE_HOURS,
  },

  api: {
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),
  },
} as const;
