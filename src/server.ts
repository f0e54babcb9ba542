import "dotenv/config";
import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { createApp } from "./api/index.js";
import { createAssistant } from "./app/container.js";

// ============================================
// Startup
// ============================================

const assistant = createAssistant();
const app = createApp(assistant);

logger.info("Starting parts assistant", {
  stage: "startup",
  port: config.port,
  chatModel: config.llm.chatModel,
  classifierModel: config.llm.classifierModel,
});

app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});
