/**
 * Worker Entry Point
 *
 * HTTP server exposing the document parser.
 */

import "dotenv/config";
import { createApp } from "./server.js";
import { createDocumentParser } from "./parser.js";
import { getDefaultConfig } from "./llm/types.js";

const PORT = process.env.PORT || 8080;
const WORKER_VERSION = process.env.WORKER_VERSION || "local-dev";

const llmConfig = getDefaultConfig();
const app = createApp(createDocumentParser(llmConfig), WORKER_VERSION);

const server = app.listen(PORT, () => {
  console.log(`[Server] Worker listening on port ${PORT}`);
  console.log(`[Server] Version: ${WORKER_VERSION}`);
  console.log(`[Server] vision.provider: ${llmConfig.vision.provider}`);
  console.log(`[Server] vision.model: ${llmConfig.vision.model}`);
  console.log(`[Server] vision.endpoint: ${llmConfig.vision.endpoint}`);
  console.log(`[Server] text.provider: ${llmConfig.text.provider}`);
  console.log(`[Server] text.model: ${llmConfig.text.model}`);
  console.log(`[Server] text.endpoint: ${llmConfig.text.endpoint}`);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

function shutdown(signal: string): void {
  console.log(`[Server] Received ${signal}, shutting down gracefully...`);
  server.close((error) => {
    if (error) {
      console.error("[Server] Error while closing:", error);
      process.exit(1);
    }
    console.log("[Server] Shutdown complete");
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason, promise) => {
  console.error("[Server] Unhandled rejection at:", promise, "reason:", reason);
});
