import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { createAiClient } from "./infra/ai/createAiClient.js";
import { FileTranscriptSource } from "./infra/transcripts/fileTranscriptSource.js";
import { TranscriptQaService } from "./services/transcriptQaService.js";
import { createConsoleLogger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = createConsoleLogger("transcript-qa");
  const aiClient = createAiClient(config);

  const service = new TranscriptQaService({
    transcripts: new FileTranscriptSource(config.transcriptDir),
    embeddings: aiClient,
    chatModel: aiClient,
    config: config.pipeline,
    logger,
  });

  const server = createAppServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP stdio server ready", {
    provider: config.provider,
    model: aiClient.model,
    transcriptDir: config.transcriptDir,
  });

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
