import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TranscriptQaService } from "./services/transcriptQaService.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerDescribePipelineTool } from "./tools/describePipeline.js";
import { registerIndexTranscriptTool } from "./tools/indexTranscript.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "transcript-qa-mcp";

export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: TranscriptQaService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status and the currently indexed video.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      const status = service.getStatus();
      const indexed = status.video_id
        ? `indexed ${status.video_id} (${status.chunk_count} chunks)`
        : "nothing indexed";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running, ${indexed}. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIndexTranscriptTool(server, service);
  registerAskQuestionTool(server, service);
  registerSearchChunksTool(server, service);
  registerDescribePipelineTool(server, service);

  return server;
}
