import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { TranscriptQaService } from "../services/transcriptQaService.js";

export function registerDescribePipelineTool(server: McpServer, service: TranscriptQaService) {
  server.registerTool(
    "describe_pipeline",
    {
      title: "Describe Pipeline",
      description: "Renders the answer pipeline as a box-and-arrow diagram.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: service.describePipeline().diagram,
        },
      ],
    }),
  );
}
