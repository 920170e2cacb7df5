import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TranscriptQaService } from "../services/transcriptQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, service: TranscriptQaService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the transcript chunks nearest to a query, with scores.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) => {
      try {
        return jsonResult(await service.searchChunks(query, top_k));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
