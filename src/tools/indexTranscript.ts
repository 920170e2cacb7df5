import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TranscriptQaService } from "../services/transcriptQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIndexTranscriptTool(server: McpServer, service: TranscriptQaService) {
  server.registerTool(
    "index_transcript",
    {
      title: "Index Transcript",
      description:
        "Fetches a video transcript, chunks and embeds it, and replaces the current index.",
      inputSchema: {
        video_id: z.string().min(1).describe("Video id of the transcript to index"),
      },
    },
    async ({ video_id }) => {
      try {
        return jsonResult(await service.indexTranscript(video_id));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
