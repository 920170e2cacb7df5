import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TranscriptQaService } from "../services/transcriptQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerAskQuestionTool(server: McpServer, service: TranscriptQaService) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a question grounded in the indexed transcript. Passing video_id indexes that video first when needed.",
      inputSchema: {
        question: z.string().min(2).describe("Question about the video"),
        video_id: z
          .string()
          .min(1)
          .optional()
          .describe("Video to answer from; defaults to the indexed one"),
      },
    },
    async ({ question, video_id }) => {
      try {
        if (video_id) {
          return jsonResult(await service.askAboutVideo(video_id, question));
        }
        const startedAt = Date.now();
        const answer = await service.invoke(question);
        return jsonResult({
          status: "answered",
          video_id: service.getStatus().video_id,
          answer,
          latency_ms: Date.now() - startedAt,
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
