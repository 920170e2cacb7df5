import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { PipelineError, describeError } from "../domain/errors.js";

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function errorResult(error: unknown): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify(
          {
            error: error instanceof PipelineError ? error.code : "INTERNAL",
            message: describeError(error),
          },
          null,
          2,
        ),
      },
    ],
  };
}
