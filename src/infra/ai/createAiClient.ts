import type { AppConfig } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import type { AiClient } from "./types.js";

export function createAiClient(config: AppConfig): AiClient {
  if (config.provider === "ollama") {
    return new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
    });
  }

  return new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
  });
}
