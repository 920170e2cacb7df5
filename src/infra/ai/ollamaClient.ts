import { z } from "zod";
import {
  EmbeddingServiceError,
  GenerationServiceError,
} from "../../domain/errors.js";
import type { Vector } from "../../domain/types.js";
import { postJson } from "./http.js";
import type { AiClient, GenerationOptions, RawResponse } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().nullable().optional() }).optional(),
  done_reason: z.string().nullable().optional(),
});

export class OllamaClient implements AiClient {
  constructor(private readonly options: OllamaClientOptions) {}

  get model(): string {
    return this.options.chatModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Vector> {
    const [embedding] = await this.embedMany([text], signal);
    return embedding;
  }

  async embedMany(texts: readonly string[], signal?: AbortSignal): Promise<Vector[]> {
    if (texts.length === 0) {
      return [];
    }

    const body = await postJson(
      `${this.options.baseUrl}/api/embed`,
      { model: this.options.embeddingModel, input: texts },
      {
        signal,
        fail: (message, status, cause) =>
          new EmbeddingServiceError(`Ollama embeddings: ${message}`, status, { cause }),
      },
    );

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingServiceError("Ollama embeddings returned an unexpected payload.");
    }
    if (parsed.data.embeddings.length !== texts.length) {
      throw new EmbeddingServiceError(
        `Ollama embeddings returned ${parsed.data.embeddings.length} vectors for ${texts.length} inputs.`,
      );
    }
    if (parsed.data.embeddings.some((embedding) => embedding.length === 0)) {
      throw new EmbeddingServiceError("Ollama embeddings returned empty vector.");
    }
    return parsed.data.embeddings;
  }

  async generate(prompt: string, options: GenerationOptions): Promise<RawResponse> {
    const body = await postJson(
      `${this.options.baseUrl}/api/chat`,
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: { temperature: options.temperature },
        messages: [{ role: "user", content: prompt }],
      },
      {
        signal: options.signal,
        fail: (message, status, cause) =>
          new GenerationServiceError(`Ollama chat: ${message}`, status, { cause }),
      },
    );

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationServiceError("Ollama chat returned an unexpected payload.");
    }
    return {
      model: parsed.data.model ?? this.options.chatModel,
      content: parsed.data.message?.content,
      finishReason: parsed.data.done_reason,
    };
  }
}
