import { z } from "zod";
import {
  EmbeddingServiceError,
  GenerationServiceError,
} from "../../domain/errors.js";
import type { Vector } from "../../domain/types.js";
import { postJson } from "./http.js";
import type { AiClient, GenerationOptions, RawResponse } from "./types.js";

export interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
}

export const OPENAI_EMBEDDING_BATCH_SIZE = 256;

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
});

export class OpenAiClient implements AiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  get model(): string {
    return this.options.chatModel;
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embed(text: string, signal?: AbortSignal): Promise<Vector> {
    const [embedding] = await this.embedMany([text], signal);
    return embedding;
  }

  async embedMany(texts: readonly string[], signal?: AbortSignal): Promise<Vector[]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: Vector[] = [];
    for (let start = 0; start < texts.length; start += OPENAI_EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + OPENAI_EMBEDDING_BATCH_SIZE);
      embeddings.push(...(await this.embedBatch(batch, signal)));
    }
    return embeddings;
  }

  async generate(prompt: string, options: GenerationOptions): Promise<RawResponse> {
    const apiKey = this.requireApiKey(
      (message) => new GenerationServiceError(message),
    );
    const body = await postJson(
      `${this.options.baseUrl}/chat/completions`,
      {
        model: this.options.chatModel,
        temperature: options.temperature,
        messages: [{ role: "user", content: prompt }],
      },
      {
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: options.signal,
        fail: (message, status, cause) =>
          new GenerationServiceError(`OpenAI chat: ${message}`, status, { cause }),
      },
    );

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationServiceError("OpenAI chat returned an unexpected payload.");
    }
    const [choice] = parsed.data.choices;
    return {
      model: parsed.data.model ?? this.options.chatModel,
      content: choice?.message?.content,
      finishReason: choice?.finish_reason,
    };
  }

  private async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Vector[]> {
    const apiKey = this.requireApiKey(
      (message) => new EmbeddingServiceError(message),
    );
    const body = await postJson(
      `${this.options.baseUrl}/embeddings`,
      { model: this.options.embeddingModel, input: texts },
      {
        headers: { Authorization: `Bearer ${apiKey}` },
        signal,
        fail: (message, status, cause) =>
          new EmbeddingServiceError(`OpenAI embeddings: ${message}`, status, { cause }),
      },
    );

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingServiceError("OpenAI embeddings returned an unexpected payload.");
    }
    if (parsed.data.data.length !== texts.length) {
      throw new EmbeddingServiceError(
        `OpenAI embeddings returned ${parsed.data.data.length} vectors for ${texts.length} inputs.`,
      );
    }
    return parsed.data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  private requireApiKey(toError: (message: string) => Error): string {
    if (!this.options.apiKey) {
      throw toError("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
