import type { Vector } from "../../domain/types.js";

/**
 * Text embedding capability. `embedMany(texts)[i]` must equal
 * `embed(texts[i])`; the batch form only saves round trips.
 */
export interface EmbeddingPort {
  embed(text: string, signal?: AbortSignal): Promise<Vector>;
  embedMany(texts: readonly string[], signal?: AbortSignal): Promise<Vector[]>;
}

export interface GenerationOptions {
  temperature: number;
  signal?: AbortSignal;
}

/** Provider response before output parsing. */
export interface RawResponse {
  model: string;
  content?: string | null;
  finishReason?: string | null;
}

export interface ChatModelPort {
  readonly model: string;
  generate(prompt: string, options: GenerationOptions): Promise<RawResponse>;
}

export interface AiClient extends EmbeddingPort, ChatModelPort {}
