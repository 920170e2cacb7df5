import { z } from "zod";
import { InvalidConfigError } from "../domain/errors.js";

const envSchema = z.object({
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RETRIEVAL_K: z.coerce.number().int().positive().default(4),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AI_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  TRANSCRIPT_DIR: z.string().default("transcripts"),
});

/** The only options the pipeline itself recognises. */
export interface PipelineConfig {
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  temperature: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  retrievalK: 4,
  temperature: 0.2,
};

export interface AppConfig {
  pipeline: PipelineConfig;
  provider: "openai" | "ollama";
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  transcriptDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid environment configuration. ${details}`);
  }
  const parsed = result.data;

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new InvalidConfigError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }
  if (parsed.AI_PROVIDER === "openai" && !parsed.OPENAI_API_KEY) {
    throw new InvalidConfigError("AI_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  return {
    pipeline: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      retrievalK: parsed.RETRIEVAL_K,
      temperature: parsed.GENERATION_TEMPERATURE,
    },
    provider: parsed.AI_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    transcriptDir: parsed.TRANSCRIPT_DIR,
  };
}

// An empty `KEY=` line in .env should fall back to the default.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
