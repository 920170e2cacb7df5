import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/env.js";
import { EmbeddingServiceError, IndexNotReadyError } from "../domain/errors.js";
import type { Chunk, Vector } from "../domain/types.js";
import type { TranscriptSource } from "../domain/transcripts.js";
import type { VectorIndex } from "../domain/vectorIndex.js";
import type { ChatModelPort, EmbeddingPort } from "../infra/ai/types.js";
import { InMemoryVectorIndex } from "../infra/store/inMemoryVectorIndex.js";
import { createAnswerChain } from "../pipelines/answering.js";
import { RecursiveChunker } from "../pipelines/chunking.js";
import { VectorStoreRetriever } from "../pipelines/retrieval.js";
import type { Runnable } from "../runnables/base.js";
import type { PipelineGraphJson } from "../runnables/graph.js";
import { type Logger, silentLogger } from "../utils/logger.js";

export const EMBEDDING_BATCH_SIZE = 64;

export const NO_TRANSCRIPT_MESSAGE = "No transcript is available for this video.";

export interface TranscriptQaServiceOptions {
  transcripts: TranscriptSource;
  embeddings: EmbeddingPort;
  chatModel: ChatModelPort;
  config?: PipelineConfig;
  /** Called once per indexed transcript; each transcript gets a fresh index. */
  createIndex?: () => VectorIndex<Chunk>;
  logger?: Logger;
}

/** One indexed transcript together with the pipeline that reads it. */
interface IndexedTranscript {
  videoId: string | null;
  index: VectorIndex<Chunk>;
  retriever: VectorStoreRetriever;
  chain: Runnable<string, string>;
}

export type IndexTranscriptResult =
  | {
      status: "indexed";
      video_id: string;
      chunk_count: number;
      embedding_calls: number;
      latency_ms: number;
    }
  | {
      status: "no_transcript";
      video_id: string;
    };

export type AskAboutVideoResult =
  | {
      status: "answered";
      video_id: string;
      answer: string;
      latency_ms: number;
    }
  | {
      status: "no_transcript";
      video_id: string;
      answer: string;
    };

export interface SearchChunksResult {
  query: string;
  hits: Array<{
    score: number;
    ordinal: number;
    source_offset: number;
    snippet: string;
  }>;
}

export interface IndexStatus {
  video_id: string | null;
  chunk_count: number;
  dimension: number | null;
}

/**
 * Two phases: `indexTranscript` builds an index for one transcript, then
 * `invoke` answers questions against it. Each transcript is indexed into a
 * new index and swapped in whole, so questions already in flight finish on
 * the index they started with. Indexing runs one transcript at a time.
 */
export class TranscriptQaService {
  readonly config: PipelineConfig;

  private readonly transcripts: TranscriptSource;

  private readonly embeddings: EmbeddingPort;

  private readonly chatModel: ChatModelPort;

  private readonly createIndex: () => VectorIndex<Chunk>;

  private readonly chunker: RecursiveChunker;

  private readonly logger: Logger;

  private current: IndexedTranscript;

  private indexingQueue: Promise<void> = Promise.resolve();

  constructor(options: TranscriptQaServiceOptions) {
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.transcripts = options.transcripts;
    this.embeddings = options.embeddings;
    this.chatModel = options.chatModel;
    this.createIndex = options.createIndex ?? (() => new InMemoryVectorIndex<Chunk>());
    this.logger = options.logger ?? silentLogger;
    this.chunker = new RecursiveChunker({
      size: this.config.chunkSize,
      overlap: this.config.chunkOverlap,
    });
    this.current = this.bindPipeline(null, this.createIndex());
  }

  indexTranscript(videoId: string, signal?: AbortSignal): Promise<IndexTranscriptResult> {
    return this.exclusive(() => this.buildIndex(videoId, signal));
  }

  /** Answers against whatever transcript was indexed last. */
  async invoke(question: string, signal?: AbortSignal): Promise<string> {
    return this.answer(this.current, question, signal);
  }

  async askAboutVideo(
    videoId: string,
    question: string,
    signal?: AbortSignal,
  ): Promise<AskAboutVideoResult> {
    const startedAt = Date.now();
    // Check and indexing share the queue so two callers cannot interleave them.
    const target = await this.exclusive(async () => {
      if (this.current.videoId === videoId) {
        return this.current;
      }
      const indexed = await this.buildIndex(videoId, signal);
      return indexed.status === "indexed" ? this.current : null;
    });
    if (target === null) {
      return { status: "no_transcript", video_id: videoId, answer: NO_TRANSCRIPT_MESSAGE };
    }

    const answer = await this.answer(target, question, signal);
    return {
      status: "answered",
      video_id: videoId,
      answer,
      latency_ms: Date.now() - startedAt,
    };
  }

  async searchChunks(query: string, k?: number): Promise<SearchChunksResult> {
    const { videoId, retriever } = this.current;
    if (videoId === null) {
      throw new IndexNotReadyError();
    }
    const hits = await retriever.retrieveWithScores(query, k ?? this.config.retrievalK);
    return {
      query,
      hits: hits.map((hit) => ({
        score: Number(hit.score.toFixed(4)),
        ordinal: hit.entry.payload.ordinal,
        source_offset: hit.entry.payload.sourceOffset,
        snippet: hit.entry.payload.text.slice(0, 240),
      })),
    };
  }

  describePipeline(): { diagram: string; graph: PipelineGraphJson } {
    const graph = this.current.chain.getGraph();
    return { diagram: graph.drawAscii(), graph: graph.toJSON() };
  }

  getStatus(): IndexStatus {
    return {
      video_id: this.current.videoId,
      chunk_count: this.current.index.count(),
      dimension: this.current.index.dimension,
    };
  }

  private async buildIndex(videoId: string, signal?: AbortSignal): Promise<IndexTranscriptResult> {
    const startedAt = Date.now();
    const transcript = await this.transcripts.fetch(videoId);
    if (transcript === null) {
      this.logger.warn("transcript unavailable", { videoId });
      return { status: "no_transcript", video_id: videoId };
    }

    const chunks = this.chunker.split(transcript);
    const { vectors, calls } = await this.embedChunks(chunks, signal);

    const index = this.createIndex();
    index.insertMany(chunks.map((chunk, i) => ({ vector: vectors[i], payload: chunk })));
    this.current = this.bindPipeline(videoId, index);

    const latencyMs = Date.now() - startedAt;
    this.logger.info("transcript indexed", {
      videoId,
      chunks: chunks.length,
      embeddingCalls: calls,
      latencyMs,
    });

    return {
      status: "indexed",
      video_id: videoId,
      chunk_count: chunks.length,
      embedding_calls: calls,
      latency_ms: latencyMs,
    };
  }

  private async answer(
    target: IndexedTranscript,
    question: string,
    signal?: AbortSignal,
  ): Promise<string> {
    if (target.videoId === null) {
      throw new IndexNotReadyError();
    }
    return target.chain.invoke(question, { signal });
  }

  private bindPipeline(videoId: string | null, index: VectorIndex<Chunk>): IndexedTranscript {
    const retriever = new VectorStoreRetriever({
      embeddings: this.embeddings,
      index,
      k: this.config.retrievalK,
    });
    const chain = createAnswerChain({
      retriever,
      model: this.chatModel,
      temperature: this.config.temperature,
    });
    return { videoId, index, retriever, chain };
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.indexingQueue.then(task);
    // Failures reach the caller through `run`; the queue only waits for completion.
    this.indexingQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async embedChunks(
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<{ vectors: Vector[]; calls: number }> {
    const vectors: Vector[] = [];
    let calls = 0;

    for (let start = 0; start < chunks.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(start, start + EMBEDDING_BATCH_SIZE).map((chunk) => chunk.text);
      const embedded = await this.embeddings.embedMany(batch, signal);
      calls += 1;
      if (embedded.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding count mismatch: expected ${batch.length}, received ${embedded.length}.`,
        );
      }
      vectors.push(...embedded);
    }

    return { vectors, calls };
  }
}
