import { describe, expect, it, vi } from "vitest";
import {
  DimensionMismatchError,
  IndexNotReadyError,
  PipelineAbortedError,
} from "../src/domain/errors.js";
import type { Vector } from "../src/domain/types.js";
import { StaticTranscriptSource } from "../src/infra/transcripts/staticTranscriptSource.js";
import {
  EMBEDDING_BATCH_SIZE,
  NO_TRANSCRIPT_MESSAGE,
  TranscriptQaService,
} from "../src/services/transcriptQaService.js";
import type { Logger } from "../src/utils/logger.js";
import { FakeChatModel, KeywordEmbedder, keywordVector } from "./support/fakes.js";

const SKY_TRANSCRIPT = "The sky is blue. Water is wet.";

function createService(transcripts: Record<string, string | null>, logger?: Logger) {
  const embeddings = new KeywordEmbedder();
  const chatModel = new FakeChatModel((prompt) =>
    prompt.includes("The sky is blue.") ? "The sky is blue." : "I don't know.",
  );
  const service = new TranscriptQaService({
    transcripts: new StaticTranscriptSource(transcripts),
    embeddings,
    chatModel,
    config: { chunkSize: 20, chunkOverlap: 5, retrievalK: 1, temperature: 0.2 },
    logger,
  });
  return { service, embeddings, chatModel };
}

describe("TranscriptQaService", () => {
  it("answers from the chunk nearest to the question", async () => {
    const { service, chatModel } = createService({ abc123: SKY_TRANSCRIPT });

    const indexed = await service.indexTranscript("abc123");
    expect(indexed).toMatchObject({
      status: "indexed",
      video_id: "abc123",
      chunk_count: 2,
      embedding_calls: 1,
    });

    const answer = await service.invoke("What color is the sky?");

    expect(answer).toBe("The sky is blue.");
    expect(chatModel.calls).toHaveLength(1);
    expect(chatModel.calls[0].prompt).toContain(
      "Context:\nThe sky is blue. \n\nQuestion: What color is the sky?",
    );
    expect(chatModel.calls[0].options.temperature).toBe(0.2);
  });

  it("returns no_transcript without embedding when transcripts are disabled", async () => {
    const warn = vi.fn();
    const logger: Logger = { info: vi.fn(), warn, error: vi.fn() };
    const { service, embeddings, chatModel } = createService({ muted: null }, logger);
    const embedMany = vi.spyOn(embeddings, "embedMany");

    const result = await service.askAboutVideo("muted", "What color is the sky?");

    expect(result).toEqual({
      status: "no_transcript",
      video_id: "muted",
      answer: NO_TRANSCRIPT_MESSAGE,
    });
    expect(embedMany).not.toHaveBeenCalled();
    expect(embeddings.embedCalls).toEqual([]);
    expect(chatModel.calls).toEqual([]);
    expect(warn).toHaveBeenCalledWith("transcript unavailable", { videoId: "muted" });
  });

  it("indexes on demand and reuses the index for the same video", async () => {
    const { service, embeddings } = createService({ abc123: SKY_TRANSCRIPT });

    const first = await service.askAboutVideo("abc123", "What color is the sky?");
    const second = await service.askAboutVideo("abc123", "Is water wet?");

    expect(first).toMatchObject({ status: "answered", answer: "The sky is blue." });
    expect(second).toMatchObject({ status: "answered", answer: "I don't know." });
    expect(embeddings.embedManyCalls).toHaveLength(1);
  });

  it("batches chunk embeddings", async () => {
    const embeddings = new KeywordEmbedder();
    const service = new TranscriptQaService({
      transcripts: new StaticTranscriptSource({ long: "x".repeat(700) }),
      embeddings,
      chatModel: new FakeChatModel(),
      config: { chunkSize: 10, chunkOverlap: 0, retrievalK: 1, temperature: 0 },
    });

    const result = await service.indexTranscript("long");

    expect(result).toMatchObject({ chunk_count: 70, embedding_calls: 2 });
    expect(embeddings.embedManyCalls.map((batch) => batch.length)).toEqual([
      EMBEDDING_BATCH_SIZE,
      70 - EMBEDDING_BATCH_SIZE,
    ]);
    expect(service.getStatus()).toEqual({ video_id: "long", chunk_count: 70, dimension: 5 });
  });

  it("replaces the previous transcript when indexing another video", async () => {
    const { service } = createService({
      abc123: SKY_TRANSCRIPT,
      short: "Water is wet.",
    });

    await service.indexTranscript("abc123");
    await service.indexTranscript("short");

    expect(service.getStatus()).toEqual({ video_id: "short", chunk_count: 1, dimension: 5 });
  });

  it("refuses questions before anything is indexed", async () => {
    const { service } = createService({});

    await expect(service.invoke("anything")).rejects.toBeInstanceOf(IndexNotReadyError);
    await expect(service.searchChunks("anything")).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it("passes cancellation through to the pipeline", async () => {
    const { service } = createService({ abc123: SKY_TRANSCRIPT });
    await service.indexTranscript("abc123");
    const controller = new AbortController();
    controller.abort();

    await expect(service.invoke("sky?", controller.signal)).rejects.toBeInstanceOf(
      PipelineAbortedError,
    );
  });

  it("searches chunks with rounded scores", async () => {
    const { service } = createService({ abc123: SKY_TRANSCRIPT });
    await service.indexTranscript("abc123");

    const result = await service.searchChunks("water", 2);

    expect(result.hits.map((hit) => hit.ordinal)).toEqual([1, 0]);
    expect(result.hits[0]).toEqual({
      score: 0.5774,
      ordinal: 1,
      source_offset: 12,
      snippet: "blue. Water is wet.",
    });
  });

  it("describes the pipeline as a diagram and a graph", () => {
    const { service } = createService({});

    const { diagram, graph } = service.describePipeline();

    expect(diagram.split("\n")[1]).toBe("| Input |");
    expect(graph.nodes).toHaveLength(10);
    expect(graph.edges.filter((edge) => edge.label !== undefined).map((edge) => edge.label)).toEqual([
      "context",
      "question",
    ]);
  });

  it("keeps concurrent questions about different videos on their own transcripts", async () => {
    class SlowWaterEmbedder extends KeywordEmbedder {
      async embedMany(texts: readonly string[]): Promise<Vector[]> {
        if (texts.some((text) => text.includes("Water"))) {
          await new Promise((resolve) => setTimeout(resolve, 20));
        }
        return super.embedMany(texts);
      }
    }
    const chatModel = new FakeChatModel((prompt) => prompt);
    const service = new TranscriptQaService({
      transcripts: new StaticTranscriptSource({
        skyvid: "The sky is blue.",
        watervid: "Water is wet.",
      }),
      embeddings: new SlowWaterEmbedder(),
      chatModel,
      config: { chunkSize: 20, chunkOverlap: 5, retrievalK: 1, temperature: 0 },
    });

    const [water, sky] = await Promise.all([
      service.askAboutVideo("watervid", "Is water wet?"),
      service.askAboutVideo("skyvid", "What color is the sky?"),
    ]);

    expect(water).toMatchObject({ status: "answered", video_id: "watervid" });
    expect(sky).toMatchObject({ status: "answered", video_id: "skyvid" });
    expect(water.answer.endsWith("Context:\nWater is wet.\n\nQuestion: Is water wet?")).toBe(true);
    expect(
      sky.answer.endsWith("Context:\nThe sky is blue.\n\nQuestion: What color is the sky?"),
    ).toBe(true);
    expect(service.getStatus().video_id).toBe("skyvid");
  });

  it("keeps the previous transcript when re-indexing fails", async () => {
    class RaggedEmbedder extends KeywordEmbedder {
      async embedMany(texts: readonly string[]): Promise<Vector[]> {
        if (texts.some((text) => text.includes("Water"))) {
          return texts.map((text, i) => keywordVector(text).slice(0, i === 0 ? 5 : 3));
        }
        return super.embedMany(texts);
      }
    }
    const chatModel = new FakeChatModel((prompt) => prompt);
    const service = new TranscriptQaService({
      transcripts: new StaticTranscriptSource({
        a: "The sky is blue.",
        b: "Water is wet. Water is wet. Water is wet.",
      }),
      embeddings: new RaggedEmbedder(),
      chatModel,
      config: { chunkSize: 20, chunkOverlap: 5, retrievalK: 1, temperature: 0 },
    });
    await service.indexTranscript("a");

    await expect(service.indexTranscript("b")).rejects.toBeInstanceOf(DimensionMismatchError);

    expect(service.getStatus()).toEqual({ video_id: "a", chunk_count: 1, dimension: 5 });
    await expect(service.invoke("What color is the sky?")).resolves.toContain(
      "Context:\nThe sky is blue.\n\nQuestion: What color is the sky?",
    );
  });
});
