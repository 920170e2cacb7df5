import { InvalidConfigError } from "../domain/errors.js";
import type { Chunk, QueryResult } from "../domain/types.js";
import type { VectorIndex } from "../domain/vectorIndex.js";
import type { EmbeddingPort } from "../infra/ai/types.js";
import { Runnable, type RunnableConfig } from "../runnables/base.js";
import type { RunnableShape } from "../runnables/graph.js";

export const DEFAULT_RETRIEVAL_K = 4;
export const DEFAULT_DOCUMENT_SEPARATOR = "\n\n";

export interface RetrieverOptions {
  embeddings: EmbeddingPort;
  index: VectorIndex<Chunk>;
  k?: number;
}

/** Query text in, payload chunks out, best match first. */
export class VectorStoreRetriever extends Runnable<string, Chunk[]> {
  readonly kind = "retriever";

  readonly label = "VectorStoreRetriever";

  readonly shape: RunnableShape = { input: "string", output: "Chunk[]" };

  readonly k: number;

  private readonly embeddings: EmbeddingPort;

  private readonly index: VectorIndex<Chunk>;

  constructor(options: RetrieverOptions) {
    super();
    this.embeddings = options.embeddings;
    this.index = options.index;
    this.k = options.k ?? DEFAULT_RETRIEVAL_K;
    assertPositiveK(this.k);
  }

  async retrieve(queryText: string, k: number = this.k, signal?: AbortSignal): Promise<Chunk[]> {
    const hits = await this.retrieveWithScores(queryText, k, signal);
    return hits.map((hit) => hit.entry.payload);
  }

  async retrieveWithScores(
    queryText: string,
    k: number = this.k,
    signal?: AbortSignal,
  ): Promise<QueryResult<Chunk>> {
    assertPositiveK(k);
    const queryVector = await this.embeddings.embed(queryText, signal);
    return this.index.query(queryVector, k);
  }

  protected async run(input: string, config: RunnableConfig): Promise<Chunk[]> {
    return this.retrieve(input, this.k, config.signal);
  }
}

export function formatDocuments(
  chunks: readonly Chunk[],
  separator: string = DEFAULT_DOCUMENT_SEPARATOR,
): string {
  return chunks.map((chunk) => chunk.text).join(separator);
}

function assertPositiveK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidConfigError(`k must be a positive integer, received ${k}.`);
  }
}
