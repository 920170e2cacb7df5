import type { QueryResult, Vector } from "./types.js";

/**
 * `cosine` scores by cosine similarity (zero-norm vectors score 0).
 * `euclidean` scores by negative squared Euclidean distance.
 */
export type SimilarityMetric = "cosine" | "euclidean";

export interface VectorIndexItem<P> {
  vector: Vector;
  payload: P;
}

/**
 * Nearest-neighbour store. Callers depend only on this contract, so an
 * approximate structure can replace the exhaustive one without changes.
 */
export interface VectorIndex<P> {
  readonly metric: SimilarityMetric;
  /** Established by the first insertion; null while the index is empty. */
  readonly dimension: number | null;
  insert(vector: Vector, payload: P): number;
  insertMany(items: readonly VectorIndexItem<P>[]): number[];
  query(vector: Vector, k: number): QueryResult<P>;
  count(): number;
  clear(): void;
}
