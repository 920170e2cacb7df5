/** A bounded, contiguous slice of the source transcript. */
export interface Chunk {
  readonly text: string;
  readonly ordinal: number;
  readonly sourceOffset: number;
}

export type Vector = readonly number[];

export interface IndexEntry<P = Chunk> {
  readonly id: number;
  readonly vector: Vector;
  readonly payload: P;
}

export interface ScoredEntry<P = Chunk> {
  entry: IndexEntry<P>;
  score: number;
}

/** Ordered by decreasing score, ties by ascending entry id. */
export type QueryResult<P = Chunk> = ScoredEntry<P>[];

/** Keyed output of a parallel join; keys are the declared branch names. */
export type Bundle = Record<string, unknown>;
