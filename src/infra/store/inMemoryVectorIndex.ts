import {
  DimensionMismatchError,
  InvalidConfigError,
  InvalidVectorError,
} from "../../domain/errors.js";
import type { IndexEntry, QueryResult, ScoredEntry, Vector } from "../../domain/types.js";
import type {
  SimilarityMetric,
  VectorIndex,
  VectorIndexItem,
} from "../../domain/vectorIndex.js";
import {
  dot,
  isFiniteVector,
  norm,
  squaredEuclideanDistance,
} from "../../utils/vector.js";

export interface InMemoryVectorIndexOptions {
  metric?: SimilarityMetric;
}

interface StoredEntry<P> {
  entry: IndexEntry<P>;
  norm: number;
}

/**
 * Exhaustive k-nearest-neighbour index. Every query scores all entries and
 * keeps the best k in a bounded heap, so a query costs O(n·d + n·log k).
 */
export class InMemoryVectorIndex<P> implements VectorIndex<P> {
  readonly metric: SimilarityMetric;

  private entries: StoredEntry<P>[] = [];

  private establishedDimension: number | null = null;

  private nextId = 0;

  constructor(options: InMemoryVectorIndexOptions = {}) {
    this.metric = options.metric ?? "cosine";
  }

  get dimension(): number | null {
    return this.establishedDimension;
  }

  insert(vector: Vector, payload: P): number {
    const [id] = this.insertMany([{ vector, payload }]);
    return id;
  }

  insertMany(items: readonly VectorIndexItem<P>[]): number[] {
    let dimension = this.establishedDimension;
    for (const item of items) {
      dimension = this.validateVector(item.vector, dimension);
    }

    const ids: number[] = [];
    for (const item of items) {
      const vector = Object.freeze([...item.vector]);
      const entry: IndexEntry<P> = Object.freeze({
        id: this.nextId,
        vector,
        payload: item.payload,
      });
      this.nextId += 1;
      this.entries.push({ entry, norm: norm(vector) });
      ids.push(entry.id);
    }

    this.establishedDimension = dimension;
    return ids;
  }

  query(vector: Vector, k: number): QueryResult<P> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidConfigError(`k must be a positive integer, received ${k}.`);
    }
    if (this.establishedDimension !== null && vector.length !== this.establishedDimension) {
      throw new DimensionMismatchError(this.establishedDimension, vector.length);
    }
    if (!isFiniteVector(vector)) {
      throw new InvalidVectorError("Query vector contains non-finite values.");
    }
    if (this.entries.length === 0) {
      return [];
    }

    const queryNorm = norm(vector);
    const heap = new BoundedWorstFirstHeap<P>(k);
    for (const stored of this.entries) {
      heap.offer({ entry: stored.entry, score: this.score(vector, queryNorm, stored) });
    }
    return heap.drain().sort(compareBestFirst);
  }

  count(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
    this.establishedDimension = null;
    this.nextId = 0;
  }

  private score(query: Vector, queryNorm: number, stored: StoredEntry<P>): number {
    if (this.metric === "euclidean") {
      return -squaredEuclideanDistance(query, stored.entry.vector);
    }
    const denominator = queryNorm * stored.norm;
    if (denominator === 0) {
      return 0;
    }
    return dot(query, stored.entry.vector) / denominator;
  }

  private validateVector(vector: Vector, dimension: number | null): number {
    if (dimension === null) {
      if (vector.length === 0) {
        throw new DimensionMismatchError(1, 0);
      }
    } else if (vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, vector.length);
    }
    if (!isFiniteVector(vector)) {
      throw new InvalidVectorError("Vector contains non-finite values.");
    }
    return vector.length;
  }
}

function compareBestFirst<P>(a: ScoredEntry<P>, b: ScoredEntry<P>): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return a.entry.id - b.entry.id;
}

function isWorse<P>(a: ScoredEntry<P>, b: ScoredEntry<P>): boolean {
  return compareBestFirst(a, b) > 0;
}

// Min-heap on rank: the root is the worst of the k best seen so far.
class BoundedWorstFirstHeap<P> {
  private readonly items: ScoredEntry<P>[] = [];

  constructor(private readonly capacity: number) {}

  offer(candidate: ScoredEntry<P>): void {
    if (this.items.length < this.capacity) {
      this.items.push(candidate);
      this.siftUp(this.items.length - 1);
      return;
    }
    if (isWorse(this.items[0], candidate)) {
      this.items[0] = candidate;
      this.siftDown(0);
    }
  }

  drain(): ScoredEntry<P>[] {
    return this.items.splice(0, this.items.length);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!isWorse(this.items[child], this.items[parent])) {
        return;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const size = this.items.length;
    while (true) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let worst = parent;
      if (left < size && isWorse(this.items[left], this.items[worst])) {
        worst = left;
      }
      if (right < size && isWorse(this.items[right], this.items[worst])) {
        worst = right;
      }
      if (worst === parent) {
        return;
      }
      this.swap(parent, worst);
      parent = worst;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}
