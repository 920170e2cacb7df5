import { InvalidConfigError } from "../domain/errors.js";
import type { Chunk } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

// Paragraph, line, sentence, then word boundaries.
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", "! ", "? ", " "];

export interface ChunkerOptions {
  size?: number;
  overlap?: number;
  separators?: readonly string[];
}

/**
 * Overlapping character splitter. Each window is cut at the strongest
 * boundary it contains, falling back to a hard cut. Chunk texts are exact
 * slices of the input, and consecutive chunks share `overlap` characters
 * (one fewer where the boundary would fall inside a surrogate pair). Lengths
 * are UTF-16 code units.
 */
export class RecursiveChunker {
  readonly size: number;

  readonly overlap: number;

  readonly separators: readonly string[];

  constructor(options: ChunkerOptions = {}) {
    this.size = options.size ?? DEFAULT_CHUNK_SIZE;
    this.overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
    this.separators = [...(options.separators ?? DEFAULT_SEPARATORS)];
    assertChunkingConfig(this.size, this.overlap, this.separators);
  }

  split(text: string): Chunk[] {
    if (!text) {
      return [];
    }

    const chunks: Chunk[] = [];
    let start = 0;

    while (start < text.length) {
      const end = this.findWindowEnd(text, start);
      chunks.push(
        Object.freeze({
          text: text.slice(start, end),
          ordinal: chunks.length,
          sourceOffset: start,
        }),
      );

      if (end >= text.length) {
        break;
      }
      let next = end - this.overlap;
      if (next < end && splitsSurrogatePair(text, next)) {
        next += 1;
      }
      start = next;
    }

    return chunks;
  }

  private findWindowEnd(text: string, start: number): number {
    const hardEnd = Math.min(start + this.size, text.length);
    if (hardEnd === text.length) {
      return hardEnd;
    }

    // A cut at or before start + overlap would not move the next window forward.
    const minimumEnd = start + this.overlap;
    const window = text.slice(start, hardEnd);

    for (const separator of this.separators) {
      const idx = window.lastIndexOf(separator);
      if (idx < 0) {
        continue;
      }
      const end = start + idx + separator.length;
      if (end > minimumEnd) {
        return end;
      }
    }

    if (splitsSurrogatePair(text, hardEnd) && hardEnd - 1 > minimumEnd) {
      return hardEnd - 1;
    }
    return hardEnd;
  }
}

export function splitIntoChunks(
  text: string,
  size: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
  separators: readonly string[] = DEFAULT_SEPARATORS,
): Chunk[] {
  return new RecursiveChunker({ size, overlap, separators }).split(text);
}

/** Inverse of `split`: drops each chunk's overlap with the text joined so far. */
export function joinChunks(chunks: readonly Chunk[]): string {
  let text = "";
  for (const chunk of chunks) {
    text += chunk.text.slice(text.length - chunk.sourceOffset);
  }
  return text;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function assertChunkingConfig(
  size: number,
  overlap: number,
  separators: readonly string[],
): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidConfigError(`Chunk size must be a positive integer, received ${size}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigError(
      `Chunk overlap must be a non-negative integer, received ${overlap}.`,
    );
  }
  if (overlap >= size) {
    throw new InvalidConfigError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${size}).`,
    );
  }
  if (separators.some((separator) => separator.length === 0)) {
    throw new InvalidConfigError("Chunk separators must be non-empty strings.");
  }
}
