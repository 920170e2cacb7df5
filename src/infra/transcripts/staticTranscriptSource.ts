import type { TranscriptSource } from "../../domain/transcripts.js";
import { assertValidVideoId } from "./fileTranscriptSource.js";

/** Serves transcripts from memory; ids mapped to `null` are disabled. */
export class StaticTranscriptSource implements TranscriptSource {
  private readonly transcripts: Map<string, string | null>;

  constructor(transcripts: Record<string, string | null> = {}) {
    this.transcripts = new Map(Object.entries(transcripts));
  }

  async fetch(videoId: string): Promise<string | null> {
    assertValidVideoId(videoId);
    return this.transcripts.get(videoId) ?? null;
  }
}
