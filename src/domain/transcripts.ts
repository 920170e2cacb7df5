/**
 * Supplies the raw transcript for a video. `null` means transcripts are
 * disabled or unavailable for that video; it is not an error and is distinct
 * from an empty transcript.
 */
export interface TranscriptSource {
  fetch(videoId: string): Promise<string | null>;
}
