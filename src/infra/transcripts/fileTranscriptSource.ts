import { promises as fs } from "node:fs";
import path from "node:path";
import { TranscriptSourceError } from "../../domain/errors.js";
import type { TranscriptSource } from "../../domain/transcripts.js";

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function assertValidVideoId(videoId: string): void {
  if (!VIDEO_ID_PATTERN.test(videoId)) {
    throw new TranscriptSourceError(`Invalid video id: "${videoId}".`);
  }
}

/**
 * Reads `<directory>/<videoId>.txt`. A missing file is treated as a video
 * whose transcripts are disabled.
 */
export class FileTranscriptSource implements TranscriptSource {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  resolvePath(videoId: string): string {
    assertValidVideoId(videoId);
    return path.join(this.directory, `${videoId}.txt`);
  }

  async fetch(videoId: string): Promise<string | null> {
    const filePath = this.resolvePath(videoId);
    try {
      const content = await fs.readFile(filePath, "utf-8");
      return content.replace(/\r\n/g, "\n");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw new TranscriptSourceError(`Failed to read transcript ${filePath}.`, {
        cause: error,
      });
    }
  }
}

function isFileMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
