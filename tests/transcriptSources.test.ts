import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TranscriptSourceError } from "../src/domain/errors.js";
import { FileTranscriptSource } from "../src/infra/transcripts/fileTranscriptSource.js";
import { StaticTranscriptSource } from "../src/infra/transcripts/staticTranscriptSource.js";

const TEMP_DIR = path.resolve(".tmp-tests-transcripts");

describe("FileTranscriptSource", () => {
  beforeEach(async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("reads <videoId>.txt and normalizes line endings", async () => {
    await fs.writeFile(path.join(TEMP_DIR, "demo_01.txt"), "line one\r\nline two\r\n", "utf-8");

    const source = new FileTranscriptSource(TEMP_DIR);

    await expect(source.fetch("demo_01")).resolves.toBe("line one\nline two\n");
    expect(source.resolvePath("demo_01")).toBe(path.join(TEMP_DIR, "demo_01.txt"));
  });

  it("treats a missing file as a disabled transcript", async () => {
    await expect(new FileTranscriptSource(TEMP_DIR).fetch("absent")).resolves.toBeNull();
  });

  it("rejects ids that could escape the directory", async () => {
    const source = new FileTranscriptSource(TEMP_DIR);

    await expect(source.fetch("../secrets")).rejects.toBeInstanceOf(TranscriptSourceError);
    await expect(source.fetch("")).rejects.toThrow('Invalid video id: "".');
  });

  it("wraps read failures other than a missing file", async () => {
    await fs.mkdir(path.join(TEMP_DIR, "folder.txt"));

    await expect(new FileTranscriptSource(TEMP_DIR).fetch("folder")).rejects.toBeInstanceOf(
      TranscriptSourceError,
    );
  });
});

describe("StaticTranscriptSource", () => {
  it("serves known transcripts and null for disabled or unknown ids", async () => {
    const source = new StaticTranscriptSource({ known: "hello", muted: null });

    await expect(source.fetch("known")).resolves.toBe("hello");
    await expect(source.fetch("muted")).resolves.toBeNull();
    await expect(source.fetch("unknown")).resolves.toBeNull();
  });
});
