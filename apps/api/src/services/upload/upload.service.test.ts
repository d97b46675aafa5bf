import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { createUploadCore, type UploadCore } from "./index.js";
import type { UploadConfig } from "../../config/uploads.config.js";
import type { ChunkSubmission } from "../../types/upload.js";
import {
  SessionStateError,
  SizeMismatchError,
  UploadNotFoundError,
} from "../../utils/uploadErrors.js";
import {
  FIXED_DATE,
  FIXED_STAMP,
  listDir,
  makeTempRoot,
  removeTempRoot,
  silentLog,
  streamOf,
  testUploadConfig,
} from "../../test/helpers.js";

function submission(chunkIndex: number, overrides: Partial<ChunkSubmission> = {}): ChunkSubmission {
  return {
    uploadId: "up_abc",
    filename: "notes.txt",
    chunkIndex,
    totalChunks: 3,
    totalSize: 6,
    ...overrides,
  };
}

describe("UploadService", () => {
  let root: string;
  let config: UploadConfig;
  let core: UploadCore;

  beforeEach(async () => {
    root = await makeTempRoot();
    config = await testUploadConfig(root);
    core = createUploadCore(config, silentLog, {
      now: () => FIXED_DATE,
    });
  });

  afterEach(async () => {
    await core.service.close();
    await removeTempRoot(root);
  });

  it("reports progress until the last chunk, then finalizes", async () => {
    const { service } = core;

    expect(await service.handleChunk(submission(0), streamOf("AA"))).toEqual({
      status: "progress",
      uploadId: "up_abc",
      chunkIndex: 0,
      receivedChunks: 1,
      totalChunks: 3,
      progress: 33.33,
    });
    expect(await service.handleChunk(submission(1), streamOf("BB"))).toMatchObject({
      status: "progress",
      receivedChunks: 2,
      progress: 66.67,
    });

    const done = await service.handleChunk(submission(2), streamOf("CC"));

    expect(done).toMatchObject({ status: "completed", uploadId: "up_abc", chunkIndex: 2, sizeBytes: 6 });
    expect(done.status === "completed" && done.fileName).toMatch(
      new RegExp(`^[0-9a-f]{8}_${FIXED_STAMP}_notes\\.txt$`)
    );

    const outputs = await listDir(config.outputDir);
    expect(outputs).toHaveLength(1);
    expect(await fs.readFile(path.join(config.outputDir, outputs[0] ?? ""), "utf8")).toBe("AABBCC");
    expect(await listDir(config.stagingDir)).toEqual([]);
    expect(service.status("up_abc")).toMatchObject({ status: "completed", sizeBytes: 6 });
  });

  it("assembles chunks that arrive out of order", async () => {
    const { service } = core;

    await service.handleChunk(submission(2), streamOf("CC"));
    await service.handleChunk(submission(0), streamOf("AA"));
    const done = await service.handleChunk(submission(1), streamOf("BB"));

    expect(done.status).toBe("completed");
    const [name] = await listDir(config.outputDir);
    expect(await fs.readFile(path.join(config.outputDir, name ?? ""), "utf8")).toBe("AABBCC");
  });

  it("does not complete while an index is missing", async () => {
    const { service } = core;

    await service.handleChunk(submission(0), streamOf("AA"));
    await service.handleChunk(submission(0), streamOf("AA"));
    const third = await service.handleChunk(submission(2), streamOf("CC"));

    expect(third).toMatchObject({ status: "progress", receivedChunks: 2 });
    expect(await listDir(config.outputDir)).toEqual([]);
  });

  it("leaves no output file when the declared size is wrong", async () => {
    const { service } = core;
    const wrong = { totalSize: 10 };

    await service.handleChunk(submission(0, wrong), streamOf("AA"));
    await service.handleChunk(submission(1, wrong), streamOf("BB"));

    await expect(
      service.handleChunk(submission(2, wrong), streamOf("CC"))
    ).rejects.toBeInstanceOf(SizeMismatchError);

    expect(await listDir(config.outputDir)).toEqual([]);
    expect(await listDir(config.stagingDir)).toEqual(["up_abc", "up_abc.bin"]);
    expect(service.status("up_abc")).toMatchObject({
      status: "failed",
      error: "Combined file size mismatch: expected 10, got 6",
    });
  });

  it("finalizes once when the last chunk is sent twice at the same time", async () => {
    const { service } = core;

    await service.handleChunk(submission(0), streamOf("AA"));
    await service.handleChunk(submission(1), streamOf("BB"));

    const outcomes = await Promise.all([
      service.handleChunk(submission(2), streamOf("CC")),
      service.handleChunk(submission(2), streamOf("CC")),
    ]);

    const statuses = outcomes.map((o) => o.status);
    expect(statuses).toContain("completed");
    expect(statuses).not.toContain("progress");
    expect(await listDir(config.outputDir)).toHaveLength(1);
  });

  it("answers completed to a resend that was still writing when the session finalized", async () => {
    const { service } = core;
    const pair = { totalChunks: 2, totalSize: 4 };
    const sessionDir = path.join(config.stagingDir, "up_abc");

    await service.handleChunk(submission(0, pair), streamOf("AA"));

    const stalled = new Readable({ read() {} });
    stalled.push("AA");
    const resend = service.handleChunk(submission(0, pair), stalled);

    await vi.waitFor(async () => {
      const names = await listDir(sessionDir);
      expect(names.some((name) => name.endsWith(".tmp"))).toBe(true);
    });

    const done = await service.handleChunk(submission(1, pair), streamOf("BB"));
    expect(done.status).toBe("completed");

    stalled.push(null);

    expect(await resend).toEqual({
      status: "completed",
      uploadId: "up_abc",
      chunkIndex: 0,
      fileName: done.status === "completed" ? done.fileName : "",
      sizeBytes: 4,
    });
    expect(await listDir(config.stagingDir)).toEqual([]);
    expect(await listDir(config.outputDir)).toHaveLength(1);
  });

  it("finalizes an upload whose name is long in UTF-8 bytes", async () => {
    const { service } = core;

    const done = await service.handleChunk(
      submission(0, { filename: `${"Д".repeat(120)}.mp4`, totalChunks: 1, totalSize: 2 }),
      streamOf("AA")
    );

    expect(done).toMatchObject({ status: "completed", sizeBytes: 2 });
    expect(done.status === "completed" && done.fileName.endsWith(`_${"Д".repeat(109)}.mp4`)).toBe(
      true
    );
    expect(await listDir(config.outputDir)).toHaveLength(1);
  });

  it("refuses chunks after completion", async () => {
    const { service } = core;
    const single = { totalChunks: 1, totalSize: 2 };

    await service.handleChunk(submission(0, single), streamOf("AA"));

    await expect(
      service.handleChunk(submission(0, single), streamOf("AA"))
    ).rejects.toBeInstanceOf(SessionStateError);
  });

  it("cancels a session and drops its staging data", async () => {
    const { service } = core;

    await service.handleChunk(submission(0), streamOf("AA"));
    await service.cancel("up_abc");

    expect(() => service.status("up_abc")).toThrow(UploadNotFoundError);
    expect(await listDir(config.stagingDir)).toEqual([]);
    await expect(service.cancel("up_abc")).rejects.toBeInstanceOf(UploadNotFoundError);
  });

  it("expires sessions idle past the TTL", async () => {
    const { service } = core;

    await service.handleChunk(submission(0), streamOf("AA"));

    expect(await service.expireIdle(Date.now() - 1)).toBe(0);
    expect(await service.expireIdle(Date.now() + config.sessionTtlMs)).toBe(1);
    expect(await listDir(config.stagingDir)).toEqual([]);
    expect(() => service.status("up_abc")).toThrow(UploadNotFoundError);
  });
});
