import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { DiskChunkStore } from "./disk.chunk.store.js";
import { isValidUploadId } from "./chunk.store.js";
import {
  ChunkTooLargeError,
  TransferAbortedError,
  ValidationError,
} from "../utils/uploadErrors.js";
import { listDir, makeTempRoot, readAll, removeTempRoot, streamOf } from "../test/helpers.js";

describe("isValidUploadId", () => {
  it("accepts safe identifiers only", () => {
    expect(isValidUploadId("up_abc-123")).toBe(true);
    expect(isValidUploadId("a".repeat(128))).toBe(true);

    expect(isValidUploadId("")).toBe(false);
    expect(isValidUploadId("../evil")).toBe(false);
    expect(isValidUploadId("a/b")).toBe(false);
    expect(isValidUploadId(".hidden")).toBe(false);
    expect(isValidUploadId("a".repeat(129))).toBe(false);
    expect(isValidUploadId(42)).toBe(false);
  });
});

describe("DiskChunkStore", () => {
  let root: string;
  let stagingDir: string;
  let store: DiskChunkStore;

  beforeEach(async () => {
    root = await makeTempRoot();
    stagingDir = path.join(root, "staging");
    store = new DiskChunkStore({ stagingDir, maxChunkBytes: 16 });
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it("persists a chunk under the session directory", async () => {
    const written = await store.writeChunk("up_abc", 0, streamOf("hello"));

    expect(written).toBe(5);
    expect(await listDir(path.join(stagingDir, "up_abc"))).toEqual(["0"]);
    expect(await fs.readFile(path.join(stagingDir, "up_abc", "0"), "utf8")).toBe("hello");
  });

  it("keeps the last write of a resent chunk", async () => {
    await store.writeChunk("up_abc", 1, streamOf("first"));
    await store.writeChunk("up_abc", 1, streamOf("second!"));

    expect(await fs.readFile(path.join(stagingDir, "up_abc", "1"), "utf8")).toBe("second!");
    expect(await listDir(path.join(stagingDir, "up_abc"))).toEqual(["1"]);
  });

  it("rejects upload ids that could escape staging", async () => {
    const err = await store.writeChunk("../evil", 0, streamOf("x")).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "INVALID_UPLOAD_ID", statusCode: 400 });
    expect(await listDir(root)).toEqual([]);
  });

  it("rejects negative chunk indices", async () => {
    await expect(store.writeChunk("up_abc", -1, streamOf("x"))).rejects.toMatchObject({
      code: "INVALID_CHUNK",
    });
  });

  it("rejects an oversized chunk and leaves no partial file", async () => {
    const err = await store
      .writeChunk("up_abc", 0, streamOf(Buffer.alloc(17)))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ChunkTooLargeError);
    expect(err).toMatchObject({ statusCode: 413, limitBytes: 16 });
    expect(await listDir(path.join(stagingDir, "up_abc"))).toEqual([]);
  });

  it("deletes the partial temp file when a write is aborted mid-stream", async () => {
    const sessionDir = path.join(stagingDir, "up_abc");
    const source = new Readable({ read() {} });
    const controller = new AbortController();

    source.push(Buffer.from("01234567"));
    const writing = store
      .writeChunk("up_abc", 0, source, controller.signal)
      .catch((e: unknown) => e);

    await vi.waitFor(async () => {
      const names = await listDir(sessionDir);
      expect(names.some((name) => name.endsWith(".tmp"))).toBe(true);
    });
    controller.abort(new Error("REQUEST_ABORTED"));

    const err = await writing;
    expect(err).toBeInstanceOf(TransferAbortedError);
    expect(err).toMatchObject({ code: "TRANSFER_ABORTED", statusCode: 408 });
    expect(await listDir(sessionDir)).toEqual([]);
    expect(source.destroyed).toBe(true);
  });

  it("lists persisted indices in ascending order and ignores temp files", async () => {
    await store.writeChunk("up_abc", 10, streamOf("k"));
    await store.writeChunk("up_abc", 2, streamOf("c"));
    await store.writeChunk("up_abc", 0, streamOf("a"));
    await fs.writeFile(path.join(stagingDir, "up_abc", "3.abcd1234.tmp"), "partial");

    expect(await store.listChunks("up_abc")).toEqual([0, 2, 10]);
    expect(await store.hasChunk("up_abc", 2)).toBe(true);
    expect(await store.hasChunk("up_abc", 3)).toBe(false);
  });

  it("reports nothing for an unknown session", async () => {
    expect(await store.listChunks("unknown")).toEqual([]);
    expect(await store.openChunk("unknown", 0)).toBeNull();
  });

  it("opens a stored chunk for reading", async () => {
    await store.writeChunk("up_abc", 4, streamOf("payload"));

    const stream = await store.openChunk("up_abc", 4);
    expect(stream).not.toBeNull();
    if (stream) {
      expect((await readAll(stream)).toString()).toBe("payload");
    }
    expect(await store.openChunk("up_abc", 5)).toBeNull();
  });

  it("removes the session directory on cleanup", async () => {
    await store.writeChunk("up_abc", 0, streamOf("a"));
    await store.cleanup("up_abc");

    expect(await listDir(stagingDir)).toEqual([]);
    await expect(store.cleanup("up_abc")).resolves.toBeUndefined();
  });
});
