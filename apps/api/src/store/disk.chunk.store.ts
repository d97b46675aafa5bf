// src/store/disk.chunk.store.ts

import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { Readable } from "stream";

import { copyToFile, COPY_BUFFER_BYTES, TransferLimitError } from "../utils/transfer.js";
import { UploadError } from "../utils/apiError.js";
import {
  ChunkTooLargeError,
  ChunkWriteError,
  ValidationError,
  errorCode,
} from "../utils/uploadErrors.js";
import { isValidUploadId, type ChunkStore } from "./chunk.store.js";

const CHUNK_NAME = /^\d+$/;

export class DiskChunkStore implements ChunkStore {
  constructor(
    private readonly options: {
      stagingDir: string;
      maxChunkBytes: number;
    }
  ) {}

  dir(uploadId: string) {
    if (!isValidUploadId(uploadId)) {
      throw new ValidationError(
        "INVALID_UPLOAD_ID",
        "upload_id must be 1-128 characters of [A-Za-z0-9_-]"
      );
    }
    return path.join(this.options.stagingDir, uploadId);
  }

  private chunkPath(uploadId: string, index: number) {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new ValidationError(
        "INVALID_CHUNK",
        "chunk_index must be a non-negative integer"
      );
    }
    return path.join(this.dir(uploadId), String(index));
  }

  async writeChunk(
    uploadId: string,
    index: number,
    stream: Readable,
    signal?: AbortSignal
  ): Promise<number> {
    const finalPath = this.chunkPath(uploadId, index);
    const dir = path.dirname(finalPath);

    // Unique per writer, so a resend never interleaves with an in-flight write.
    const tempPath = `${finalPath}.${crypto.randomBytes(4).toString("hex")}.tmp`;

    let handle: FileHandle | null = null;

    try {
      await fs.mkdir(dir, { recursive: true });
      handle = await fs.open(tempPath, "wx");

      const written = await copyToFile(handle, stream, signal, {
        maxBytes: this.options.maxChunkBytes,
      });

      await handle.close();
      handle = null;

      await fs.rename(tempPath, finalPath);
      return written;
    } catch (err) {
      if (handle) {
        await handle.close().catch(() => undefined);
      }
      await fs.rm(tempPath, { force: true }).catch(() => undefined);

      stream.destroy();

      if (err instanceof TransferLimitError) {
        throw new ChunkTooLargeError(err.limitBytes);
      }
      if (err instanceof UploadError) {
        throw err;
      }
      throw new ChunkWriteError(uploadId, index, err);
    }
  }

  async hasChunk(uploadId: string, index: number): Promise<boolean> {
    try {
      const st = await fs.stat(this.chunkPath(uploadId, index));
      return st.isFile();
    } catch (err) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async listChunks(uploadId: string): Promise<number[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir(uploadId));
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }

    return names
      .filter((name) => CHUNK_NAME.test(name))
      .map(Number)
      .sort((a, b) => a - b);
  }

  async openChunk(uploadId: string, index: number): Promise<Readable | null> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.chunkPath(uploadId, index), "r");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }

    return handle.createReadStream({ highWaterMark: COPY_BUFFER_BYTES });
  }

  async cleanup(uploadId: string): Promise<void> {
    await fs.rm(this.dir(uploadId), { recursive: true, force: true });
  }
}
