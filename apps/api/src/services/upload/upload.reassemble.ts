// src/services/upload/upload.reassemble.ts

import fs from "fs/promises";
import path from "path";
import type { FastifyBaseLogger } from "fastify";

import type { ChunkStore } from "../../store/chunk.store.js";
import { isValidUploadId } from "../../store/chunk.store.js";
import { copyToFile } from "../../utils/transfer.js";
import {
  MissingChunkError,
  SizeMismatchError,
  ValidationError,
} from "../../utils/uploadErrors.js";

export class Reassembler {
  constructor(
    private readonly chunkStore: ChunkStore,
    private readonly stagingDir: string,
    private readonly log: FastifyBaseLogger
  ) {}

  artifactPath(uploadId: string) {
    if (!isValidUploadId(uploadId)) {
      throw new ValidationError("INVALID_UPLOAD_ID", "Invalid uploadId");
    }
    return path.join(this.stagingDir, `${uploadId}.bin`);
  }

  /**
   * Concatenates chunks 0..totalChunks-1 in ascending index order into the
   * staging artifact and checks its length against `totalSize`.
   *
   * On a size mismatch the artifact is kept for inspection.
   */
  async reassemble(params: {
    uploadId: string;
    totalChunks: number;
    totalSize: number;
    signal?: AbortSignal;
  }): Promise<string> {
    const { uploadId, totalChunks, totalSize, signal } = params;
    const outPath = this.artifactPath(uploadId);
    const started = Date.now();

    const out = await fs.open(outPath, "w");

    try {
      for (let index = 0; index < totalChunks; index++) {
        const rs = await this.chunkStore.openChunk(uploadId, index);
        if (!rs) {
          throw new MissingChunkError(uploadId, index);
        }

        await copyToFile(out, rs, signal);
      }

      await out.sync();
    } finally {
      await out.close();
    }

    const { size } = await fs.stat(outPath);
    if (size !== totalSize) {
      this.log.warn(
        { uploadId, expected: totalSize, actual: size, artifact: outPath },
        "Reassembled size mismatch; keeping staging artifact"
      );
      throw new SizeMismatchError(uploadId, totalSize, size);
    }

    this.log.debug(
      { uploadId, totalChunks, sizeBytes: size, durationMs: Date.now() - started },
      "Chunks reassembled"
    );

    return outPath;
  }
}
