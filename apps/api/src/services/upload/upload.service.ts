// src/services/upload/upload.service.ts

import fs from "fs/promises";
import type { Readable } from "stream";
import type { FastifyBaseLogger } from "fastify";

import type { ChunkStore } from "../../store/chunk.store.js";
import type {
  ChunkOutcome,
  ChunkSubmission,
  FinalizedFile,
  UploadStatusView,
} from "../../types/upload.js";
import {
  SessionStateError,
  UploadNotFoundError,
} from "../../utils/uploadErrors.js";
import type { FinalizeQueue } from "./finalize.limiter.js";
import type { Finalizer } from "./upload.finalize.js";
import type { Reassembler } from "./upload.reassemble.js";
import type { SessionTracker } from "./upload.session.js";

export interface UploadServiceDeps {
  chunkStore: ChunkStore;
  tracker: SessionTracker;
  reassembler: Reassembler;
  finalizer: Finalizer;
  queue: FinalizeQueue;
  log: FastifyBaseLogger;
}

function progressPercent(received: number, total: number): number {
  return Math.round((received / total) * 10_000) / 100;
}

/**
 * Drives one chunk request through store → tracker → reassembly → finalize.
 */
export class UploadService {
  private readonly shutdown = new AbortController();

  constructor(private readonly deps: UploadServiceDeps) {}

  async handleChunk(
    submission: ChunkSubmission,
    source: Readable,
    signal?: AbortSignal
  ): Promise<ChunkOutcome> {
    const { chunkStore, tracker, log } = this.deps;
    const { uploadId, chunkIndex, totalChunks } = submission;

    tracker.open(submission);

    let bytes: number;
    try {
      bytes = await chunkStore.writeChunk(uploadId, chunkIndex, source, signal);
    } catch (err) {
      // Finalization purges staging under an in-flight resend.
      const late = await this.settledResend(uploadId, chunkIndex);
      if (late) return late;
      throw err;
    }
    log.debug({ uploadId, chunkIndex, bytes }, "Chunk stored");

    const settled = await this.settledResend(uploadId, chunkIndex);
    if (settled) return settled;

    const check = await tracker.recordChunkAndCheckComplete(uploadId, totalChunks);

    if (!check.isComplete) {
      return {
        status: "progress",
        uploadId,
        chunkIndex,
        receivedChunks: check.receivedCount,
        totalChunks,
        progress: progressPercent(check.receivedCount, totalChunks),
      };
    }

    if (!tracker.claim(uploadId)) {
      log.debug({ uploadId, chunkIndex }, "Completion already claimed");

      if (tracker.status(uploadId)?.status === "completed") {
        await chunkStore.cleanup(uploadId);
      }

      return {
        status: "finalizing",
        uploadId,
        chunkIndex,
        receivedChunks: check.receivedCount,
        totalChunks,
      };
    }

    const file = await this.finalizeSession(submission);

    return {
      status: "completed",
      uploadId,
      chunkIndex,
      fileName: file.fileName,
      sizeBytes: file.sizeBytes,
    };
  }

  /**
   * Completed outcome for a chunk whose session another request finalized
   * while it was being written. Drops whatever staging the write left.
   */
  private async settledResend(
    uploadId: string,
    chunkIndex: number
  ): Promise<ChunkOutcome | null> {
    const { chunkStore, tracker, log } = this.deps;
    const finished = tracker.status(uploadId);
    if (!finished || finished.status !== "completed") return null;

    await chunkStore.cleanup(uploadId);
    log.debug({ uploadId, chunkIndex }, "Chunk arrived after finalization");

    return {
      status: "completed",
      uploadId,
      chunkIndex,
      fileName: finished.fileName,
      sizeBytes: finished.sizeBytes,
    };
  }

  private async finalizeSession(submission: ChunkSubmission): Promise<FinalizedFile> {
    const { chunkStore, tracker, reassembler, finalizer, queue, log } = this.deps;
    const { uploadId, totalChunks, totalSize, filename } = submission;
    const signal = this.shutdown.signal;

    let file: FinalizedFile;
    try {
      file = await queue.add(
        async () => {
          const artifact = await reassembler.reassemble({
            uploadId,
            totalChunks,
            totalSize,
            signal,
          });
          return finalizer.finalize(artifact, filename, signal);
        },
        { throwOnTimeout: true }
      );
    } catch (err) {
      tracker.fail(uploadId, err);
      log.error({ uploadId, err }, "Upload finalization failed");
      throw err;
    }

    tracker.complete(uploadId, file);

    try {
      await chunkStore.cleanup(uploadId);
    } catch (err) {
      // The file is already durable; leftovers are wiped on the next start.
      log.warn({ uploadId, err }, "Failed to purge staging chunks");
    }

    log.info(
      { uploadId, fileName: file.fileName, sizeBytes: file.sizeBytes },
      "Upload finalized"
    );

    return file;
  }

  status(uploadId: string): UploadStatusView {
    const view = this.deps.tracker.status(uploadId);
    if (!view) throw new UploadNotFoundError(uploadId);
    return view;
  }

  async cancel(uploadId: string): Promise<void> {
    const { tracker, log } = this.deps;
    const view = tracker.status(uploadId);

    if (!view) throw new UploadNotFoundError(uploadId);

    if (view.status === "completed") {
      throw new SessionStateError("UPLOAD_ALREADY_COMPLETED", uploadId);
    }
    if (view.status === "finalizing") {
      throw new SessionStateError("UPLOAD_FINALIZATION_IN_PROGRESS", uploadId);
    }

    tracker.remove(uploadId);
    await this.discardStaging(uploadId);

    log.info({ uploadId }, "Upload canceled");
  }

  /** Drops sessions idle past their TTL together with their staging data. */
  async expireIdle(now = Date.now()): Promise<number> {
    const { tracker, log } = this.deps;
    const expired = tracker.expired(now);

    for (const session of expired) {
      tracker.remove(session.uploadId);
      await this.discardStaging(session.uploadId);

      log.warn(
        {
          uploadId: session.uploadId,
          status: session.status,
          receivedChunks: session.receivedChunks.length,
          totalChunks: session.totalChunks,
        },
        "Expired idle upload session"
      );

      // Yield between sessions when the backlog is large.
      await new Promise((r) => setImmediate(r));
    }

    tracker.pruneCompleted(now);
    return expired.length;
  }

  private async discardStaging(uploadId: string) {
    const { chunkStore, reassembler } = this.deps;
    await Promise.all([
      chunkStore.cleanup(uploadId),
      fs.rm(reassembler.artifactPath(uploadId), { force: true }),
    ]);
  }

  /** Aborts in-flight reassembly and waits for the queue to drain. */
  async close(): Promise<void> {
    this.shutdown.abort();
    await this.deps.queue.onIdle();
  }
}
