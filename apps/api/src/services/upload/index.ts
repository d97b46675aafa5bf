// src/services/upload/index.ts

import type { FastifyBaseLogger } from "fastify";

import type { UploadConfig } from "../../config/uploads.config.js";
import { DiskChunkStore } from "../../store/disk.chunk.store.js";
import { createFinalizeQueue } from "./finalize.limiter.js";
import { Finalizer } from "./upload.finalize.js";
import { Reassembler } from "./upload.reassemble.js";
import { UploadService } from "./upload.service.js";
import { SessionTracker } from "./upload.session.js";

export function createUploadCore(
  config: UploadConfig,
  log: FastifyBaseLogger,
  options: { now?: () => Date; token?: () => string } = {}
) {
  const chunkStore = new DiskChunkStore({
    stagingDir: config.stagingDir,
    maxChunkBytes: config.maxChunkBytes,
  });

  const tracker = new SessionTracker(chunkStore, {
    sessionTtlMs: config.sessionTtlMs,
  });

  const reassembler = new Reassembler(
    chunkStore,
    config.stagingDir,
    log.child({ component: "reassembler" })
  );

  const finalizer = new Finalizer({
    outputDir: config.outputDir,
    log: log.child({ component: "finalizer" }),
    now: options.now,
    token: options.token,
  });

  const service = new UploadService({
    chunkStore,
    tracker,
    reassembler,
    finalizer,
    queue: createFinalizeQueue(config.maxConcurrentFinalizations),
    log: log.child({ component: "upload" }),
  });

  return { chunkStore, tracker, reassembler, finalizer, service };
}

export type UploadCore = ReturnType<typeof createUploadCore>;
