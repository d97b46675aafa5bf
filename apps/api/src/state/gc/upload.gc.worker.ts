// src/state/gc/upload.gc.worker.ts

import type { FastifyBaseLogger } from "fastify";

import type { UploadService } from "../../services/upload/upload.service.js";

export async function runUploadGc(
  service: Pick<UploadService, "expireIdle">,
  log: FastifyBaseLogger,
  now = Date.now()
): Promise<number> {
  const expired = await service.expireIdle(now);

  if (expired > 0) {
    log.info({ expired }, "Upload GC pass finished");
  }

  return expired;
}
