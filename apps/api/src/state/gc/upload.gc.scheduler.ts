// src/state/gc/upload.gc.scheduler.ts

import type { FastifyBaseLogger } from "fastify";

import type { GcConfig } from "../../config/uploads.config.js";
import type { UploadService } from "../../services/upload/upload.service.js";
import { runUploadGc } from "./upload.gc.worker.js";

export interface UploadGcHandle {
  stop(): Promise<void>;
}

export function startUploadGc(
  service: Pick<UploadService, "expireIdle">,
  config: GcConfig,
  log: FastifyBaseLogger
): UploadGcHandle {
  let running: Promise<void> | null = null;

  log.info({ intervalMs: config.intervalMs }, "Upload GC started");

  const timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(service, log)
      .then(() => undefined)
      .catch((err: unknown) => {
        log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, config.intervalMs);

  timer.unref();

  return {
    async stop() {
      clearInterval(timer);

      if (running) {
        await running;
      }
    },
  };
}
