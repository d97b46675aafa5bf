// src/services/upload/finalize.limiter.ts

import PQueue from "p-queue";

/**
 * Bounds how many sessions reassemble at once. Reassembly is disk bound;
 * chunk writes are not queued.
 */
export function createFinalizeQueue(concurrency: number) {
  return new PQueue({ concurrency });
}

export type FinalizeQueue = ReturnType<typeof createFinalizeQueue>;
