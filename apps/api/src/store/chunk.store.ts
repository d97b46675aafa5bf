// src/store/chunk.store.ts

import type { Readable } from "stream";

export interface ChunkStore {
  /** Persists one chunk; the last complete write for an index wins. */
  writeChunk(
    uploadId: string,
    index: number,
    stream: Readable,
    signal?: AbortSignal
  ): Promise<number>;

  hasChunk(uploadId: string, index: number): Promise<boolean>;

  /** Indices of fully written chunks, ascending. */
  listChunks(uploadId: string): Promise<number[]>;

  /** `null` when the chunk was never written or has been purged. */
  openChunk(uploadId: string, index: number): Promise<Readable | null>;

  cleanup(uploadId: string): Promise<void>;
}

const UPLOAD_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

/** Upload ids become directory names, so only a plain path segment is accepted. */
export function isValidUploadId(value: unknown): value is string {
  return typeof value === "string" && UPLOAD_ID_PATTERN.test(value);
}
