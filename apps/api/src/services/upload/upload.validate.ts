// src/services/upload/upload.validate.ts

import { isValidUploadId } from "../../store/chunk.store.js";
import type { ChunkSubmission } from "../../types/upload.js";
import { ValidationError } from "../../utils/uploadErrors.js";

export const CHUNK_FIELDS = [
  "upload_id",
  "chunk_index",
  "total_chunks",
  "filename",
  "total_size",
] as const;

export type ChunkField = (typeof CHUNK_FIELDS)[number];

export type ChunkFields = Partial<Record<ChunkField, string>>;

export interface SubmissionLimits {
  maxUploadSizeBytes: number;
  maxTotalChunks: number;
}

const MAX_FILENAME_CHARS = 512;

function parseIntegerField(fields: ChunkFields, name: ChunkField): number {
  const raw = fields[name] ?? "";
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(n)) {
    throw new ValidationError("INVALID_CHUNK_REQUEST", `Invalid ${name}`, {
      field: name,
    });
  }
  return n;
}

/**
 * Turns the raw form fields of a chunk request into a ChunkSubmission.
 * Nothing here touches the filesystem.
 */
export function parseChunkSubmission(
  fields: ChunkFields,
  limits: SubmissionLimits
): ChunkSubmission {
  const missing = CHUNK_FIELDS.filter((name) => !fields[name]);
  if (missing.length > 0) {
    throw new ValidationError("INVALID_CHUNK_REQUEST", "Missing parameters", {
      missing,
    });
  }

  const uploadId = fields.upload_id;
  if (!isValidUploadId(uploadId)) {
    throw new ValidationError(
      "INVALID_UPLOAD_ID",
      "upload_id must be 1-128 characters of [A-Za-z0-9_-]"
    );
  }

  const filename = fields.filename ?? "";
  if (filename.length > MAX_FILENAME_CHARS) {
    throw new ValidationError(
      "INVALID_CHUNK_REQUEST",
      `filename must be <= ${MAX_FILENAME_CHARS} chars`
    );
  }

  const chunkIndex = parseIntegerField(fields, "chunk_index");
  const totalChunks = parseIntegerField(fields, "total_chunks");
  const totalSize = parseIntegerField(fields, "total_size");

  if (totalChunks < 1) {
    throw new ValidationError(
      "INVALID_CHUNK_REQUEST",
      "total_chunks must be at least 1"
    );
  }

  if (totalChunks > limits.maxTotalChunks) {
    throw new ValidationError(
      "TOO_MANY_CHUNKS",
      `total_chunks exceeds maxTotalChunks (${limits.maxTotalChunks})`
    );
  }

  if (totalSize > limits.maxUploadSizeBytes) {
    throw new ValidationError(
      "FILE_TOO_LARGE",
      `File exceeds maxUploadSizeBytes (${limits.maxUploadSizeBytes})`
    );
  }

  if (chunkIndex >= totalChunks) {
    throw new ValidationError(
      "INVALID_CHUNK",
      "chunk_index must be lower than total_chunks",
      { chunkIndex, totalChunks }
    );
  }

  return { uploadId, filename, chunkIndex, totalChunks, totalSize };
}
