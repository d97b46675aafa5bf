// src/routes/uploads.routes.ts

import type { FastifyPluginAsync } from "fastify";
import type { MultipartFields, MultipartFile } from "@fastify/multipart";

import { sendApiError, sendUploadError, UploadError } from "../utils/apiError.js";
import { requestAbortSignal } from "../utils/requestSignal.js";
import type { UploadConfig } from "../config/uploads.config.js";
import type { UploadService } from "../services/upload/upload.service.js";
import type { ChunkSubmission } from "../types/upload.js";
import {
  CHUNK_FIELDS,
  parseChunkSubmission,
  type ChunkFields,
} from "../services/upload/upload.validate.js";
import { isValidUploadId } from "../store/chunk.store.js";

export const CHUNK_FILE_FIELD = "chunk";

export interface UploadRoutesOptions {
  service: UploadService;
  config: UploadConfig;
}

function fieldValue(fields: MultipartFields, name: string): string | undefined {
  const entry = fields[name];
  const first = Array.isArray(entry) ? entry[0] : entry;
  if (!first || first.type !== "field") return undefined;
  return typeof first.value === "string" ? first.value : undefined;
}

function readChunkFields(fields: MultipartFields): ChunkFields {
  const out: ChunkFields = {};
  for (const name of CHUNK_FIELDS) {
    const value = fieldValue(fields, name);
    if (value !== undefined) out[name] = value;
  }
  return out;
}

const uploadRoutes: FastifyPluginAsync<UploadRoutesOptions> = async (
  app,
  { service, config }
) => {
  app.post("/upload_chunk", async (req, reply) => {
    const log = req.log;

    if (!req.isMultipart()) {
      return sendApiError(
        reply,
        400,
        "INVALID_CHUNK_REQUEST",
        "Request must be multipart/form-data"
      );
    }

    let part: MultipartFile | undefined;
    try {
      part = await req.file();
    } catch (err) {
      log.warn({ err }, "Failed to parse chunk form");
      return sendApiError(reply, 400, "INVALID_CHUNK_REQUEST", "Error parsing form", {
        retryable: true,
      });
    }

    if (!part || part.fieldname !== CHUNK_FILE_FIELD) {
      part?.file.resume();
      return sendApiError(
        reply,
        400,
        "INVALID_CHUNK_REQUEST",
        `Missing file field "${CHUNK_FILE_FIELD}"`
      );
    }

    let submission: ChunkSubmission;
    try {
      // Only fields sent before the file part are visible here.
      submission = parseChunkSubmission(readChunkFields(part.fields), config);
    } catch (err) {
      part.file.resume();
      if (err instanceof UploadError) return sendUploadError(reply, err);
      throw err;
    }

    const { uploadId, chunkIndex } = submission;
    const { signal, dispose } = requestAbortSignal(req.raw, config.chunkTimeoutMs);

    try {
      const outcome = await service.handleChunk(submission, part.file, signal);
      return { ok: true, ...outcome };
    } catch (err) {
      if (!(err instanceof UploadError)) throw err;

      if (err.statusCode >= 500) {
        log.error({ uploadId, chunkIndex, err }, "Chunk upload failed");
      } else {
        log.warn({ uploadId, chunkIndex, code: err.code }, "Chunk rejected");
      }
      return sendUploadError(reply, err);
    } finally {
      dispose();
    }
  });

  app.get<{ Params: { uploadId: string } }>("/v1/uploads/:uploadId/status", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isValidUploadId(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "Invalid uploadId");
    }

    try {
      return service.status(uploadId);
    } catch (err) {
      if (err instanceof UploadError) return sendUploadError(reply, err);
      throw err;
    }
  });

  // Cancel an in-progress upload session and drop its staging data.
  app.delete<{ Params: { uploadId: string } }>("/v1/uploads/:uploadId", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isValidUploadId(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "Invalid uploadId");
    }

    try {
      await service.cancel(uploadId);
      return reply.code(200).send({ ok: true, uploadId, status: "canceled" });
    } catch (err) {
      if (err instanceof UploadError) return sendUploadError(reply, err);
      throw err;
    }
  });
};

export default uploadRoutes;
