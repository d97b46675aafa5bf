// src/utils/uploadErrors.ts

import { UploadError, type ApiErrorCode } from "./apiError.js";

type ValidationCode = Extract<
  ApiErrorCode,
  | "INVALID_CHUNK_REQUEST"
  | "INVALID_UPLOAD_ID"
  | "INVALID_CHUNK"
  | "FILE_TOO_LARGE"
  | "TOO_MANY_CHUNKS"
  | "SESSION_MISMATCH"
>;

const VALIDATION_STATUS: Record<ValidationCode, number> = {
  INVALID_CHUNK_REQUEST: 400,
  INVALID_UPLOAD_ID: 400,
  INVALID_CHUNK: 400,
  FILE_TOO_LARGE: 413,
  TOO_MANY_CHUNKS: 413,
  SESSION_MISMATCH: 409,
};

/** Malformed or inconsistent request input. No state was changed. */
export class ValidationError extends UploadError {
  constructor(
    code: ValidationCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, VALIDATION_STATUS[code], message, { details });
  }
}

export class ChunkTooLargeError extends UploadError {
  constructor(readonly limitBytes: number) {
    super("CHUNK_TOO_LARGE", 413, `Chunk exceeds ${limitBytes} bytes`, {
      details: { limitBytes },
    });
  }
}

/** I/O failure while persisting a chunk. The client is expected to resend it. */
export class ChunkWriteError extends UploadError {
  constructor(uploadId: string, chunkIndex: number, cause: unknown) {
    super(
      "CHUNK_WRITE_FAILED",
      500,
      `Failed to write chunk ${chunkIndex}`,
      { retryable: true, details: { uploadId, chunkIndex }, cause }
    );
  }
}

export class TransferAbortedError extends UploadError {
  constructor(readonly bytesCopied: number, cause?: unknown) {
    super("TRANSFER_ABORTED", 408, "Transfer aborted", {
      retryable: true,
      details: { bytesCopied },
      cause,
    });
  }
}

export class MissingChunkError extends UploadError {
  constructor(readonly uploadId: string, readonly chunkIndex: number) {
    super("MISSING_CHUNK", 409, `Chunk ${chunkIndex} is missing`, {
      retryable: true,
      details: { uploadId, chunkIndex },
    });
  }
}

export class SizeMismatchError extends UploadError {
  constructor(
    readonly uploadId: string,
    readonly expectedBytes: number,
    readonly actualBytes: number
  ) {
    super(
      "SIZE_MISMATCH",
      422,
      `Combined file size mismatch: expected ${expectedBytes}, got ${actualBytes}`,
      { details: { uploadId, expectedBytes, actualBytes } }
    );
  }
}

export class FinalizeError extends UploadError {
  constructor(
    message: string,
    options: { cause?: unknown; inProgress?: boolean } = {}
  ) {
    super(
      options.inProgress ? "FINALIZE_IN_PROGRESS" : "FINALIZE_FAILED",
      options.inProgress ? 409 : 500,
      message,
      { cause: options.cause }
    );
  }
}

export class UploadNotFoundError extends UploadError {
  constructor(uploadId: string) {
    super("UPLOAD_NOT_FOUND", 404, "Invalid uploadId", {
      details: { uploadId },
    });
  }
}

export class SessionStateError extends UploadError {
  constructor(
    code: Extract<
      ApiErrorCode,
      "UPLOAD_ALREADY_COMPLETED" | "UPLOAD_FINALIZATION_IN_PROGRESS"
    >,
    uploadId: string
  ) {
    const inProgress = code === "UPLOAD_FINALIZATION_IN_PROGRESS";
    super(
      code,
      409,
      inProgress
        ? "Upload is currently finalizing"
        : "Upload is already finalized",
      { retryable: inProgress, details: { uploadId } }
    );
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  return typeof err.code === "string" ? err.code : undefined;
}
