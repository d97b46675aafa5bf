// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_CHUNK_REQUEST"
  | "INVALID_UPLOAD_ID"
  | "INVALID_CHUNK"
  | "FILE_TOO_LARGE"
  | "CHUNK_TOO_LARGE"
  | "TOO_MANY_CHUNKS"
  | "SESSION_MISMATCH"
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_ALREADY_COMPLETED"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "CHUNK_WRITE_FAILED"
  | "TRANSFER_ABORTED"
  | "MISSING_CHUNK"
  | "SIZE_MISMATCH"
  | "FINALIZE_FAILED"
  | "FINALIZE_IN_PROGRESS"
  | "REQUEST_ERROR"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export interface UploadErrorOptions {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base for every error the upload core surfaces to its caller.
 * Scoped to one session; never fatal to the process.
 */
export class UploadError extends Error {
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    readonly code: ApiErrorCode,
    readonly statusCode: number,
    message: string,
    options: UploadErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

export function sendUploadError(reply: FastifyReply, err: UploadError) {
  return sendApiError(reply, err.statusCode, err.code, err.message, {
    retryable: err.retryable,
    details: err.details,
  });
}
