// src/services/upload/upload.session.ts

import type { ChunkStore } from "../../store/chunk.store.js";
import type {
  CompletedUpload,
  CompletionCheck,
  FinalizedFile,
  SessionDeclaration,
  UploadSession,
  UploadStatus,
  UploadStatusView,
} from "../../types/upload.js";
import {
  SessionStateError,
  ValidationError,
} from "../../utils/uploadErrors.js";

interface TrackedSession extends SessionDeclaration {
  received: Set<number>;
  status: UploadStatus;
  createdAt: number;
  updatedAt: number;
  error?: string;
}

function snapshot(session: TrackedSession): UploadSession {
  return {
    uploadId: session.uploadId,
    filename: session.filename,
    totalChunks: session.totalChunks,
    totalSize: session.totalSize,
    receivedChunks: [...session.received].sort((a, b) => a - b),
    status: session.status,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    ...(session.error ? { error: session.error } : {}),
  };
}

/**
 * In-process registry of upload sessions.
 *
 * A session is created implicitly by its first chunk and lives until it is
 * finalized (then only a tombstone remains), cancelled or expired. Completion
 * is decided from the chunks actually persisted in the ChunkStore.
 */
export class SessionTracker {
  private readonly sessions = new Map<string, TrackedSession>();
  private readonly completed = new Map<string, CompletedUpload>();

  constructor(
    private readonly chunkStore: ChunkStore,
    private readonly options: { sessionTtlMs: number }
  ) {}

  open(declaration: SessionDeclaration, now = Date.now()): UploadSession {
    const { uploadId } = declaration;

    if (this.completed.has(uploadId)) {
      throw new SessionStateError("UPLOAD_ALREADY_COMPLETED", uploadId);
    }

    const existing = this.sessions.get(uploadId);

    if (!existing) {
      const session: TrackedSession = {
        ...declaration,
        received: new Set(),
        status: "uploading",
        createdAt: now,
        updatedAt: now,
      };
      this.sessions.set(uploadId, session);
      return snapshot(session);
    }

    if (existing.status === "finalizing") {
      throw new SessionStateError("UPLOAD_FINALIZATION_IN_PROGRESS", uploadId);
    }

    if (
      existing.totalChunks !== declaration.totalChunks ||
      existing.totalSize !== declaration.totalSize ||
      existing.filename !== declaration.filename
    ) {
      throw new ValidationError(
        "SESSION_MISMATCH",
        "Chunk declares different upload metadata than earlier chunks",
        {
          uploadId,
          expected: {
            filename: existing.filename,
            totalChunks: existing.totalChunks,
            totalSize: existing.totalSize,
          },
        }
      );
    }

    if (existing.status === "failed") {
      existing.status = "uploading";
      delete existing.error;
    }

    existing.updatedAt = now;
    return snapshot(existing);
  }

  /**
   * Re-reads the persisted chunk set. Complete means every index in
   * 0..declaredTotalChunks-1 is present, not merely that the count matches.
   */
  async recordChunkAndCheckComplete(
    uploadId: string,
    declaredTotalChunks: number,
    now = Date.now()
  ): Promise<CompletionCheck> {
    const persisted = await this.chunkStore.listChunks(uploadId);
    const received = new Set(
      persisted.filter((index) => index < declaredTotalChunks)
    );

    let isComplete = declaredTotalChunks > 0;
    for (let i = 0; i < declaredTotalChunks && isComplete; i++) {
      if (!received.has(i)) isComplete = false;
    }

    const session = this.sessions.get(uploadId);
    if (session) {
      session.received = received;
      session.updatedAt = now;
    }

    return { receivedCount: received.size, isComplete };
  }

  /**
   * Completion latch. Synchronous check-and-set: only the first caller for a
   * session gets `true` until the claim is released by `fail`.
   */
  claim(uploadId: string, now = Date.now()): boolean {
    const session = this.sessions.get(uploadId);
    if (!session || session.status === "finalizing") return false;

    session.status = "finalizing";
    session.updatedAt = now;
    return true;
  }

  complete(uploadId: string, file: FinalizedFile, now = Date.now()): CompletedUpload {
    const record: CompletedUpload = {
      uploadId,
      fileName: file.fileName,
      sizeBytes: file.sizeBytes,
      completedAt: now,
    };

    this.sessions.delete(uploadId);
    this.completed.set(uploadId, record);
    return record;
  }

  fail(uploadId: string, error: unknown, now = Date.now()) {
    const session = this.sessions.get(uploadId);
    if (!session) return;

    session.status = "failed";
    session.error = error instanceof Error ? error.message : String(error);
    session.updatedAt = now;
  }

  get(uploadId: string): UploadSession | null {
    const session = this.sessions.get(uploadId);
    return session ? snapshot(session) : null;
  }

  status(uploadId: string): UploadStatusView | null {
    const session = this.sessions.get(uploadId);
    if (session) return snapshot(session);

    const done = this.completed.get(uploadId);
    return done ? { status: "completed", ...done } : null;
  }

  remove(uploadId: string): boolean {
    return this.sessions.delete(uploadId);
  }

  /** Sessions idle past the TTL. A session being finalized never expires. */
  expired(now = Date.now()): UploadSession[] {
    const out: UploadSession[] = [];
    for (const session of this.sessions.values()) {
      if (session.status === "finalizing") continue;
      if (now - session.updatedAt >= this.options.sessionTtlMs) {
        out.push(snapshot(session));
      }
    }
    return out;
  }

  pruneCompleted(now = Date.now()): number {
    let pruned = 0;
    for (const [uploadId, record] of this.completed) {
      if (now - record.completedAt >= this.options.sessionTtlMs) {
        this.completed.delete(uploadId);
        pruned++;
      }
    }
    return pruned;
  }

  get activeCount(): number {
    return this.sessions.size;
  }
}
