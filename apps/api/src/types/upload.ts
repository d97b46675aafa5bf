// src/types/upload.ts

export type UploadStatus =
  | "uploading"
  | "finalizing"
  | "failed";

/** What every chunk request of a session declares about the whole upload. */
export interface SessionDeclaration {
  uploadId: string;
  filename: string;
  totalChunks: number;
  totalSize: number;
}

export interface ChunkSubmission extends SessionDeclaration {
  chunkIndex: number;
}

export interface UploadSession extends SessionDeclaration {
  receivedChunks: number[];
  status: UploadStatus;
  createdAt: number;
  updatedAt: number;
  error?: string;
}

export interface FinalizedFile {
  fileName: string;
  path: string;
  sizeBytes: number;
}

export interface CompletedUpload {
  uploadId: string;
  fileName: string;
  sizeBytes: number;
  completedAt: number;
}

export interface CompletionCheck {
  receivedCount: number;
  isComplete: boolean;
}

export type ChunkOutcome =
  | {
      status: "progress";
      uploadId: string;
      chunkIndex: number;
      receivedChunks: number;
      totalChunks: number;
      progress: number;
    }
  | {
      status: "finalizing";
      uploadId: string;
      chunkIndex: number;
      receivedChunks: number;
      totalChunks: number;
    }
  | {
      status: "completed";
      uploadId: string;
      chunkIndex: number;
      fileName: string;
      sizeBytes: number;
    };

export type UploadStatusView =
  | UploadSession
  | ({ status: "completed" } & CompletedUpload);
