// src/services/upload/upload.finalize.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { createReadStream } from "fs";
import type { FastifyBaseLogger } from "fastify";

import type { FinalizedFile } from "../../types/upload.js";
import { copyToFile, COPY_BUFFER_BYTES } from "../../utils/transfer.js";
import { FinalizeError, errorCode } from "../../utils/uploadErrors.js";

export const FALLBACK_FILENAME = "upload.bin";
export const PARTIAL_SUFFIX = ".partial";

// Final names are `<8 hex>_<14 digits>_<name>` and the cross-device copy
// writes `.<final name>.partial`; both must fit the 255-byte name limit.
const FINAL_PREFIX_BYTES = 24;
export const MAX_NAME_BYTES = 255 - FINAL_PREFIX_BYTES - (1 + PARTIAL_SUFFIX.length);
const NAME_ATTEMPTS = 3;

/** Longest suffix of `name` within `limit` UTF-8 bytes, cut between code points. */
function keepTailBytes(name: string, limit: number): string {
  if (Buffer.byteLength(name) <= limit) return name;

  const chars = Array.from(name);
  let start = chars.length;
  let bytes = 0;

  while (start > 0) {
    const size = Buffer.byteLength(chars[start - 1] ?? "");
    if (bytes + size > limit) break;
    bytes += size;
    start--;
  }

  return chars.slice(start).join("");
}

/**
 * Reduces a client-supplied filename to a single safe path segment.
 */
export function sanitizeFilename(raw: string): string {
  const base = raw.replace(/\\/g, "/").split("/").pop() ?? "";
  const cleaned = base.replace(/[\u0000-\u001f\u007f]/g, "").trim();

  if (!cleaned || cleaned === "." || cleaned === "..") {
    return FALLBACK_FILENAME;
  }

  // The tail keeps the extension.
  return keepTailBytes(cleaned, MAX_NAME_BYTES);
}

/** UTC `YYYYMMDDHHmmss`. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    String(date.getUTCFullYear()).padStart(4, "0") +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

export function randomToken(): string {
  return crypto.randomBytes(4).toString("hex");
}

export function buildFinalName(token: string, date: Date, originalFilename: string) {
  return `${token}_${formatTimestamp(date)}_${sanitizeFilename(originalFilename)}`;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

export interface FinalizerOptions {
  outputDir: string;
  log: FastifyBaseLogger;
  now?: () => Date;
  token?: () => string;
}

/**
 * Moves reassembled artifacts from staging into the output directory under
 * `<token>_<timestamp>_<filename>`.
 */
export class Finalizer {
  private readonly inFlight = new Set<string>();
  private readonly outputDir: string;
  private readonly log: FastifyBaseLogger;
  private readonly now: () => Date;
  private readonly token: () => string;

  constructor(options: FinalizerOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.token = options.token ?? randomToken;
  }

  async finalize(
    stagingPath: string,
    originalFilename: string,
    signal?: AbortSignal
  ): Promise<FinalizedFile> {
    const source = path.resolve(stagingPath);

    if (this.inFlight.has(source)) {
      throw new FinalizeError("Staging artifact is already being finalized", {
        inProgress: true,
      });
    }

    this.inFlight.add(source);

    try {
      let sizeBytes: number;
      try {
        sizeBytes = (await fs.stat(source)).size;
      } catch (err) {
        throw new FinalizeError("Staging artifact is missing", { cause: err });
      }

      let finalPath: string;
      try {
        finalPath = await this.reserveFinalPath(originalFilename);
      } catch (err) {
        if (err instanceof FinalizeError) throw err;
        throw new FinalizeError("Failed to reserve a final name", { cause: err });
      }

      try {
        await this.moveIntoPlace(source, finalPath, signal);
      } catch (err) {
        throw new FinalizeError("Failed to move artifact into output directory", {
          cause: err,
        });
      }

      const fileName = path.basename(finalPath);
      this.log.info({ fileName, sizeBytes }, "File finalized");

      return { fileName, path: finalPath, sizeBytes };
    } finally {
      this.inFlight.delete(source);
    }
  }

  private async reserveFinalPath(originalFilename: string): Promise<string> {
    for (let attempt = 0; attempt < NAME_ATTEMPTS; attempt++) {
      const name = buildFinalName(this.token(), this.now(), originalFilename);
      const finalPath = path.resolve(this.outputDir, name);

      if (path.dirname(finalPath) !== this.outputDir) {
        throw new FinalizeError("Final path escapes the output directory");
      }

      if (!(await exists(finalPath))) {
        return finalPath;
      }

      this.log.warn({ name }, "Final name collision; drawing a new token");
    }

    throw new FinalizeError("Could not allocate a unique final name");
  }

  /**
   * Same-volume moves are a single rename. Across volumes the bytes are
   * copied to a `.partial` marker beside the destination, synced, then
   * renamed, so the final name never points at a truncated file.
   */
  private async moveIntoPlace(
    source: string,
    destination: string,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await fs.rename(source, destination);
      return;
    } catch (err) {
      if (errorCode(err) !== "EXDEV") throw err;
    }

    this.log.info({ destination }, "Cross-device move; copying via partial file");

    const partial = path.join(
      path.dirname(destination),
      `.${path.basename(destination)}${PARTIAL_SUFFIX}`
    );

    const out = await fs.open(partial, "wx");
    try {
      try {
        await copyToFile(
          out,
          createReadStream(source, { highWaterMark: COPY_BUFFER_BYTES }),
          signal
        );
        await out.sync();
      } finally {
        await out.close();
      }

      await fs.rename(partial, destination);
    } catch (err) {
      await fs.rm(partial, { force: true });
      throw err;
    }

    await fs.unlink(source);
  }
}
