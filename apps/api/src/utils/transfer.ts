// src/utils/transfer.ts

import type { Readable } from "stream";

import { TransferAbortedError } from "./uploadErrors.js";

export const COPY_BUFFER_BYTES = 32 * 1024;

/**
 * Minimal write side of a copy. `fs.promises.FileHandle` satisfies it and
 * reports how many bytes actually landed, which is what short-write
 * detection needs.
 */
export interface ByteSink {
  write(
    buffer: Uint8Array,
    offset: number,
    length: number
  ): Promise<{ bytesWritten: number }>;
}

export class ShortWriteError extends Error {
  constructor(readonly requested: number, readonly written: number) {
    super(`SHORT_WRITE requested=${requested} written=${written}`);
    this.name = "ShortWriteError";
  }
}

export class TransferLimitError extends Error {
  constructor(readonly limitBytes: number) {
    super(`TRANSFER_LIMIT_EXCEEDED limit=${limitBytes}`);
    this.name = "TransferLimitError";
  }
}

type ReadResult = IteratorResult<unknown, unknown>;

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk);
  throw new TypeError("Transfer source must yield bytes");
}

/**
 * Resolves with the next read, or rejects as soon as `signal` aborts so a
 * stalled source cannot hold the copy open.
 */
function readOrAbort(
  iterator: AsyncIterator<unknown>,
  signal: AbortSignal | undefined,
  copied: number
): Promise<ReadResult> {
  if (!signal) return iterator.next();

  return new Promise<ReadResult>((resolve, reject) => {
    const onAbort = () => reject(new TransferAbortedError(copied, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });

    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Copies `source` into `destination` in pieces of at most COPY_BUFFER_BYTES.
 *
 * The signal is checked before every read and every write. An abort
 * destroys the source and rejects with TransferAbortedError; a short write
 * rejects with ShortWriteError. Nothing is retried.
 */
export async function copyToFile(
  destination: ByteSink,
  source: Readable,
  signal?: AbortSignal,
  options: { maxBytes?: number } = {}
): Promise<number> {
  const iterator = source[Symbol.asyncIterator]();
  let copied = 0;

  const assertNotAborted = () => {
    if (signal?.aborted) {
      throw new TransferAbortedError(copied, signal.reason);
    }
  };

  try {
    while (true) {
      assertNotAborted();

      const next = await readOrAbort(iterator, signal, copied);
      if (next.done) break;

      const bytes = toBytes(next.value);

      for (let offset = 0; offset < bytes.byteLength; offset += COPY_BUFFER_BYTES) {
        assertNotAborted();

        const length = Math.min(COPY_BUFFER_BYTES, bytes.byteLength - offset);

        if (
          options.maxBytes !== undefined &&
          copied + length > options.maxBytes
        ) {
          throw new TransferLimitError(options.maxBytes);
        }

        const { bytesWritten } = await destination.write(bytes, offset, length);
        copied += bytesWritten;

        if (bytesWritten !== length) {
          throw new ShortWriteError(length, bytesWritten);
        }
      }
    }
  } catch (err) {
    source.destroy();
    throw err;
  }

  return copied;
}
