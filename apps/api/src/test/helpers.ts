// src/test/helpers.ts

import fs from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

import type { AppConfig, UploadConfig } from "../config/uploads.config.js";

export const silentLog: FastifyBaseLogger = pino({ level: "silent" });

export async function makeTempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "chunkdock-"));
}

export async function removeTempRoot(root: string) {
  await fs.rm(root, { recursive: true, force: true });
}

export function streamOf(...parts: Array<Buffer | string>): Readable {
  return Readable.from(parts.map((p) => (typeof p === "string" ? Buffer.from(p) : p)));
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of stream) {
    parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(parts);
}

export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

export async function testUploadConfig(
  root: string,
  overrides: Partial<UploadConfig> = {}
): Promise<UploadConfig> {
  const config: UploadConfig = {
    outputDir: path.join(root, "uploads"),
    stagingDir: path.join(root, "staging"),
    maxUploadSizeBytes: 64 * 1024 * 1024,
    maxFieldBytes: 1024 * 1024,
    maxChunkBytes: 4 * 1024 * 1024,
    maxTotalChunks: 1000,
    chunkTimeoutMs: 30_000,
    maxConcurrentFinalizations: 2,
    sessionTtlMs: 60_000,
    ...overrides,
  };

  await fs.mkdir(config.outputDir, { recursive: true });
  await fs.mkdir(config.stagingDir, { recursive: true });
  return config;
}

export async function testAppConfig(
  root: string,
  overrides: Partial<UploadConfig> = {}
): Promise<AppConfig> {
  return {
    server: { port: 0, host: "127.0.0.1", logLevel: "silent", shutdownTimeoutMs: 5_000 },
    uploads: await testUploadConfig(root, overrides),
    gc: { intervalMs: 60_000 },
    tus: { enabled: false, path: "/files", dir: path.join(root, "tus") },
  };
}

/** Fixed clock and token for predictable final names. */
export const FIXED_DATE = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
export const FIXED_STAMP = "20240102030405";

export function tokenSequence(...tokens: string[]): () => string {
  let i = 0;
  return () => tokens[Math.min(i++, tokens.length - 1)] ?? "00000000";
}
