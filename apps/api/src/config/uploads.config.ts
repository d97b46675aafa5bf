// src/config/uploads.config.ts
import path from "path";

const MiB = 1024 * 1024;

export interface UploadConfig {
  /** Durable output directory for finalized files. */
  outputDir: string;
  /** Staging directory: one subdirectory per active session. */
  stagingDir: string;

  maxUploadSizeBytes: number;
  maxFieldBytes: number;
  maxChunkBytes: number;
  maxTotalChunks: number;
  chunkTimeoutMs: number;
  maxConcurrentFinalizations: number;
  sessionTtlMs: number;
}

export interface GcConfig {
  intervalMs: number;
}

export interface TusConfig {
  enabled: boolean;
  path: string;
  dir: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  shutdownTimeoutMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  uploads: UploadConfig;
  gc: GcConfig;
  tus: TusConfig;
}

type Env = Record<string, string | undefined>;

function parsePositiveIntEnv(
  env: Env,
  name: string,
  fallback: number,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

function parseFlagEnv(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

function resolveDirEnv(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return path.resolve(raw || fallback);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const isProduction = env.NODE_ENV === "production";

  const tusPath = env.TUS_PATH?.trim() || "/files";
  if (!tusPath.startsWith("/")) {
    throw new Error("TUS_PATH must start with /");
  }

  return {
    server: {
      port: parsePositiveIntEnv(env, "PORT", 8080),
      host: env.HOST?.trim() || "0.0.0.0",
      logLevel: env.LOG_LEVEL?.trim() || (isProduction ? "info" : "debug"),
      shutdownTimeoutMs: parsePositiveIntEnv(env, "SHUTDOWN_TIMEOUT_MS", 10_000),
    },

    uploads: {
      outputDir: resolveDirEnv(env, "UPLOAD_PATH", "./uploads"),
      stagingDir: resolveDirEnv(env, "TEMP_UPLOAD_PATH", "./temp_uploads"),

      // Sizes are configured in MiB.
      maxUploadSizeBytes: parsePositiveIntEnv(env, "MAX_UPLOAD_SIZE", 10 * 1024) * MiB,
      maxFieldBytes: parsePositiveIntEnv(env, "MAX_MEMORY", 32) * MiB,
      maxChunkBytes: parsePositiveIntEnv(env, "MAX_CHUNK_SIZE", 128) * MiB,

      maxTotalChunks: parsePositiveIntEnv(env, "MAX_TOTAL_CHUNKS", 100_000),
      chunkTimeoutMs: parsePositiveIntEnv(env, "CHUNK_TIMEOUT_MS", 10 * 60_000),
      maxConcurrentFinalizations: parsePositiveIntEnv(
        env,
        "MAX_CONCURRENT_FINALIZATIONS",
        2
      ),
      sessionTtlMs: parsePositiveIntEnv(
        env,
        "UPLOAD_SESSION_TTL_MS",
        6 * 60 * 60 * 1000 // 6 hours
      ),
    },

    gc: {
      intervalMs: parsePositiveIntEnv(
        env,
        "UPLOAD_GC_INTERVAL_MS",
        5 * 60 * 1000 // 5 minutes
      ),
    },

    tus: {
      enabled: parseFlagEnv(env, "TUS_ENABLED"),
      path: tusPath.replace(/\/+$/, "") || "/files",
      dir: resolveDirEnv(env, "TUS_UPLOAD_PATH", "./tus_uploads"),
    },
  };
}
