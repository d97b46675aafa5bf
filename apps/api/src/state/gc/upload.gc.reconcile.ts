// src/state/gc/upload.gc.reconcile.ts

import fs from "fs/promises";
import os from "os";
import path from "path";
import type { FastifyBaseLogger } from "fastify";

import type { UploadConfig } from "../../config/uploads.config.js";
import { PARTIAL_SUFFIX } from "../../services/upload/upload.finalize.js";

async function assertUsableDir(name: string, dir: string) {
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error(`${name} must be an absolute path`);
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`${name} is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Verify we can write to the directory. This prevents starting with a
  // misconfigured path that will later fail during uploads/GC/cancel.
  const probe = path.join(dir, `.chunkdock_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

/**
 * Startup reconciliation. No session survives a restart, so everything in
 * staging is an orphan; `.partial` files in the output directory are
 * interrupted cross-device moves.
 */
export async function reconcileUploadDirs(
  config: Pick<UploadConfig, "stagingDir" | "outputDir">,
  log: FastifyBaseLogger
): Promise<{ stagingEntries: number; partialFiles: number }> {
  if (path.resolve(config.stagingDir) === path.resolve(config.outputDir)) {
    throw new Error("TEMP_UPLOAD_PATH and UPLOAD_PATH must differ");
  }

  await assertUsableDir("TEMP_UPLOAD_PATH", config.stagingDir);
  await assertUsableDir("UPLOAD_PATH", config.outputDir);

  const staging = await fs.readdir(config.stagingDir);
  for (const entry of staging) {
    await fs.rm(path.join(config.stagingDir, entry), {
      recursive: true,
      force: true,
    });
  }

  if (staging.length > 0) {
    log.warn({ entries: staging.length }, "Purged orphaned staging data");
  }

  const partials = (await fs.readdir(config.outputDir)).filter(
    (name) => name.startsWith(".") && name.endsWith(PARTIAL_SUFFIX)
  );
  for (const name of partials) {
    await fs.rm(path.join(config.outputDir, name), { force: true });
    log.warn({ file: name }, "Removed interrupted cross-device copy");
  }

  return { stagingEntries: staging.length, partialFiles: partials.length };
}
