// src/routes/health.ts

import fs from "fs/promises";
import { constants } from "fs";
import type { FastifyPluginAsync } from "fastify";

import type { UploadConfig } from "../config/uploads.config.js";

async function checkWritable(dir: string) {
  const start = Date.now();
  try {
    await fs.access(dir, constants.W_OK);
    return { ok: true, latencyMs: Date.now() - start };
  } catch {
    return { ok: false, latencyMs: null };
  }
}

const healthRoute: FastifyPluginAsync<{ config: UploadConfig }> = async (
  app,
  { config }
) => {
  app.get("/health", async (req, reply) => {
    const timestamp = new Date().toISOString();

    const [staging, output] = await Promise.all([
      checkWritable(config.stagingDir),
      checkWritable(config.outputDir),
    ]);

    const ready = staging.ok && output.ok;
    if (!ready) {
      req.log.error({ staging, output }, "Storage Health Check Failed");
    }

    return reply.status(ready ? 200 : 503).send({
      status: ready ? "UP" : "DOWN",
      service: "chunkdock-api-v1",
      ready,
      timestamp,
      checks: {
        staging,
        output,
      },
    });
  });
};

export default healthRoute;
