// src/app.ts

import Fastify, { type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import type { AppConfig } from "./config/uploads.config.js";
import uploadRoutes from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import { createUploadCore } from "./services/upload/index.js";
import { registerTusRoutes } from "./services/upload/tus.completion.js";

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  /** Clock used for final file timestamps. */
  now?: () => Date;
  /** Random token source for final file names. */
  token?: () => string;
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}) {
  const uploads = config.uploads;

  const app = Fastify({
    logger: options.logger ?? {
      level: config.server.logLevel,
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
    // Requests are chunk-sized multipart bodies.
    bodyLimit: uploads.maxChunkBytes + 1024 * 1024,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    // Truncate one byte past the ceiling; the chunk store rejects it.
    throwFileSizeLimit: false,
    limits: {
      fileSize: uploads.maxChunkBytes + 1,
      fieldSize: uploads.maxFieldBytes,
      files: 1,
    },
  });

  const { service, finalizer } = createUploadCore(uploads, app.log, {
    now: options.now,
    token: options.token,
  });

  app.addHook("onClose", async () => {
    await service.close();
  });

  // Routes take the error handler in effect when they are registered.
  app.setErrorHandler((err, req, reply) => {
    const statusCode =
      typeof err.statusCode === "number" && Number.isInteger(err.statusCode)
        ? err.statusCode
        : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message:
          statusCode < 500 ? err.message : "Unexpected server error",
        retryable: false,
      },
    });
  });

  await app.register(uploadRoutes, { service, config: uploads });
  await app.register(healthRoute, { config: uploads });

  if (config.tus.enabled) {
    await registerTusRoutes(app, { config: config.tus, finalizer });
  }

  return { app, service };
}
