// src/server.ts

import { buildApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config/uploads.config.js";
import { reconcileUploadDirs } from "./state/gc/upload.gc.reconcile.js";
import { startUploadGc } from "./state/gc/upload.gc.scheduler.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error("Invalid configuration:", err);
  process.exit(1);
}

const { app, service } = await buildApp(config);

try {
  const reconciled = await reconcileUploadDirs(config.uploads, app.log);
  app.log.info(
    {
      stagingDir: config.uploads.stagingDir,
      outputDir: config.uploads.outputDir,
      ...reconciled,
    },
    "Upload directories ready"
  );
} catch (err) {
  app.log.error(err, "Failed to prepare upload directories");
  process.exit(1);
}

const gc = startUploadGc(service, config.gc, app.log);

try {
  await app.listen({
    port: config.server.port,
    host: config.server.host,
  });

  app.log.info(
    { port: config.server.port, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  app.log.info({ signal }, "Shutting down server");

  const deadline = setTimeout(() => {
    app.log.error(
      { timeoutMs: config.server.shutdownTimeoutMs },
      "Shutdown deadline exceeded"
    );
    process.exit(1);
  }, config.server.shutdownTimeoutMs);
  deadline.unref();

  try {
    await gc.stop();
    await app.close();
    app.log.info("Server shutdown gracefully");
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
