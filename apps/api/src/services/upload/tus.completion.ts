// src/services/upload/tus.completion.ts

import fs from "fs/promises";
import path from "path";
import { Server } from "@tus/server";
import { FileStore } from "@tus/file-store";
import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
} from "fastify";

import type { TusConfig } from "../../config/uploads.config.js";
import type { FinalizedFile } from "../../types/upload.js";
import type { Finalizer } from "./upload.finalize.js";

export interface CompletedTusUpload {
  id: string;
  metadata?: Record<string, string | null | undefined>;
}

function pickFilename(upload: CompletedTusUpload): string {
  const meta = upload.metadata ?? {};
  return meta.filename || meta.name || upload.id;
}

/**
 * Moves an upload the tus library has fully received into the output
 * directory, named the same way as chunked uploads.
 */
export async function relocateTusUpload(params: {
  upload: CompletedTusUpload;
  tusDir: string;
  finalizer: Finalizer;
  log: FastifyBaseLogger;
}): Promise<FinalizedFile> {
  const { upload, tusDir, finalizer, log } = params;
  const source = path.join(tusDir, path.basename(upload.id));

  const file = await finalizer.finalize(source, pickFilename(upload));

  // FileStore keeps upload metadata in a JSON sidecar.
  await fs.rm(`${source}.json`, { force: true });

  log.info({ tusUploadId: upload.id, fileName: file.fileName }, "tus upload relocated");
  return file;
}

export async function registerTusRoutes(
  app: FastifyInstance,
  deps: { config: TusConfig; finalizer: Finalizer }
) {
  const { config, finalizer } = deps;
  const log = app.log.child({ component: "tus" });

  await fs.mkdir(config.dir, { recursive: true });

  const tusServer = new Server({
    path: config.path,
    datastore: new FileStore({ directory: config.dir }),
    onUploadFinish: async (_req, res, upload) => {
      await relocateTusUpload({
        upload: { id: upload.id, metadata: upload.metadata },
        tusDir: config.dir,
        finalizer,
        log,
      });
      return res;
    },
  });

  // tus bodies are raw octet streams; the library reads them itself.
  app.addContentTypeParser(
    "application/offset+octet-stream",
    (_request, _payload, done) => done(null)
  );

  const handler = async (req: FastifyRequest, reply: FastifyReply) => {
    reply.hijack();
    await tusServer.handle(req.raw, reply.raw);
  };

  app.all(config.path, handler);
  app.all(`${config.path}/*`, handler);
}
