// src/utils/requestSignal.ts

import type { EventEmitter } from "events";

/**
 * Abort signal for one request (pass `req.raw`): fires when the client goes
 * away or the transfer deadline passes. Call `dispose` once it is handled.
 */
export function requestAbortSignal(raw: EventEmitter, timeoutMs: number) {
  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new Error("CHUNK_TIMEOUT")),
    timeoutMs
  );
  timeout.unref();

  const onAborted = () => controller.abort(new Error("REQUEST_ABORTED"));
  raw.once("aborted", onAborted);

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timeout);
      raw.removeListener("aborted", onAborted);
    },
  };
}
