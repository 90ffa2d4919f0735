import type { HandlerResult, ResponseBody } from "../types/index.js";
import { LFS_CONTENT_TYPE, type LFSError } from "./errors.js";

/** HEAD responses keep their headers and status but never carry a body. */
function bodyFor(method: string, body: ResponseBody): ResponseBody {
  return method === "HEAD" ? null : body;
}

export function jsonResult(method: string, status: number, data: unknown): HandlerResult {
  return {
    status,
    headers: { "Content-Type": LFS_CONTENT_TYPE },
    body: bodyFor(method, JSON.stringify(data)),
    log: { kind: "ok", status },
  };
}

export function emptyResult(status: number): HandlerResult {
  return { status, headers: {}, body: null, log: { kind: "ok", status } };
}

export function errorResult(method: string, error: LFSError): HandlerResult {
  return {
    status: error.status,
    headers: { "Content-Type": LFS_CONTENT_TYPE },
    body: bodyFor(method, JSON.stringify(error.toJSON())),
    log: { kind: "error", status: error.status, message: error.message },
  };
}

export function streamResult(method: string, size: number, stream: ReadableStream<Uint8Array> | null): HandlerResult {
  return {
    status: 200,
    headers: {
      "Content-Type": "application/octet-stream",
      "Content-Length": String(size),
    },
    body: bodyFor(method, stream),
    log: { kind: "ok", status: 200 },
  };
}
