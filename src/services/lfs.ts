import { Readable } from "node:stream";
import {
  batchObjectPresent,
  batchObjectSizeError,
  batchObjectUpload,
  batchResponse,
  downloadLinks,
  objectMetadata,
  parseBatchRequest,
  parseObjectRequest,
  uploadLinks,
} from "../lib/codec.js";
import { LFSError } from "../lib/errors.js";
import { emptyResult, errorResult, jsonResult, streamResult } from "../lib/response.js";
import { downloadUrl, objectUrl } from "../lib/url.js";
import type {
  HandlerResult,
  LFSBatchRequest,
  LFSBatchResponse,
  LFSObjectRequest,
  LFSObjectResponse,
} from "../types/index.js";
import { objectExists, openObject, writeVerifiedObject } from "./store.js";

/** Everything a handler needs to know about the request it serves. */
export interface LFSContext {
  storeDir: string;
  basePath: string;
  method: string;
  /** Request URL after scheme and port normalization. */
  url: URL;
}

export async function handleMetadata(ctx: LFSContext, oid: string): Promise<HandlerResult> {
  const result = await objectExists(ctx.storeDir, oid);
  if (!result.exists) {
    return errorResult(ctx.method, new LFSError(404, "Object not found"));
  }

  const body = objectMetadata(oid, result.size, ctx.url.toString(), downloadUrl(ctx.url, ctx.basePath, oid));
  return jsonResult(ctx.method, 200, body);
}

export async function handleDownload(ctx: LFSContext, oid: string): Promise<HandlerResult> {
  const result = await openObject(ctx.storeDir, oid);
  if (!result.found) {
    return errorResult(ctx.method, new LFSError(404, "Object not found"));
  }

  if (ctx.method === "HEAD") {
    await result.handle.close();
    return streamResult(ctx.method, result.size, null);
  }

  const stream = Readable.toWeb(result.handle.createReadStream());
  return streamResult(ctx.method, result.size, stream);
}

export async function handleLegacyRequest(ctx: LFSContext, text: string): Promise<HandlerResult> {
  const request = parseObjectRequest(text);
  if (!request) {
    return errorResult(ctx.method, new LFSError(400, "Invalid body"));
  }

  const { oid, size } = request;
  const result = await objectExists(ctx.storeDir, oid);

  if (!result.exists) {
    return jsonResult(ctx.method, 202, uploadLinks(objectUrl(ctx.url, ctx.basePath, oid)));
  }

  if (result.size !== size) {
    return errorResult(ctx.method, new LFSError(400, "Wrong object size"));
  }

  return jsonResult(ctx.method, 200, downloadLinks(downloadUrl(ctx.url, ctx.basePath, oid)));
}

export async function handleVerify(ctx: LFSContext, oid: string): Promise<HandlerResult> {
  const result = await objectExists(ctx.storeDir, oid);
  if (!result.exists) {
    return errorResult(ctx.method, new LFSError(404, "Verification failed: object not found"));
  }
  return emptyResult(200);
}

export async function processUploadObject(ctx: LFSContext, obj: LFSObjectRequest): Promise<LFSObjectResponse> {
  const result = await objectExists(ctx.storeDir, obj.oid);

  if (!result.exists) {
    return batchObjectUpload(obj.oid, obj.size, objectUrl(ctx.url, ctx.basePath, obj.oid));
  }

  if (result.size === obj.size) {
    return batchObjectPresent(obj.oid, obj.size);
  }

  return batchObjectSizeError(obj.oid, obj.size);
}

export async function processBatchRequest(ctx: LFSContext, request: LFSBatchRequest): Promise<LFSBatchResponse> {
  const objects = await Promise.all(request.objects.map((obj) => processUploadObject(ctx, obj)));
  return batchResponse(objects);
}

export async function handleBatch(ctx: LFSContext, text: string): Promise<HandlerResult> {
  const request = parseBatchRequest(text);
  if (!request) {
    return errorResult(ctx.method, new LFSError(400, "Invalid body"));
  }

  if (request.operation === "download") {
    return errorResult(ctx.method, new LFSError(400, "Not implemented"));
  }

  return jsonResult(ctx.method, 200, await processBatchRequest(ctx, request));
}

export async function handleUpload(
  ctx: LFSContext,
  oid: string,
  declaredSize: number,
  body: AsyncIterable<Uint8Array>
): Promise<HandlerResult> {
  const result = await writeVerifiedObject(ctx.storeDir, oid, declaredSize, body);
  if (!result.ok) {
    return errorResult(ctx.method, result.error);
  }
  return emptyResult(result.created ? 201 : 200);
}
