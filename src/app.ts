import type { HttpBindings } from "@hono/node-server";
import { Hono } from "hono";
import { LFSError } from "./lib/errors.js";
import { type Logger, logAccess, silentLogger } from "./lib/logger.js";
import { errorResult } from "./lib/response.js";
import { classifyRoute } from "./lib/routes.js";
import { iterateStream, readText } from "./lib/stream.js";
import { identityRewriter, type UrlRewriter } from "./lib/url.js";
import { parseDeclaredLength } from "./lib/validation.js";
import { allowAll, type Authenticator } from "./services/auth.js";
import {
  handleBatch,
  handleDownload,
  handleLegacyRequest,
  handleMetadata,
  handleUpload,
  handleVerify,
  type LFSContext,
} from "./services/lfs.js";
import type { HandlerResult, LFSRequest } from "./types/index.js";

export interface ServeOptions {
  /** The `.lfs` directory returned by `initStore`. */
  storeDir: string;
  basePath?: string;
  authenticate?: Authenticator;
  rewriteUrl?: UrlRewriter;
}

export interface AppOptions extends ServeOptions {
  logger?: Logger;
}

function wrongPath(method: string): HandlerResult {
  return errorResult(method, new LFSError(404, "Wrong path"));
}

async function handleGet(ctx: LFSContext): Promise<HandlerResult> {
  const route = classifyRoute(ctx.url.pathname, ctx.basePath);
  switch (route.kind) {
    case "default":
      return handleMetadata(ctx, route.oid);
    case "download":
      return handleDownload(ctx, route.oid);
    default:
      return wrongPath(ctx.method);
  }
}

async function handlePost(ctx: LFSContext, request: LFSRequest): Promise<HandlerResult> {
  const route = classifyRoute(ctx.url.pathname, ctx.basePath);
  switch (route.kind) {
    case "default":
      return handleVerify(ctx, route.oid);
    case "batch":
      return handleBatch(ctx, await readText(request.body));
    case "post":
      return handleLegacyRequest(ctx, await readText(request.body));
    default:
      return wrongPath(ctx.method);
  }
}

async function handlePut(ctx: LFSContext, request: LFSRequest): Promise<HandlerResult> {
  const declaredSize = parseDeclaredLength(request.headers);
  if (declaredSize === null) {
    return errorResult(ctx.method, new LFSError(400, "Missing Content-Length header"));
  }

  const route = classifyRoute(ctx.url.pathname, ctx.basePath);
  if (route.kind !== "default") {
    return wrongPath(ctx.method);
  }

  return handleUpload(ctx, route.oid, declaredSize, iterateStream(request.body));
}

/**
 * Single entry point for an LFS request: host and credential checks, then
 * routing by method and path.
 */
export async function serveClient(request: LFSRequest, options: ServeOptions): Promise<HandlerResult> {
  const { method } = request;
  const authenticate = options.authenticate ?? allowAll;
  const rewriteUrl = options.rewriteUrl ?? identityRewriter;

  if (request.url.hostname === "") {
    return errorResult(method, new LFSError(400, "Wrong host"));
  }

  if (!(await authenticate(request))) {
    const result = errorResult(method, new LFSError(401, "The authentication credentials are incorrect"));
    result.headers["LFS-Authenticate"] = 'Basic realm="Git LFS"';
    return result;
  }

  const ctx: LFSContext = {
    storeDir: options.storeDir,
    basePath: options.basePath ?? "",
    method,
    url: rewriteUrl(request.url),
  };

  switch (method) {
    case "GET":
    case "HEAD":
      return handleGet(ctx);
    case "POST":
      return handlePost(ctx, request);
    case "PUT":
      return handlePut(ctx, request);
    default:
      return errorResult(method, new LFSError(405, "Method not allowed"));
  }
}

type AppEnv = { Bindings: Partial<HttpBindings> };

function describeClient(env: Partial<HttpBindings> | undefined): { client: string; version: string } {
  const incoming = env?.incoming;
  return {
    client: incoming?.socket.remoteAddress ?? "-",
    version: incoming ? `HTTP/${incoming.httpVersion}` : "HTTP/1.1",
  };
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const logger = options.logger ?? silentLogger;
  const app = new Hono<AppEnv>();

  app.all("*", async (c) => {
    const raw = c.req.raw;
    const url = new URL(raw.url);
    const request: LFSRequest = {
      method: raw.method,
      url,
      headers: raw.headers,
      body: raw.body,
    };

    const result = await serveClient(request, options);

    logAccess(logger, {
      ...describeClient(c.env),
      method: request.method,
      path: url.pathname,
      outcome: result.log,
    });

    return new Response(result.body, { status: result.status, headers: result.headers });
  });

  app.onError((error, c) => {
    const { client } = describeClient(c.env);
    logger.error(`${client} "${c.req.method} ${c.req.path}" failed`, error);
    return new LFSError(500, "Internal server error").toLFSResponse();
  });

  return app;
}
