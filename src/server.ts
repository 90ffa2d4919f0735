import { readFile } from "node:fs/promises";
import { createServer as createHttpsServer } from "node:https";
import { type ServerType, serve } from "@hono/node-server";
import { createApp } from "./app.js";
import type { ServerConfig } from "./config.js";
import { createConsoleLogger, type Logger } from "./lib/logger.js";
import { createUrlRewriter } from "./lib/url.js";
import { allowAll, createBasicAuthenticator, loadCredentials } from "./services/auth.js";
import { initStore } from "./services/store.js";

export interface RunningServer {
  server: ServerType;
  logger: Logger;
  close(): Promise<void>;
}

export async function startServer(config: ServerConfig): Promise<RunningServer> {
  const logger = createConsoleLogger({ verbose: config.verbose });
  const storeDir = await initStore(config.root);

  const authenticate = config.credentialsFile
    ? createBasicAuthenticator(await loadCredentials(config.credentialsFile))
    : allowAll;

  const app = createApp({
    storeDir,
    basePath: config.basePath,
    authenticate,
    rewriteUrl: createUrlRewriter({ tls: config.tls !== null, port: config.port }),
    logger,
  });

  const listenOptions = { fetch: app.fetch, port: config.port, hostname: config.host };
  const mode = config.tls ? "HTTPS" : "HTTP";
  const tls = config.tls
    ? { cert: await readFile(config.tls.cert), key: await readFile(config.tls.key) }
    : null;

  const server = await new Promise<ServerType>((resolve) => {
    const running = tls
      ? serve({ ...listenOptions, createServer: createHttpsServer, serverOptions: tls }, () => resolve(running))
      : serve(listenOptions, () => resolve(running));
  });

  logger.raw(`Listening for ${mode} on ${config.host}:${config.port}`);

  return {
    server,
    logger,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
