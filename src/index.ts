export { createApp, serveClient } from "./app.js";
export type { AppOptions, ServeOptions } from "./app.js";
export { ConfigError, resolveConfig } from "./config.js";
export type { CliOptions, ServerConfig } from "./config.js";
export * from "./lib/index.js";
export { startServer } from "./server.js";
export type { RunningServer } from "./server.js";
export * from "./services/index.js";
export type * from "./types/index.js";
