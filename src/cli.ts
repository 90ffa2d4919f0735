#!/usr/bin/env node
/**
 * lfs-fileserver CLI
 * Serves the Git LFS API from a directory on the local filesystem.
 */

import { Command } from "commander";
import { type CliOptions, resolveConfig } from "./config.js";
import { startServer } from "./server.js";

const VERSION = "0.1.0";

function createProgram(): Command {
  const program = new Command();

  program
    .name("lfs-fileserver")
    .description("Start a Git LFS server storing objects under <root>/.lfs")
    .version(VERSION)
    .argument("[root]", "Storage root directory", ".")
    .option("-s, --host <address>", "IP address to listen on", "127.0.0.1")
    .option("-p, --port <port>", "TCP port to listen on", "8080")
    .option("--cert <file>", "Certificate file for HTTPS")
    .option("--key <file>", "Private key file for HTTPS")
    .option("--credentials <file>", "File of user:password lines for HTTP Basic authentication")
    .option("--base-path <path>", "Path prefix the LFS endpoints are mounted under", "")
    .option("--verbose", "Log every request", false)
    .action(async (root: string, options: CliOptions) => {
      const running = await startServer(resolveConfig(root, options));

      const shutdown = () => {
        running.logger.raw("Shutting down...");
        running.close().then(
          () => process.exit(0),
          (error: unknown) => {
            running.logger.error("Failed to close server", error);
            process.exit(1);
          }
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
