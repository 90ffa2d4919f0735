import { STATUS_CODES } from "node:http";
import type { LogOutcome } from "../types/index.js";

export interface Logger {
  info: (msg: string) => void;
  error: (msg: string, err?: unknown) => void;
  /** Written regardless of verbosity (startup and shutdown notices). */
  raw: (msg: string) => void;
}

export interface ConsoleLoggerOptions {
  verbose: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  return {
    info(msg) {
      if (options.verbose) console.log(msg);
    },
    error(msg, err) {
      if (err === undefined) {
        console.error(msg);
      } else {
        console.error(msg, err);
      }
    },
    raw(msg) {
      console.log(msg);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  error: () => {},
  raw: () => {},
};

export interface AccessRecord {
  client: string;
  method: string;
  path: string;
  version: string;
  outcome: LogOutcome;
}

export function formatStatus(status: number): string {
  const reason = STATUS_CODES[status];
  return reason ? `${status} ${reason}` : String(status);
}

export function formatAccessLine(record: AccessRecord): string {
  const { client, method, path, version, outcome } = record;
  const line = `${client} "${method} ${path} ${version}" ${formatStatus(outcome.status)}`;
  return outcome.kind === "ok" ? line : `${line} "${outcome.message}"`;
}

export function logAccess(logger: Logger, record: AccessRecord): void {
  const line = formatAccessLine(record);
  if (record.outcome.kind === "ok") {
    logger.info(line);
  } else {
    logger.error(line);
  }
}
