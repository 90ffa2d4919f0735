import { timingSafeEqual } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { LFSRequest } from "../types/index.js";

export interface BasicCredentials {
  username: string;
  password: string;
}

export type Authenticator = (request: LFSRequest) => boolean | Promise<boolean>;

export function parseBasicAuth(header: string | null): BasicCredentials | null {
  if (!header) return null;

  if (!header.toLowerCase().startsWith("basic ")) return null;

  const encoded = header.slice(6).trim();
  if (!encoded || !/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) return null;

  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const colonIndex = decoded.indexOf(":");
  if (colonIndex === -1) return null;

  return {
    username: decoded.slice(0, colonIndex),
    password: decoded.slice(colonIndex + 1),
  };
}

export const allowAll: Authenticator = () => true;

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function createBasicAuthenticator(credentials: ReadonlyMap<string, string>): Authenticator {
  return (request) => {
    const parsed = parseBasicAuth(request.headers.get("Authorization"));
    if (!parsed) return false;

    const expected = credentials.get(parsed.username);
    if (expected === undefined) return false;

    return safeEqual(parsed.password, expected);
  };
}

/** Parses `user:password` lines; blank lines and `#` comments are skipped. */
export function parseCredentials(text: string): Map<string, string> {
  const credentials = new Map<string, string>();

  const lines = text.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;

    const colonIndex = line.indexOf(":");
    if (colonIndex <= 0) {
      throw new Error(`Malformed credentials on line ${index + 1}`);
    }
    credentials.set(line.slice(0, colonIndex), line.slice(colonIndex + 1));
  }

  return credentials;
}

export async function loadCredentials(file: string): Promise<Map<string, string>> {
  return parseCredentials(await readFile(file, "utf8"));
}
