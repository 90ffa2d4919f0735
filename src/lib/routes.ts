import { isValidOID } from "./validation.js";

export type Route =
  | { kind: "batch" }
  | { kind: "default"; oid: string }
  | { kind: "download"; oid: string }
  | { kind: "post" }
  | { kind: "wrong-path" };

const WRONG_PATH: Route = { kind: "wrong-path" };

export function normalizeBasePath(basePath: string): string {
  const trimmed = basePath.replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function stripBasePath(path: string, basePath: string): string | null {
  const base = normalizeBasePath(basePath);
  if (base === "") return path;
  if (path === base) return "";
  return path.startsWith(`${base}/`) ? path.slice(base.length) : null;
}

/**
 * Maps a request path onto an LFS operation. Never touches storage; method
 * applicability is decided by the handlers.
 */
export function classifyRoute(path: string, basePath = ""): Route {
  const relative = stripBasePath(path, basePath);
  if (relative === null) return WRONG_PATH;

  const slash = relative.lastIndexOf("/");
  if (slash === -1) return WRONG_PATH;

  const head = relative.slice(0, slash);
  const tail = relative.slice(slash + 1);

  if (head === "/objects") {
    if (tail === "batch") return { kind: "batch" };
    return isValidOID(tail) ? { kind: "default", oid: tail } : WRONG_PATH;
  }

  if (head === "/data/objects") {
    return isValidOID(tail) ? { kind: "download", oid: tail } : WRONG_PATH;
  }

  if (head === "" && tail === "objects") {
    return { kind: "post" };
  }

  return WRONG_PATH;
}
