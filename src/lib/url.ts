import { normalizeBasePath } from "./routes.js";

export interface UrlRewriterOptions {
  tls: boolean;
  port: number;
}

export type UrlRewriter = (url: URL) => URL;

const DEFAULT_PORTS = { http: 80, https: 443 } as const;

export const identityRewriter: UrlRewriter = (url) => url;

/**
 * Links handed back to clients must carry the scheme and port the server
 * actually listens on, not whatever a proxy put into the Host header.
 */
export function createUrlRewriter(options: UrlRewriterOptions): UrlRewriter {
  const scheme = options.tls ? "https" : "http";
  const port = options.port === DEFAULT_PORTS[scheme] ? "" : String(options.port);

  return (url) => {
    const rewritten = new URL(url.href);
    rewritten.protocol = `${scheme}:`;
    rewritten.port = port;
    return rewritten;
  };
}

function withPath(base: URL, path: string): string {
  const url = new URL(base.href);
  url.pathname = path;
  url.search = "";
  url.hash = "";
  return url.toString();
}

export function objectUrl(base: URL, basePath: string, oid: string): string {
  return withPath(base, `${normalizeBasePath(basePath)}/objects/${oid}`);
}

export function downloadUrl(base: URL, basePath: string, oid: string): string {
  return withPath(base, `${normalizeBasePath(basePath)}/data/objects/${oid}`);
}
