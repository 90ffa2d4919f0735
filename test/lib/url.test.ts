import { describe, expect, it } from "vitest";
import { createUrlRewriter, downloadUrl, identityRewriter, objectUrl } from "../../src/lib/url.js";

const OID = "d".repeat(64);

describe("createUrlRewriter", () => {
  it.each([
    [{ tls: false, port: 8080 }, "http://example.com:8080/objects"],
    [{ tls: false, port: 80 }, "http://example.com/objects"],
    [{ tls: true, port: 443 }, "https://example.com/objects"],
    [{ tls: true, port: 8443 }, "https://example.com:8443/objects"],
  ])("rewrites with %o", (options, expected) => {
    const rewrite = createUrlRewriter(options);
    expect(rewrite(new URL("http://example.com:1234/objects")).toString()).toBe(expected);
  });

  it("keeps the query string", () => {
    const rewrite = createUrlRewriter({ tls: true, port: 443 });
    expect(rewrite(new URL("http://example.com/objects?x=1")).toString()).toBe("https://example.com/objects?x=1");
  });

  it("does not mutate its input", () => {
    const input = new URL("http://example.com:1234/objects");
    createUrlRewriter({ tls: true, port: 443 })(input);
    expect(input.toString()).toBe("http://example.com:1234/objects");
  });
});

describe("identityRewriter", () => {
  it("returns the same URL", () => {
    const url = new URL("http://example.com/");
    expect(identityRewriter(url)).toBe(url);
  });
});

describe("object links", () => {
  const base = new URL(`https://lfs.example.com:8443/objects/${OID}?ignored=1#frag`);

  it("builds the upload/verify href", () => {
    expect(objectUrl(base, "", OID)).toBe(`https://lfs.example.com:8443/objects/${OID}`);
  });

  it("builds the download href", () => {
    expect(downloadUrl(base, "", OID)).toBe(`https://lfs.example.com:8443/data/objects/${OID}`);
  });

  it("prefixes the base path", () => {
    expect(downloadUrl(base, "/repo/info/lfs/", OID)).toBe(`https://lfs.example.com:8443/repo/info/lfs/data/objects/${OID}`);
  });
});
