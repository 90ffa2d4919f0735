import { describe, expect, it } from "vitest";
import { ConfigError, resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    expect(resolveConfig(".", {})).toEqual({
      root: ".",
      host: "127.0.0.1",
      port: 8080,
      tls: null,
      credentialsFile: null,
      basePath: "",
      verbose: false,
    });
  });

  it("coerces the port and carries every option", () => {
    const config = resolveConfig("/srv/lfs", {
      host: "0.0.0.0",
      port: "8443",
      cert: "server.crt",
      key: "server.key",
      credentials: "users.txt",
      basePath: "/lfs",
      verbose: true,
    });
    expect(config).toEqual({
      root: "/srv/lfs",
      host: "0.0.0.0",
      port: 8443,
      tls: { cert: "server.crt", key: "server.key" },
      credentialsFile: "users.txt",
      basePath: "/lfs",
      verbose: true,
    });
  });

  it.each([
    ["cert without key", { cert: "server.crt" }],
    ["key without cert", { key: "server.key" }],
    ["non-numeric port", { port: "http" }],
    ["port out of range", { port: "70000" }],
  ])("rejects %s", (_, options) => {
    expect(() => resolveConfig(".", options)).toThrow(ConfigError);
  });

  it("names the offending option", () => {
    expect(() => resolveConfig(".", { port: "0" })).toThrow(/^port: /);
  });
});
