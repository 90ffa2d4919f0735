import { describe, expect, it } from "vitest";
import {
  batchObjectPresent,
  batchObjectSizeError,
  batchObjectUpload,
  batchResponse,
  downloadLinks,
  objectMetadata,
  parseBatchRequest,
  parseObjectRequest,
  uploadLinks,
} from "../../src/lib/codec.js";

const VALID_OID = "a".repeat(64);
const VALID_OID_2 = "b".repeat(64);
const HREF = "https://lfs.example.com/objects/aa";

describe("parseBatchRequest", () => {
  it("parses an upload request", () => {
    const body = JSON.stringify({
      operation: "upload",
      objects: [
        { oid: VALID_OID, size: 10 },
        { oid: VALID_OID_2, size: 0 },
      ],
    });
    expect(parseBatchRequest(body)).toEqual({
      operation: "upload",
      objects: [
        { oid: VALID_OID, size: 10 },
        { oid: VALID_OID_2, size: 0 },
      ],
    });
  });

  it("accepts an empty object list", () => {
    expect(parseBatchRequest(JSON.stringify({ operation: "download", objects: [] }))).toEqual({
      operation: "download",
      objects: [],
    });
  });

  it("ignores unknown fields", () => {
    const body = JSON.stringify({
      operation: "upload",
      transfers: ["basic"],
      extra: true,
      objects: [{ oid: VALID_OID, size: 1, authenticated: true }],
    });
    expect(parseBatchRequest(body)).toEqual({
      operation: "upload",
      objects: [{ oid: VALID_OID, size: 1 }],
    });
  });

  const offTypeOptionals: Array<[string, Record<string, unknown>]> = [
    ["ref null", { ref: null }],
    ["ref as a string", { ref: "refs/heads/main" }],
    ["transfers with a number", { transfers: ["basic", 1] }],
    ["hash_algo null", { hash_algo: null }],
  ];

  it.each(offTypeOptionals)("accepts a batch with %s", (_, optional) => {
    const body = JSON.stringify({ operation: "upload", objects: [{ oid: VALID_OID, size: 1 }], ...optional });
    expect(parseBatchRequest(body)).toEqual({
      operation: "upload",
      objects: [{ oid: VALID_OID, size: 1 }],
    });
  });

  it.each([
    ["malformed JSON", "{"],
    ["non-object body", "[]"],
    ["null body", "null"],
    ["missing operation", JSON.stringify({ objects: [] })],
    ["unknown operation", JSON.stringify({ operation: "delete", objects: [] })],
    ["mixed-case operation", JSON.stringify({ operation: "Upload", objects: [] })],
    ["objects not a list", JSON.stringify({ operation: "upload", objects: {} })],
    ["missing objects", JSON.stringify({ operation: "upload" })],
    [
      "one invalid OID among valid ones",
      JSON.stringify({
        operation: "upload",
        objects: [
          { oid: VALID_OID, size: 1 },
          { oid: "xyz", size: 1 },
        ],
      }),
    ],
    ["string size", JSON.stringify({ operation: "upload", objects: [{ oid: VALID_OID, size: "10" }] })],
    ["fractional size", JSON.stringify({ operation: "upload", objects: [{ oid: VALID_OID, size: 1.5 }] })],
    ["negative size", JSON.stringify({ operation: "upload", objects: [{ oid: VALID_OID, size: -1 }] })],
    ["missing size", JSON.stringify({ operation: "upload", objects: [{ oid: VALID_OID }] })],
    ["non-object entry", JSON.stringify({ operation: "upload", objects: [VALID_OID] })],
  ])("rejects %s", (_, body) => {
    expect(parseBatchRequest(body)).toBeNull();
  });
});

describe("parseObjectRequest", () => {
  it("parses oid and size", () => {
    expect(parseObjectRequest(JSON.stringify({ oid: VALID_OID, size: 123 }))).toEqual({ oid: VALID_OID, size: 123 });
  });

  it.each([
    ["empty body", ""],
    ["uppercase OID", JSON.stringify({ oid: VALID_OID.toUpperCase(), size: 1 })],
    ["missing oid", JSON.stringify({ size: 1 })],
    ["null size", JSON.stringify({ oid: VALID_OID, size: null })],
  ])("rejects %s", (_, body) => {
    expect(parseObjectRequest(body)).toBeNull();
  });
});

describe("response bodies", () => {
  it("builds object metadata", () => {
    expect(objectMetadata(VALID_OID, 5, "https://h/objects/x", "https://h/data/objects/x")).toEqual({
      oid: VALID_OID,
      size: 5,
      _links: {
        self: { href: "https://h/objects/x" },
        download: { href: "https://h/data/objects/x" },
      },
    });
  });

  it("builds download links", () => {
    expect(downloadLinks(HREF)).toEqual({ _links: { download: { href: HREF } } });
  });

  it("builds upload and verify links with the same href", () => {
    expect(uploadLinks(HREF)).toEqual({ _links: { upload: { href: HREF }, verify: { href: HREF } } });
  });

  it("builds the three batch item shapes", () => {
    expect(batchObjectPresent(VALID_OID, 10)).toEqual({ oid: VALID_OID, size: 10 });
    expect(batchObjectUpload(VALID_OID, 5, HREF)).toEqual({
      oid: VALID_OID,
      size: 5,
      actions: { upload: { href: HREF }, verify: { href: HREF } },
    });
    expect(batchObjectSizeError(VALID_OID, 10)).toEqual({
      oid: VALID_OID,
      size: 10,
      error: { code: 422, message: "Wrong object size" },
    });
  });

  it("wraps batch items in a basic transfer envelope", () => {
    expect(batchResponse([])).toEqual({ transfer: "basic", objects: [] });
  });
});
