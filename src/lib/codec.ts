import { z } from "zod";
import type {
  LFSBatchRequest,
  LFSBatchResponse,
  LFSDownloadLinks,
  LFSObjectMetadata,
  LFSObjectRequest,
  LFSObjectResponse,
  LFSUploadLinks,
} from "../types/index.js";
import { isValidOID, isValidSize } from "./validation.js";

const ObjectRequestSchema = z.object({
  oid: z.string().refine(isValidOID, "Invalid OID format"),
  size: z.number().refine(isValidSize, "Invalid size"),
});

const BatchRequestSchema = z.object({
  operation: z.enum(["download", "upload"]),
  objects: z.array(ObjectRequestSchema),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Any invalid object entry rejects the whole request. */
export function parseBatchRequest(text: string): LFSBatchRequest | null {
  const result = BatchRequestSchema.safeParse(parseJson(text));
  return result.success ? result.data : null;
}

export function parseObjectRequest(text: string): LFSObjectRequest | null {
  const result = ObjectRequestSchema.safeParse(parseJson(text));
  return result.success ? result.data : null;
}

export function objectMetadata(oid: string, size: number, selfUrl: string, downloadUrl: string): LFSObjectMetadata {
  return {
    oid,
    size,
    _links: {
      self: { href: selfUrl },
      download: { href: downloadUrl },
    },
  };
}

export function downloadLinks(url: string): LFSDownloadLinks {
  return { _links: { download: { href: url } } };
}

export function uploadLinks(url: string): LFSUploadLinks {
  return {
    _links: {
      upload: { href: url },
      verify: { href: url },
    },
  };
}

export function batchObjectPresent(oid: string, size: number): LFSObjectResponse {
  return { oid, size };
}

export function batchObjectUpload(oid: string, size: number, url: string): LFSObjectResponse {
  return {
    oid,
    size,
    actions: {
      upload: { href: url },
      verify: { href: url },
    },
  };
}

export function batchObjectSizeError(oid: string, size: number): LFSObjectResponse {
  return {
    oid,
    size,
    error: { code: 422, message: "Wrong object size" },
  };
}

export function batchResponse(objects: LFSObjectResponse[]): LFSBatchResponse {
  return { transfer: "basic", objects };
}
