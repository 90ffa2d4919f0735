import { randomUUID } from "node:crypto";
import { createWriteStream, type WriteStream } from "node:fs";
import { type FileHandle, mkdir, open, rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { Transform, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createDigest, type IncrementalDigest } from "../lib/digest.js";
import { VerificationError } from "../lib/errors.js";

export const STORE_DIRNAME = ".lfs";
const OBJECTS_DIRNAME = "objects";
const TEMP_DIRNAME = "temp";

export type ObjectExistsResult = { exists: true; size: number } | { exists: false };

export type OpenObjectResult = { found: true; size: number; handle: FileHandle } | { found: false };

export type WriteResult = { ok: true; created: boolean } | { ok: false; error: VerificationError };

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/** Creates `<root>/.lfs` with its `objects` and `temp` directories. */
export async function initStore(root: string): Promise<string> {
  const storeDir = join(root, STORE_DIRNAME);
  await mkdir(join(storeDir, OBJECTS_DIRNAME), { recursive: true });
  await mkdir(join(storeDir, TEMP_DIRNAME), { recursive: true });
  return storeDir;
}

function shardDir(storeDir: string, oid: string): string {
  return join(storeDir, OBJECTS_DIRNAME, oid.slice(0, 2), oid.slice(2, 4));
}

export function objectPath(storeDir: string, oid: string): string {
  return join(shardDir(storeDir, oid), oid);
}

/** Every upload attempt stages into its own file, so concurrent uploads of one OID never share bytes. */
export function tempPath(storeDir: string, oid: string): string {
  return join(storeDir, TEMP_DIRNAME, `${oid}.${randomUUID()}`);
}

export async function objectExists(storeDir: string, oid: string): Promise<ObjectExistsResult> {
  try {
    const stats = await stat(objectPath(storeDir, oid));
    return { exists: true, size: stats.size };
  } catch (error) {
    if (isMissingFileError(error)) return { exists: false };
    throw error;
  }
}

/**
 * Opens a published object for reading. The caller owns the handle: either
 * stream it or close it.
 */
export async function openObject(storeDir: string, oid: string): Promise<OpenObjectResult> {
  let handle: FileHandle;
  try {
    handle = await open(objectPath(storeDir, oid), "r");
  } catch (error) {
    if (isMissingFileError(error)) return { found: false };
    throw error;
  }

  try {
    const stats = await handle.stat();
    return { found: true, size: stats.size, handle };
  } catch (error) {
    await handle.close();
    throw error;
  }
}

function whenClosed(stream: WriteStream): Promise<void> {
  if (stream.closed) return Promise.resolve();
  return new Promise((resolve) => stream.once("close", () => resolve()));
}

class DigestTransform extends Transform {
  bytesWritten = 0;
  private readonly digest: IncrementalDigest;

  constructor(digest: IncrementalDigest) {
    super();
    this.digest = digest;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.digest.feed(chunk);
    this.bytesWritten += chunk.length;
    callback(null, chunk);
  }
}

/**
 * Streams `source` into a staging file while hashing it, then publishes it
 * with a single rename once both the byte count and the digest match.
 */
export async function writeVerifiedObject(
  storeDir: string,
  oid: string,
  declaredSize: number,
  source: AsyncIterable<Uint8Array>
): Promise<WriteResult> {
  const existing = await objectExists(storeDir, oid);
  if (existing.exists) {
    return { ok: true, created: false };
  }

  await mkdir(shardDir(storeDir, oid), { recursive: true });

  const staging = tempPath(storeDir, oid);
  const digest = createDigest();
  const counter = new DigestTransform(digest);
  const sink = createWriteStream(staging, { flags: "wx" });

  try {
    await pipeline(source, counter, sink);
  } catch (error) {
    await whenClosed(sink);
    await rm(staging, { force: true });
    throw error;
  }

  let failure: VerificationError | null = null;
  if (counter.bytesWritten !== declaredSize) {
    failure = VerificationError.incomplete(oid);
  } else if (digest.finalize() !== oid) {
    failure = VerificationError.digestMismatch(oid);
  }

  if (failure) {
    await rm(staging, { force: true });
    return { ok: false, error: failure };
  }

  try {
    await rename(staging, objectPath(storeDir, oid));
  } catch (error) {
    await rm(staging, { force: true });
    throw error;
  }

  return { ok: true, created: true };
}
