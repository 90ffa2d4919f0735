import { createHash } from "node:crypto";

export interface IncrementalDigest {
  feed(chunk: Uint8Array): void;
  finalize(): string;
}

export function createDigest(): IncrementalDigest {
  const hash = createHash("sha256");
  return {
    feed(chunk) {
      hash.update(chunk);
    },
    finalize() {
      return hash.digest("hex");
    },
  };
}

export function sha256Hex(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}
