import type { HTTPErrorOptions, LFSErrorResponse } from "../types/index.js";

export const LFS_CONTENT_TYPE = "application/vnd.git-lfs+json";

export class HTTPError extends Error {
  readonly status: number;

  constructor(options: HTTPErrorOptions) {
    super(options.message);
    this.name = "HTTPError";
    this.status = options.status;
  }
}

export class LFSError extends HTTPError {
  constructor(status: number, message: string) {
    super({ status, message });
    this.name = "LFSError";
  }

  toLFSResponse(): Response {
    return new Response(JSON.stringify(this.toJSON()), {
      status: this.status,
      headers: { "Content-Type": LFS_CONTENT_TYPE },
    });
  }

  toJSON(): LFSErrorResponse {
    return { message: this.message };
  }
}

/** An upload whose length or digest disagrees with what the client declared. */
export class VerificationError extends LFSError {
  constructor(message: string) {
    super(400, message);
    this.name = "VerificationError";
  }

  static incomplete(oid: string): VerificationError {
    return new VerificationError(`Incomplete upload of ${oid}`);
  }

  static digestMismatch(oid: string): VerificationError {
    return new VerificationError(`Content doesn't match SHA-256 digest: ${oid}`);
  }
}
