export {
  batchObjectPresent,
  batchObjectSizeError,
  batchObjectUpload,
  batchResponse,
  downloadLinks,
  objectMetadata,
  parseBatchRequest,
  parseObjectRequest,
  uploadLinks,
} from "./codec.js";
export type { IncrementalDigest } from "./digest.js";
export { createDigest, sha256Hex } from "./digest.js";
export { HTTPError, LFS_CONTENT_TYPE, LFSError, VerificationError } from "./errors.js";
export type { AccessRecord, ConsoleLoggerOptions, Logger } from "./logger.js";
export { createConsoleLogger, formatAccessLine, formatStatus, logAccess, silentLogger } from "./logger.js";
export type { Route } from "./routes.js";
export { classifyRoute, normalizeBasePath } from "./routes.js";
export type { UrlRewriter, UrlRewriterOptions } from "./url.js";
export { createUrlRewriter, downloadUrl, identityRewriter, objectUrl } from "./url.js";
export { isValidOID, isValidSize, parseDeclaredLength } from "./validation.js";
