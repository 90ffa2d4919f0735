export type { Authenticator, BasicCredentials } from "./auth.js";
export { allowAll, createBasicAuthenticator, loadCredentials, parseBasicAuth, parseCredentials } from "./auth.js";
export type { LFSContext } from "./lfs.js";
export {
  handleBatch,
  handleDownload,
  handleLegacyRequest,
  handleMetadata,
  handleUpload,
  handleVerify,
  processBatchRequest,
  processUploadObject,
} from "./lfs.js";
export type { ObjectExistsResult, OpenObjectResult, WriteResult } from "./store.js";
export {
  initStore,
  objectExists,
  objectPath,
  openObject,
  STORE_DIRNAME,
  tempPath,
  writeVerifiedObject,
} from "./store.js";
