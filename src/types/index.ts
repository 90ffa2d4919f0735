export type { HandlerResult, HTTPErrorOptions, LFSErrorResponse, LFSRequest, LogOutcome, ResponseBody } from "./http.js";
export type {
  LFSBatchRequest,
  LFSBatchResponse,
  LFSDownloadLinks,
  LFSLink,
  LFSObjectMetadata,
  LFSObjectRequest,
  LFSObjectResponse,
  LFSOperation,
  LFSUploadLinks,
} from "./lfs.js";
