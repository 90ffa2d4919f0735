export type LFSOperation = "upload" | "download";

export interface LFSObjectRequest {
  oid: string;
  size: number;
}

export interface LFSBatchRequest {
  operation: LFSOperation;
  objects: LFSObjectRequest[];
}

export interface LFSLink {
  href: string;
}

export interface LFSObjectResponse {
  oid: string;
  size: number;
  actions?: {
    upload?: LFSLink;
    download?: LFSLink;
    verify?: LFSLink;
  };
  error?: {
    code: number;
    message: string;
  };
}

export interface LFSBatchResponse {
  transfer: "basic";
  objects: LFSObjectResponse[];
}

export interface LFSObjectMetadata {
  oid: string;
  size: number;
  _links: {
    self: LFSLink;
    download: LFSLink;
  };
}

export interface LFSDownloadLinks {
  _links: {
    download: LFSLink;
  };
}

export interface LFSUploadLinks {
  _links: {
    upload: LFSLink;
    verify: LFSLink;
  };
}
