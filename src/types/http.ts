export interface HTTPErrorOptions {
  status: number;
  message: string;
}

export interface LFSErrorResponse {
  message: string;
}

export type LogOutcome = { kind: "ok"; status: number } | { kind: "error"; status: number; message: string };

export type ResponseBody = string | ReadableStream<Uint8Array> | null;

export interface HandlerResult {
  status: number;
  headers: Record<string, string>;
  body: ResponseBody;
  log: LogOutcome;
}

export interface LFSRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
}
