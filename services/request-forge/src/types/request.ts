import type { ReadonlyHeaders, RequestHeaders } from "../http/headers.js";

export const METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE", "TRACE", "OPTIONS", "CONNECT", "PATCH"] as const;

export type Method = (typeof METHODS)[number];

export const FORM_URLENCODED = "x-www-form-urlencoded";
export const MULTIPART_FORM_DATA = "multipart/form-data";

/** Name to values, most recently added value first. */
export type Params = Map<string, string[]>;

export interface FileUpload {
  filename: string;
  content: Buffer;
}

export interface FileUploadInput {
  filename: string;
  content: string | Uint8Array;
}

/** One upload under a name is a simple field; two or more are sent as nested multipart/mixed. */
export type FileParams = Map<string, FileUpload[]>;

export interface Draft {
  method: Method;
  params: Params;
  fileParams: FileParams;
  body: Buffer | null;
  headers: RequestHeaders;
  contentType: string;
  isSecure: boolean;
  uri: string;
}

export type BodyEncoding = "urlencoded" | "multipart" | "raw" | "empty";

export interface ResolvedBody {
  body: Buffer;
  // null when no body was set, which is not the same as a zero-length body
  contentLength: number | null;
  boundary: string | null;
  encoding: BodyEncoding;
}

export interface RequestDefaults {
  serverName: string;
  serverPort: number;
  remoteAddr: string;
  remotePort: number;
  localAddr: string;
  localPort: number;
  localHostname: string;
}

export interface ForgedRequest extends Readonly<RequestDefaults> {
  readonly isSecure: boolean;
  readonly headers: ReadonlyHeaders;
  readonly body: Buffer;
  readonly contentLength: number | null;
  readonly method: Method;
  readonly version: readonly [1, 1];
  readonly cookies: readonly [];
  readonly contextPath: string;
  readonly pathInfo: string;
  readonly uri: string;
  readonly queryString: string;
  readonly params: ReadonlyMap<string, readonly string[]>;
}
