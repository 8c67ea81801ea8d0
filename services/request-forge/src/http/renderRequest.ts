import type { ForgedRequest } from "../types/request.js";

/** Serializes the request as it would travel over an HTTP/1.1 connection. */
export function renderRequest(request: ForgedRequest): Buffer {
  const headerLines = [`${request.method} ${request.uri} HTTP/${request.version.join(".")}`];
  if (!request.headers.has("Host")) {
    const port = request.serverPort === 80 ? "" : `:${request.serverPort}`;
    headerLines.push(`Host: ${request.serverName}${port}`);
  }
  for (const [name, value] of request.headers.entries()) {
    headerLines.push(`${name}: ${value}`);
  }
  if (request.contentLength !== null && !request.headers.has("Content-Length")) {
    headerLines.push(`Content-Length: ${request.contentLength}`);
  }
  headerLines.push("", "");
  const header = Buffer.from(headerLines.join("\r\n"));
  return Buffer.concat([header, request.body]);
}

export function getBody(request: ForgedRequest, encoding: BufferEncoding = "utf-8"): string {
  return request.body.toString(encoding);
}
