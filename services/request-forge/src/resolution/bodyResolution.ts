import { newBoundary } from "../encoding/boundary.js";
import { encodeMultipart } from "../encoding/multipart.js";
import { encodeQuery } from "../encoding/queryString.js";
import type { Logger } from "../logging/logger.js";
import type { MimeTypeResolver, RandomSource } from "../types/interfaces.js";
import { FORM_URLENCODED, MULTIPART_FORM_DATA, type Draft, type ResolvedBody } from "../types/request.js";

export interface BodyResolutionDeps {
  random: RandomSource;
  mimeTypes: MimeTypeResolver;
  logger: Logger;
}

/**
 * Picks the body encoding from the method and content-type tag. The first
 * matching branch wins:
 *
 * 1. POST + x-www-form-urlencoded: params as a query string
 * 2. POST + multipart/form-data: params and files as multipart
 * 3. PUT: the raw body, if one was set
 * 4. anything else: no body
 *
 * Params and files on other combinations are dropped here. GET params still
 * reach the request through the URI, which the assembler handles.
 */
export function resolveBody(draft: Draft, deps: BodyResolutionDeps): ResolvedBody {
  const resolved = selectBody(draft, deps);
  deps.logger.debug(
    { method: draft.method, uri: draft.uri, contentType: draft.contentType, encoding: resolved.encoding, contentLength: resolved.contentLength },
    "Resolved request body"
  );
  return resolved;
}

function selectBody(draft: Draft, deps: BodyResolutionDeps): ResolvedBody {
  if (draft.method === "POST" && draft.contentType === FORM_URLENCODED) {
    const body = Buffer.from(encodeQuery(draft.params), "utf-8");
    return { body, contentLength: body.length, boundary: null, encoding: "urlencoded" };
  }

  if (draft.method === "POST" && draft.contentType === MULTIPART_FORM_DATA) {
    const boundary = newBoundary(deps.random);
    // Generated even when no field holds several files.
    const fileBoundary = newBoundary(deps.random);
    const body = encodeMultipart(boundary, fileBoundary, draft.params, draft.fileParams, deps.mimeTypes);
    return { body, contentLength: body.length, boundary, encoding: "multipart" };
  }

  if (draft.method === "PUT") {
    if (draft.body === null) {
      return { body: Buffer.alloc(0), contentLength: null, boundary: null, encoding: "raw" };
    }
    return { body: Buffer.from(draft.body), contentLength: draft.body.length, boundary: null, encoding: "raw" };
  }

  return { body: Buffer.alloc(0), contentLength: null, boundary: null, encoding: "empty" };
}
