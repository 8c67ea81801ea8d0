import type { OutgoingHttpHeaders } from "node:http";
import type { FastifyInstance, InjectOptions, LightMyRequestResponse } from "fastify";
import { buildRequest, type BuildRequestOptions, type RequestStep } from "../builder/buildRequest.js";
import { UnsupportedMethodError } from "../errors.js";
import type { ForgedRequest, Method } from "../types/request.js";

const INJECTABLE_METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE", "OPTIONS", "PATCH"] as const;

type InjectableMethod = (typeof INJECTABLE_METHODS)[number];

function isInjectable(method: Method): method is InjectableMethod {
  return (INJECTABLE_METHODS as readonly string[]).includes(method);
}

export function toInjectOptions(request: ForgedRequest): InjectOptions {
  const { method } = request;
  if (!isInjectable(method)) {
    throw new UnsupportedMethodError(method);
  }

  const headers: OutgoingHttpHeaders = {};
  for (const [key, value] of Object.entries(request.headers.toRecord())) {
    headers[key] = value;
  }
  if (request.contentLength !== null && !request.headers.has("content-length")) {
    headers["content-length"] = String(request.contentLength);
  }

  const options: InjectOptions = {
    method,
    url: request.uri,
    headers,
    remoteAddress: request.remoteAddr
  };
  if (request.body.length > 0) {
    options.payload = request.body;
  }
  return options;
}

/** Builds a request and hands it to `app.inject`; the response is returned untouched. */
export async function injectRequest(
  app: FastifyInstance,
  configure: RequestStep | RequestStep[],
  options?: BuildRequestOptions
): Promise<LightMyRequestResponse> {
  const request = buildRequest(configure, options);
  return app.inject(toInjectOptions(request));
}
