import { FIXED_DEFAULTS, loadEnv, type EnvConfig } from "../config/env.js";
import { cryptoRandomSource } from "../encoding/boundary.js";
import { extensionMimeTypes } from "../encoding/mimeTypes.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { assembleRequest } from "../resolution/assembler.js";
import { resolveBody } from "../resolution/bodyResolution.js";
import type { MimeTypeResolver, RandomSource } from "../types/interfaces.js";
import type { ForgedRequest, RequestDefaults } from "../types/request.js";
import { createDraft } from "./draft.js";
import { RequestBuilder } from "./requestBuilder.js";

export type RequestStep = (builder: RequestBuilder) => void;

export interface BuildRequestOptions {
  random?: RandomSource;
  mimeTypes?: MimeTypeResolver;
  defaults?: Partial<RequestDefaults>;
  logger?: Logger;
}

/**
 * Runs the configuration steps against a fresh draft, then resolves the body
 * and assembles the final request. `configure` may be a single callback or a
 * list of steps applied left to right.
 */
export function buildRequest(configure: RequestStep | RequestStep[], options: BuildRequestOptions = {}): ForgedRequest {
  const draft = createDraft();
  const builder = new RequestBuilder(draft);

  const steps = Array.isArray(configure) ? configure : [configure];
  for (const step of steps) {
    step(builder);
  }

  const env = envFor(options);
  const resolved = resolveBody(draft, {
    random: options.random ?? cryptoRandomSource,
    mimeTypes: options.mimeTypes ?? extensionMimeTypes,
    logger: options.logger ?? createLogger(env.logLevel)
  });

  return assembleRequest(draft, resolved, { ...env.defaults, ...options.defaults });
}

// The environment is only read for what the caller left unset.
function envFor(options: BuildRequestOptions): EnvConfig {
  const defaults: Partial<RequestDefaults> = options.defaults ?? {};
  const needsEnv =
    options.logger === undefined ||
    defaults.serverName === undefined ||
    defaults.serverPort === undefined ||
    defaults.remoteAddr === undefined;
  return needsEnv ? loadEnv() : { logLevel: "silent", defaults: FIXED_DEFAULTS };
}
