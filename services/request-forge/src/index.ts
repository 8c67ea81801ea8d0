export { buildRequest, type BuildRequestOptions, type RequestStep } from "./builder/buildRequest.js";
export { RequestBuilder } from "./builder/requestBuilder.js";
export { createDraft } from "./builder/draft.js";
export { resolveBody, type BodyResolutionDeps } from "./resolution/bodyResolution.js";
export { assembleRequest, requestURI } from "./resolution/assembler.js";
export { encodeQuery, decodeQuery, percentEncode } from "./encoding/queryString.js";
export { encodeMultipart } from "./encoding/multipart.js";
export { newBoundary, cryptoRandomSource, BOUNDARY_PREFIX } from "./encoding/boundary.js";
export { extensionMimeTypes, DEFAULT_MIME_TYPE } from "./encoding/mimeTypes.js";
export { RequestHeaders, type ReadonlyHeaders } from "./http/headers.js";
export { renderRequest, getBody } from "./http/renderRequest.js";
export { toInjectOptions, injectRequest } from "./adapters/fastifyInject.js";
export { loadEnv, type EnvConfig, type LogLevel } from "./config/env.js";
export { createLogger, type Logger } from "./logging/logger.js";
export { RequestForgeError, RandomSourceError, UnsupportedMethodError, ConfigError } from "./errors.js";
export type { MimeTypeResolver, RandomSource } from "./types/interfaces.js";
export {
  METHODS,
  FORM_URLENCODED,
  MULTIPART_FORM_DATA,
  type BodyEncoding,
  type Draft,
  type FileParams,
  type FileUpload,
  type FileUploadInput,
  type ForgedRequest,
  type Method,
  type Params,
  type RequestDefaults,
  type ResolvedBody
} from "./types/request.js";
