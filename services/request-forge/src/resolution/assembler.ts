import { encodeQuery } from "../encoding/queryString.js";
import { MULTIPART_FORM_DATA, type Draft, type ForgedRequest, type Params, type RequestDefaults, type ResolvedBody } from "../types/request.js";

export function requestURI(draft: Draft): string {
  if (draft.method === "GET" && draft.params.size > 0) {
    return `${draft.uri}?${encodeQuery(draft.params)}`;
  }
  return draft.uri;
}

export function assembleRequest(draft: Draft, resolved: ResolvedBody, defaults: RequestDefaults): ForgedRequest {
  const headers = draft.headers.clone();
  if (resolved.boundary !== null && draft.contentType === MULTIPART_FORM_DATA) {
    headers.set("Content-Type", `${MULTIPART_FORM_DATA}; boundary=${resolved.boundary}`);
  }

  return Object.freeze({
    ...defaults,
    isSecure: draft.isSecure,
    headers: headers.readonlyView(),
    body: resolved.body,
    contentLength: resolved.contentLength,
    method: draft.method,
    version: [1, 1] as const,
    cookies: [] as const,
    contextPath: "",
    pathInfo: "",
    uri: requestURI(draft),
    queryString: draft.method === "GET" ? encodeQuery(draft.params) : "",
    params: readonlyParams(draft.params)
  });
}

function readonlyParams(params: Params): ReadonlyMap<string, readonly string[]> {
  const copy = new Map<string, readonly string[]>();
  for (const [name, values] of params) {
    copy.set(name, Object.freeze([...values]));
  }
  const view: ReadonlyMap<string, readonly string[]> = {
    get size() {
      return copy.size;
    },
    get: (name) => copy.get(name),
    has: (name) => copy.has(name),
    forEach: (callbackfn, thisArg?: unknown) => copy.forEach((values, name) => callbackfn.call(thisArg, values, name, view)),
    entries: () => copy.entries(),
    keys: () => copy.keys(),
    values: () => copy.values(),
    [Symbol.iterator]: () => copy[Symbol.iterator]()
  };
  return Object.freeze(view);
}
