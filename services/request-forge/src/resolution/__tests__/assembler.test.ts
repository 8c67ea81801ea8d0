import { describe, expect, it } from "vitest";
import { createDraft } from "../../builder/draft.js";
import { RequestHeaders } from "../../http/headers.js";
import type { Draft, RequestDefaults, ResolvedBody } from "../../types/request.js";
import { assembleRequest, requestURI } from "../assembler.js";

const defaults: RequestDefaults = {
  serverName: "localhost",
  serverPort: 80,
  remoteAddr: "127.0.0.1",
  remotePort: 80,
  localAddr: "127.0.0.1",
  localPort: 80,
  localHostname: "localhost"
};

const noBody: ResolvedBody = { body: Buffer.alloc(0), contentLength: null, boundary: null, encoding: "empty" };

function draftWith(overrides: Partial<Draft>): Draft {
  return { ...createDraft(), ...overrides };
}

describe("requestURI", () => {
  it("appends the query string to a GET with params", () => {
    const draft = draftWith({ uri: "/posts", params: new Map([["ordered", ["1"]], ["q", ["a b"]]]) });
    expect(requestURI(draft)).toBe("/posts?ordered=1&q=a%20b");
  });

  it("leaves the URI alone for a GET without params", () => {
    expect(requestURI(draftWith({ uri: "/posts" }))).toBe("/posts");
  });

  it("leaves the URI alone for other methods", () => {
    expect(requestURI(draftWith({ method: "POST", uri: "/posts", params: new Map([["a", ["1"]]]) }))).toBe("/posts");
  });
});

describe("assembleRequest", () => {
  it("exposes the query string for GET only", () => {
    const params = new Map([["a", ["1"]]]);
    expect(assembleRequest(draftWith({ params }), noBody, defaults).queryString).toBe("a=1");
    expect(assembleRequest(draftWith({ method: "DELETE", params }), noBody, defaults).queryString).toBe("");
  });

  it("adds the boundary to Content-Type for multipart drafts", () => {
    const draft = draftWith({
      method: "POST",
      contentType: "multipart/form-data",
      headers: new RequestHeaders([["Content-Type", "multipart/form-data"]])
    });
    const resolved: ResolvedBody = { body: Buffer.from("--b--"), contentLength: 5, boundary: "b", encoding: "multipart" };

    const request = assembleRequest(draft, resolved, defaults);
    expect(request.headers.get("content-type")).toBe("multipart/form-data; boundary=b");
    // The draft's own headers are not touched.
    expect(draft.headers.get("content-type")).toBe("multipart/form-data");
  });

  it("keeps headers as they are when the tag is not multipart", () => {
    const draft = draftWith({ headers: new RequestHeaders([["Content-Type", "text/csv"]]), contentType: "text/csv" });
    const resolved: ResolvedBody = { ...noBody, boundary: "b" };

    expect(assembleRequest(draft, resolved, defaults).headers.entries()).toEqual([["Content-Type", "text/csv"]]);
  });

  it("fills the fixed fields and freezes the result", () => {
    const draft = draftWith({ isSecure: true, uri: "/x", params: new Map([["k", ["v2", "v1"]]]) });
    const request = assembleRequest(draft, noBody, { ...defaults, serverName: "example.test" });

    expect(request).toMatchObject({
      serverName: "example.test",
      serverPort: 80,
      remoteAddr: "127.0.0.1",
      localHostname: "localhost",
      isSecure: true,
      method: "GET",
      version: [1, 1],
      cookies: [],
      contextPath: "",
      pathInfo: "",
      uri: "/x?k=v2&k=v1",
      contentLength: null
    });
    expect(request.params.get("k")).toEqual(["v2", "v1"]);
    expect(Object.isFrozen(request)).toBe(true);
  });

  it("hands out headers and params that cannot be changed afterwards", () => {
    const draft = draftWith({ headers: new RequestHeaders([["X-Trace", "a"]]), params: new Map([["k", ["1"]]]) });
    const request = assembleRequest(draft, noBody, defaults);

    expect("set" in request.headers).toBe(false);
    expect("set" in request.params).toBe(false);
    expect(Object.isFrozen(request.headers)).toBe(true);
    expect(Object.isFrozen(request.params)).toBe(true);
    expect(Object.isFrozen(request.params.get("k"))).toBe(true);

    draft.headers.set("X-Trace", "b");
    draft.params.get("k")?.push("2");
    draft.params.set("extra", ["x"]);
    expect(request.headers.get("x-trace")).toBe("a");
    expect([...request.params]).toEqual([["k", ["1"]]]);
    expect(request.params.size).toBe(1);
  });
});
