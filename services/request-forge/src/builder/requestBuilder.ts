import {
  FORM_URLENCODED,
  MULTIPART_FORM_DATA,
  type Draft,
  type FileUpload,
  type FileUploadInput,
  type Method
} from "../types/request.js";
import { cloneDraft, createDraft, toBuffer, toFileUpload } from "./draft.js";

/**
 * Mutable builder over a single draft. Steps apply in call order and later
 * calls win. Nothing is validated here: a combination the body resolver does
 * not recognise (files on a urlencoded POST, a body on a GET) is accepted and
 * simply has no effect on the resolved body.
 */
export class RequestBuilder {
  constructor(private readonly draft: Draft = createDraft()) {}

  setMethod(method: Method): this {
    this.draft.method = method;
    return this;
  }

  /** Adds a value without replacing earlier ones; the newest value comes first. */
  addParam(name: string, value: string): this {
    const values = this.draft.params.get(name);
    this.draft.params.set(name, values ? [value, ...values] : [value]);
    return this;
  }

  /** Replaces every parameter. A name repeated in `params` keeps its last value. */
  setParams(params: Array<[string, string]>): this {
    this.draft.params = new Map(params.map(([name, value]): [string, string[]] => [name, [value]]));
    return this;
  }

  addFileParam(name: string, file: FileUploadInput): this {
    const files = this.draft.fileParams.get(name);
    const upload = toFileUpload(file);
    this.draft.fileParams.set(name, files ? [upload, ...files] : [upload]);
    return this;
  }

  setFileParams(fileParams: Array<[string, FileUploadInput]>): this {
    this.draft.fileParams = new Map(fileParams.map(([name, file]): [string, FileUpload[]] => [name, [toFileUpload(file)]]));
    return this;
  }

  /** Only sent when the request resolves as a PUT. */
  setRequestBody(body: string | Uint8Array): this {
    this.draft.body = toBuffer(body);
    return this;
  }

  setHeader(name: string, value: string): this {
    this.draft.headers.set(name, value);
    return this;
  }

  addHeader(name: string, value: string): this {
    this.draft.headers.add(name, value);
    return this;
  }

  setContentType(contentType: string): this {
    this.draft.headers.set("Content-Type", contentType);
    this.draft.contentType = contentType;
    return this;
  }

  formUrlEncoded(): this {
    return this.setContentType(FORM_URLENCODED);
  }

  // The boundary parameter is appended to the header once the body is built.
  multipartEncoded(): this {
    return this.setContentType(MULTIPART_FORM_DATA);
  }

  useHttps(): this {
    this.draft.isSecure = true;
    return this;
  }

  setURI(uri: string): this {
    this.draft.uri = uri;
    return this;
  }

  get(uri: string, params: Array<[string, string]>): this {
    return this.formUrlEncoded().setMethod("GET").setURI(uri).setParams(params);
  }

  postUrlEncoded(uri: string, params: Array<[string, string]>): this {
    return this.formUrlEncoded().setMethod("POST").setURI(uri).setParams(params);
  }

  postMultipart(uri: string, params: Array<[string, string]>, fileParams: Array<[string, FileUploadInput]>): this {
    return this.multipartEncoded().setMethod("POST").setURI(uri).setParams(params).setFileParams(fileParams);
  }

  put(uri: string, body: string | Uint8Array): this {
    return this.setMethod("PUT").setURI(uri).setRequestBody(body);
  }

  snapshot(): Draft {
    return cloneDraft(this.draft);
  }
}
