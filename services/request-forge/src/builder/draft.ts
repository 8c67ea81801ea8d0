import { RequestHeaders } from "../http/headers.js";
import { FORM_URLENCODED, type Draft, type FileUpload, type FileUploadInput } from "../types/request.js";

export function createDraft(): Draft {
  return {
    method: "GET",
    params: new Map(),
    fileParams: new Map(),
    body: null,
    headers: new RequestHeaders(),
    contentType: FORM_URLENCODED,
    isSecure: false,
    uri: ""
  };
}

export function cloneDraft(draft: Draft): Draft {
  return {
    ...draft,
    params: new Map([...draft.params].map(([name, values]): [string, string[]] => [name, [...values]])),
    fileParams: new Map(
      [...draft.fileParams].map(([name, files]): [string, FileUpload[]] => [
        name,
        files.map((file) => ({ filename: file.filename, content: Buffer.from(file.content) }))
      ])
    ),
    body: draft.body === null ? null : Buffer.from(draft.body),
    headers: draft.headers.clone()
  };
}

export function toBuffer(content: string | Uint8Array): Buffer {
  return typeof content === "string" ? Buffer.from(content, "utf-8") : Buffer.from(content);
}

export function toFileUpload(file: FileUploadInput): FileUpload {
  return { filename: file.filename, content: toBuffer(file.content) };
}
