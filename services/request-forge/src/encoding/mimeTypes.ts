import mime from "mime-types";
import type { MimeTypeResolver } from "../types/interfaces.js";

export const DEFAULT_MIME_TYPE = "application/octet-stream";

export const extensionMimeTypes: MimeTypeResolver = {
  typeFor(filename) {
    return mime.lookup(filename) || DEFAULT_MIME_TYPE;
  }
};
