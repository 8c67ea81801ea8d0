import type { MimeTypeResolver } from "../types/interfaces.js";
import type { FileParams, FileUpload, Params } from "../types/request.js";

const CRLF = "\r\n";

/**
 * Builds a multipart/form-data body: every parameter part, then every file
 * part, then the closing `--{boundary}--` (no trailing CRLF).
 *
 * A field carrying several files is sent as one form-data part holding a
 * nested multipart/mixed body delimited by `fileBoundary`. The inner parts'
 * Content-Disposition is the bare field name, without the `form-data;`
 * prefix; consumers of these bodies depend on that exact layout. A field
 * with no files still gets an (empty) multipart/mixed wrapper.
 */
export function encodeMultipart(
  boundary: string,
  fileBoundary: string,
  params: Params,
  fileParams: FileParams,
  mimeTypes: MimeTypeResolver
): Buffer {
  const chunks: Buffer[] = [];
  const text = (value: string) => chunks.push(Buffer.from(value, "utf-8"));

  for (const [name, values] of params) {
    for (const value of values) {
      text(`--${boundary}${CRLF}Content-Disposition: form-data; name="${name}"${CRLF}${CRLF}${value}${CRLF}`);
    }
  }

  for (const [name, files] of fileParams) {
    if (files.length === 1) {
      const [file] = files;
      text(
        `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${name}"; filename="${file.filename}"${CRLF}` +
          `Content-Type: ${mimeTypes.typeFor(file.filename)}${CRLF}${CRLF}`
      );
      chunks.push(file.content);
      text(CRLF);
    } else {
      text(
        `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${name}"${CRLF}` +
          `Content-Type: multipart/mixed; boundary=${fileBoundary}${CRLF}${CRLF}`
      );
      for (const file of files) {
        chunks.push(mixedPart(fileBoundary, name, file, mimeTypes));
      }
      text(`--${fileBoundary}--${CRLF}`);
    }
  }

  text(`--${boundary}--`);
  return Buffer.concat(chunks);
}

function mixedPart(fileBoundary: string, name: string, file: FileUpload, mimeTypes: MimeTypeResolver): Buffer {
  const head =
    `--${fileBoundary}${CRLF}` +
    `Content-Disposition: ${name}; filename="${file.filename}"${CRLF}` +
    `Content-Type: ${mimeTypes.typeFor(file.filename)}${CRLF}${CRLF}`;
  return Buffer.concat([Buffer.from(head, "utf-8"), file.content, Buffer.from(CRLF, "utf-8")]);
}
