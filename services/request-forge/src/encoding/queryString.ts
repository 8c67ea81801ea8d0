import type { Params } from "../types/request.js";

const UNRESERVED = /[A-Za-z0-9\-_.~]/;

/**
 * Percent-encodes the UTF-8 bytes of `text`. Only unreserved characters pass
 * through; space becomes `%20`, never `+`.
 */
export function percentEncode(text: string): string {
  let out = "";
  for (const byte of Buffer.from(text, "utf-8")) {
    const ch = String.fromCharCode(byte);
    out += byte < 0x80 && UNRESERVED.test(ch) ? ch : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return out;
}

export function encodeQuery(params: Params): string {
  const pairs: string[] = [];
  for (const [name, values] of params) {
    for (const value of values) {
      pairs.push(`${percentEncode(name)}=${percentEncode(value)}`);
    }
  }
  return pairs.join("&");
}

function decodeComponent(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch (err) {
    if (err instanceof URIError) {
      // Malformed escape: keep the text as written.
      return text;
    }
    throw err;
  }
}

/** Splits on `&` and `=` and percent-decodes, keeping pair order. */
export function decodeQuery(query: string): Array<[string, string]> {
  if (!query) {
    return [];
  }
  return query.split("&").map((pair): [string, string] => {
    const eq = pair.indexOf("=");
    const name = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? "" : pair.slice(eq + 1);
    return [decodeComponent(name), decodeComponent(value)];
  });
}
