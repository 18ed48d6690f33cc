/**
 * reqline - Response Decompression
 */

import { brotliDecompressSync, gunzipSync, inflateRawSync, inflateSync } from "node:zlib";
import { ExecutionError } from "./errors";

export interface DecompressResult {
  body: Buffer;
  /** Encodings actually unwrapped, outermost first */
  applied: string[];
}

/**
 * Split a Content-Encoding header into lower-cased tokens
 */
export function parseContentEncoding(header: string | undefined): string[] {
  if (!header) return [];
  return header
    .split(",")
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token !== "");
}

/**
 * zlib-wrapped deflate, falling back to raw deflate
 */
function inflate(body: Buffer): Buffer {
  try {
    return inflateSync(body);
  } catch {
    return inflateRawSync(body);
  }
}

function decodeOne(encoding: string, body: Buffer): Buffer | undefined {
  switch (encoding) {
    case "gzip":
    case "x-gzip":
      return gunzipSync(body);
    case "br":
      return brotliDecompressSync(body);
    case "deflate":
      return inflate(body);
    default:
      return undefined;
  }
}

/**
 * Unwrap encodings in reverse order of declaration. Unknown encodings and
 * identity leave the body as it is.
 */
export function decompress(body: Buffer, contentEncoding: string | undefined): DecompressResult {
  const encodings = parseContentEncoding(contentEncoding);
  const applied: string[] = [];
  let current = body;

  if (current.length === 0) return { body: current, applied };

  for (const encoding of [...encodings].reverse()) {
    let decoded: Buffer | undefined;
    try {
      decoded = decodeOne(encoding, current);
    } catch (error) {
      throw new ExecutionError(
        `failed to decode ${encoding} response body: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    if (decoded === undefined) continue;
    current = decoded;
    applied.push(encoding);
  }

  return { body: current, applied };
}
