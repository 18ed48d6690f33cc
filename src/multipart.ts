/**
 * reqline - Multipart Encoder
 */

import { randomBytes } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { Encoder } from "./encoder";
import type { AttachPart } from "./types";

export interface MultipartBody {
  content: Buffer;
  contentType: string;
  boundary: string;
}

export type FileReader = (path: string) => Promise<Buffer>;

const CRLF = "\r\n";

export function generateBoundary(): string {
  return `----reqline${randomBytes(12).toString("hex")}`;
}

function partHeaders(part: AttachPart): string {
  const disposition = [`form-data; name="${Encoder.quotedParam(part.name)}"`];

  const filename =
    part.filename ?? (part.filePath !== undefined ? basename(part.filePath) : undefined);
  if (filename !== undefined) {
    disposition.push(`filename="${Encoder.quotedParam(filename)}"`);
  }

  const lines = [`Content-Disposition: ${disposition.join("; ")}`];
  const type =
    part.contentType ?? (part.filePath !== undefined ? "application/octet-stream" : undefined);
  if (type !== undefined) lines.push(`Content-Type: ${type}`);

  return lines.join(CRLF) + CRLF + CRLF;
}

/**
 * Encode parts as multipart/form-data. File parts are read in full.
 */
export async function buildMultipart(
  parts: readonly AttachPart[],
  boundary: string = generateBoundary(),
  read: FileReader = (path) => readFile(path)
): Promise<MultipartBody> {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    chunks.push(Buffer.from(`--${boundary}${CRLF}${partHeaders(part)}`));
    chunks.push(
      part.filePath !== undefined ? await read(part.filePath) : Buffer.from(part.value ?? "")
    );
    chunks.push(Buffer.from(CRLF));
  }
  chunks.push(Buffer.from(`--${boundary}--${CRLF}`));

  return {
    content: Buffer.concat(chunks),
    contentType: `multipart/form-data; boundary=${boundary}`,
    boundary,
  };
}
