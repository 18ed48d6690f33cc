/**
 * reqline - Request Builder
 * Fluent API for assembling the wire request from a plan
 */

import { readFile } from "node:fs/promises";
import { ExecutionError } from "./errors";
import { buildMultipart, type FileReader } from "./multipart";
import type { BodySource, HttpMethod, PlanBody, WireRequest } from "./types";

export interface AssembledBody {
  content: Buffer;
  contentType?: string;
  multipart: boolean;
  inferred: boolean;
}

export interface BodyInputs {
  stdin: NodeJS.ReadableStream;
  readFile?: FileReader;
}

const CONTENT_TYPES = {
  json: "application/json",
  form: "application/x-www-form-urlencoded",
  raw: undefined,
} as const;

async function readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

async function readSource(
  source: BodySource,
  read: FileReader,
  stdin: NodeJS.ReadableStream
): Promise<Buffer> {
  switch (source.kind) {
    case "inline":
      return Buffer.from(source.content, "utf-8");
    case "file":
      return read(source.path);
    case "stdin":
      return readStream(stdin);
  }
}

/**
 * Resolve the plan body into bytes, reading files and stdin up front
 */
export async function assembleBody(
  body: PlanBody,
  inputs: BodyInputs
): Promise<AssembledBody> {
  const read: FileReader = inputs.readFile ?? ((path) => readFile(path));

  try {
    if (body.type === "multipart") {
      const multipart = await buildMultipart(body.parts, body.boundary, read);
      return {
        content: multipart.content,
        contentType: multipart.contentType,
        multipart: true,
        inferred: false,
      };
    }

    const content = await readSource(body.source, read, inputs.stdin);
    return {
      content,
      contentType: CONTENT_TYPES[body.type],
      multipart: false,
      inferred: body.inferred,
    };
  } catch (error) {
    throw new ExecutionError(
      `cannot read request body: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

export class RequestBuilder {
  private _url: string = "";
  private _method: HttpMethod = "GET";
  private _params: Array<[string, string]> = [];
  private _headers: Array<{ name: string; value: string }> = [];
  private _cookies: Map<string, string> = new Map();
  private _body?: Buffer;

  /**
   * Set the target URL; query params added later are appended to its own
   */
  url(u: string): this {
    this._url = u;
    return this;
  }

  /**
   * Set HTTP method
   */
  method(m: HttpMethod): this {
    this._method = m;
    return this;
  }

  /**
   * Append a query parameter, keeping repeats in order
   */
  param(name: string, value: string): this {
    this._params.push([name, value]);
    return this;
  }

  params(pairs: ReadonlyArray<readonly [string, string]>): this {
    for (const [name, value] of pairs) this.param(name, value);
    return this;
  }

  /**
   * Set a header, replacing any value under the same name whatever its case
   */
  header(name: string, value: string): this {
    this.removeHeader(name);
    this._headers.push({ name, value });
    return this;
  }

  headers(h: Record<string, string>): this {
    for (const [name, value] of Object.entries(h)) this.header(name, value);
    return this;
  }

  removeHeader(name: string): this {
    const lowered = name.toLowerCase();
    this._headers = this._headers.filter((h) => h.name.toLowerCase() !== lowered);
    return this;
  }

  hasHeader(name: string): boolean {
    return this.getHeader(name) !== undefined;
  }

  getHeader(name: string): string | undefined {
    const lowered = name.toLowerCase();
    return this._headers.find((h) => h.name.toLowerCase() === lowered)?.value;
  }

  /**
   * Set a cookie, last write wins
   */
  cookie(name: string, value: string): this {
    this._cookies.set(name, value);
    return this;
  }

  cookies(c: Record<string, string>): this {
    for (const [name, value] of Object.entries(c)) this.cookie(name, value);
    return this;
  }

  /**
   * Explicit cookies, either as cookie items or a Cookie header
   */
  hasCookies(): boolean {
    return this._cookies.size > 0 || this.hasHeader("cookie");
  }

  /**
   * Set request body
   */
  body(b: string | Buffer): this {
    this._body = typeof b === "string" ? Buffer.from(b) : b;
    return this;
  }

  /**
   * Build full URL with the accumulated query parameters
   */
  buildUrl(): string {
    if (this._params.length === 0) return this._url;

    let parsed: URL;
    try {
      parsed = new URL(this._url);
    } catch (error) {
      throw new ExecutionError(`invalid URL '${this._url}'`, error);
    }
    for (const [name, value] of this._params) {
      parsed.searchParams.append(name, value);
    }
    return parsed.toString();
  }

  /**
   * Build the request, folding cookies into one Cookie header
   */
  build(): WireRequest {
    const headers = this._headers.map((h) => ({ ...h }));

    if (this._cookies.size > 0) {
      const pairs = [...this._cookies].map(([name, value]) => `${name}=${value}`);
      const existing = headers.find((h) => h.name.toLowerCase() === "cookie");
      if (existing) {
        existing.value = [existing.value, ...pairs].join("; ");
      } else {
        headers.push({ name: "Cookie", value: pairs.join("; ") });
      }
    }

    const request: WireRequest = {
      method: this._method,
      url: this.buildUrl(),
      headers,
    };
    if (this._body !== undefined) request.body = this._body;
    return request;
  }
}
