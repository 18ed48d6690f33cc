/**
 * reqline - HTTP Transport
 * Single-hop requests over undici: no automatic redirects, no decompression
 */

import { STATUS_CODES } from "node:http";
import { Agent, ProxyAgent, request, type Dispatcher } from "undici";
import { ExecutionError, TransportError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { HttpResponse, WireRequest } from "./types";

export interface SendOptions {
  signal?: AbortSignal;
  /** Abort once the body grows past this many bytes */
  sizeLimit?: number;
}

export interface Transport {
  send(req: WireRequest, options?: SendOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface TransportOptions {
  proxy?: string;
  insecure?: boolean;
  logger?: Logger;
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message && !error.message.includes(cause.message)) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * Convert undici's header record to Map<string, string[]>
 */
export function toHeaderMap(
  headers: Record<string, string | string[] | undefined>
): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    const existing = map.get(key) ?? [];
    map.set(key, existing.concat(value));
  }
  return map;
}

export class UndiciTransport implements Transport {
  private dispatcher: Dispatcher;
  private logger: Logger;

  constructor(options: TransportOptions = {}) {
    const tls = options.insecure ? { rejectUnauthorized: false } : undefined;
    this.dispatcher = options.proxy
      ? new ProxyAgent({ uri: options.proxy, requestTls: tls })
      : new Agent({ connect: tls });
    this.logger = options.logger ?? silentLogger;
  }

  async send(req: WireRequest, options: SendOptions = {}): Promise<HttpResponse> {
    const { signal, sizeLimit } = options;
    const flatHeaders = req.headers.flatMap((h) => [h.name, h.value]);

    this.logger.debug({ method: req.method, url: req.url }, "sending request");

    try {
      const response = await request(req.url, {
        method: req.method,
        headers: flatHeaders,
        body: req.body,
        signal,
        dispatcher: this.dispatcher,
      });

      const chunks: Buffer[] = [];
      let total = 0;
      for await (const chunk of response.body) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        total += buffer.length;
        if (sizeLimit !== undefined && total > sizeLimit) {
          response.body.destroy();
          throw new ExecutionError(`response body exceeds size limit of ${sizeLimit} bytes`);
        }
        chunks.push(buffer);
      }
      const body = Buffer.concat(chunks);

      this.logger.debug(
        { status: response.statusCode, bytes: body.length },
        "received response"
      );

      return {
        status: response.statusCode,
        statusText: STATUS_CODES[response.statusCode] ?? "",
        headers: toHeaderMap(response.headers),
        body,
        url: req.url,
      };
    } catch (error) {
      if (error instanceof ExecutionError) throw error;
      if (signal?.aborted) {
        const reason: unknown = signal.reason;
        throw reason instanceof ExecutionError
          ? reason
          : new TransportError("request aborted", error);
      }
      throw new TransportError(
        `${req.method} ${req.url} failed: ${describeError(error)}`,
        error
      );
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
