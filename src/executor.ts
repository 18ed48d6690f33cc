/**
 * reqline - Executor
 * Carries out an ExecutionPlan: request assembly, session injection,
 * redirects, decompression, assertions and output
 */

import { appendFile, mkdir, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { assertChecks } from "./assertions";
import { RequestBuilder, assembleBody } from "./builder";
import { decompress } from "./compression";
import { DEFAULT_TIMEOUT_MS, MAX_REDIRECTS } from "./config";
import type { Diagnostics } from "./diagnostics";
import {
  ExecutionError,
  SessionPermissionError,
  TransportError,
  isNotFound,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import { CookieJar, decideRedirect, sameOrigin, type RedirectDecision } from "./redirect";
import { pick, render } from "./render";
import { ResponseAnalyzer } from "./response";
import { extractHost, type SessionStore } from "./session";
import { UndiciTransport, type Transport } from "./transport";
import type { ExecutionPlan, HttpResponse, Session, WireRequest } from "./types";
import { VERSION } from "./version";
import { formatWatchLines, pollUntil } from "./watch";

export interface ExecutorOptions {
  sessions: SessionStore;
  diagnostics: Diagnostics;
  stdout: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream;
  isTty: boolean;
  logger?: Logger;
  /** Defaults to an undici transport built from the plan's proxy and TLS settings */
  transport?: Transport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  defaultTimeoutMs?: number;
  /** Upper bound on watch polls */
  maxPolls?: number;
}

/**
 * One attempt: every hop of the redirect chain
 */
interface Exchange {
  response: HttpResponse;
  /** Every Set-Cookie line from every hop */
  setCookies: string[];
  jar: CookieJar;
}

interface PreparedRequest {
  request: WireRequest;
  /** Offset sent in a Range header for resume */
  rangeStart?: number;
}

/**
 * Cookie header for a hop: what the request already carries, overlaid
 * with cookies the jar collected for that host
 */
function withJarCookies(request: WireRequest, jar: CookieJar): WireRequest {
  const collected = jar.cookiesFor(request.url);
  if (Object.keys(collected).length === 0) return request;

  const cookies = new Map<string, string>();
  const headers = request.headers.filter((h) => {
    if (h.name.toLowerCase() !== "cookie") return true;
    for (const pair of h.value.split(";")) {
      const index = pair.indexOf("=");
      if (index > 0) cookies.set(pair.slice(0, index).trim(), pair.slice(index + 1).trim());
    }
    return false;
  });
  for (const [name, value] of Object.entries(collected)) cookies.set(name, value);

  headers.push({
    name: "Cookie",
    value: [...cookies].map(([name, value]) => `${name}=${value}`).join("; "),
  });
  return { ...request, headers };
}

/**
 * Request for the next hop. A method change drops the body and its
 * headers; leaving the origin drops credentials.
 */
function nextHop(
  current: WireRequest,
  decision: Extract<RedirectDecision, { action: "follow" }>
): WireRequest {
  const crossOrigin = !sameOrigin(current.url, decision.url);
  const headers = current.headers.filter((h) => {
    const name = h.name.toLowerCase();
    if (!decision.keepBody && (name === "content-type" || name === "content-length")) {
      return false;
    }
    return !(crossOrigin && (name === "authorization" || name === "cookie"));
  });

  const next: WireRequest = { method: decision.method, url: decision.url, headers };
  if (decision.keepBody && current.body !== undefined) next.body = current.body;
  return next;
}

export class Executor {
  private diagnostics: Diagnostics;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(private options: ExecutorOptions) {
    this.diagnostics = options.diagnostics;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute a plan and return the final, decompressed response
   */
  async execute(plan: ExecutionPlan): Promise<HttpResponse> {
    const prepared = await this.prepare(plan);

    if (plan.insecure) {
      this.diagnostics.note("Warning: TLS verification disabled");
    }
    if (plan.verbose) this.traceRequest(prepared.request);

    const transport =
      this.options.transport ??
      new UndiciTransport({ proxy: plan.proxy, insecure: plan.insecure, logger: this.logger });

    try {
      if (plan.verb === "watch" && plan.poll !== undefined) {
        return await this.poll(plan, prepared, transport);
      }
      const exchange = await this.exchangeWithRetry(plan, prepared.request, transport);
      return await this.finish(plan, prepared, exchange);
    } finally {
      if (this.options.transport === undefined) await transport.close();
    }
  }

  // ==========================================================================
  // Request assembly
  // ==========================================================================

  private async prepare(plan: ExecutionPlan): Promise<PreparedRequest> {
    const builder = new RequestBuilder()
      .url(plan.url)
      .params(plan.queryParams)
      .method(plan.method)
      .headers(plan.headers)
      .cookies(plan.cookies);

    if (plan.body !== undefined) {
      const body = await assembleBody(plan.body, { stdin: this.options.stdin });
      builder.body(body.content);

      if (body.contentType !== undefined) {
        if (body.multipart) {
          const existing = builder.getHeader("content-type");
          if (existing !== undefined && existing !== body.contentType) {
            this.diagnostics.note("Note: Content-Type overridden for multipart");
          }
          builder.header("Content-Type", body.contentType);
        } else if (!builder.hasHeader("content-type")) {
          builder.header("Content-Type", body.contentType);
          if (body.inferred) {
            this.diagnostics.note(`Inferred Content-Type: ${body.contentType}`);
          }
        }
      }
    }

    await this.applySession(plan, builder);

    if (!builder.hasHeader("accept-encoding")) builder.header("Accept-Encoding", "gzip, br");
    if (!builder.hasHeader("user-agent")) builder.header("User-Agent", `reqline/${VERSION}`);

    const rangeStart = await this.resumeOffset(plan);
    if (rangeStart !== undefined) builder.header("Range", `bytes=${rangeStart}-`);

    const request = builder.build();
    return rangeStart === undefined ? { request } : { request, rangeStart };
  }

  /**
   * Stored credentials apply only when the command supplies none of its own
   */
  private async applySession(plan: ExecutionPlan, builder: RequestBuilder): Promise<void> {
    if (builder.hasHeader("authorization") || builder.hasCookies()) return;

    const host = extractHost(plan.url);
    let session: Session | null;
    try {
      session = await this.options.sessions.load(host);
    } catch (error) {
      if (error instanceof SessionPermissionError) {
        this.diagnostics.note(`Warning: ${error.message}, session not applied`);
        return;
      }
      throw error;
    }
    if (session === null) return;

    if (session.authorization !== undefined) {
      builder.header("Authorization", session.authorization);
    }
    builder.cookies(session.cookies);
    this.diagnostics.note(`Using session for ${host}`);
    this.logger.debug({ host }, "applied stored session");
  }

  private async resumeOffset(plan: ExecutionPlan): Promise<number | undefined> {
    const destination = plan.output.destination;
    if (!plan.resume || destination === undefined) return undefined;

    try {
      const existing = await stat(destination);
      return existing.isFile() && existing.size > 0 ? existing.size : undefined;
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new ExecutionError(`cannot resume ${destination}`, error);
    }
  }

  // ==========================================================================
  // Exchange
  // ==========================================================================

  /**
   * Retry wraps the whole redirect chain. Transport failures and 5xx
   * responses are retried with exponential backoff.
   */
  private async exchangeWithRetry(
    plan: ExecutionPlan,
    request: WireRequest,
    transport: Transport
  ): Promise<Exchange> {
    const attempts = (plan.retry?.count ?? 0) + 1;
    const maxWait = plan.retry?.backoff.maxMs ?? 0;
    let wait = plan.retry?.backoff.minMs ?? 0;

    for (let attempt = 1; ; attempt++) {
      let reason: string;
      try {
        const exchange = await this.exchange(plan, request, transport);
        if (attempt >= attempts || !new ResponseAnalyzer(exchange.response).isServerError()) {
          return exchange;
        }
        reason = `HTTP ${exchange.response.status}`;
      } catch (error) {
        if (!(error instanceof TransportError) || attempt >= attempts) throw error;
        reason = error.message;
      }

      this.logger.debug({ attempt, wait, reason }, "retrying request");
      this.diagnostics.note(`Retry ${attempt}/${attempts - 1} in ${wait}ms (${reason})`);
      await this.sleep(wait);
      wait = Math.min(wait * 2, maxWait);
    }
  }

  /**
   * Follow the redirect chain under a single deadline
   */
  private async exchange(
    plan: ExecutionPlan,
    request: WireRequest,
    transport: Transport
  ): Promise<Exchange> {
    const timeoutMs = plan.timeoutMs ?? this.options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TransportError(`request timed out after ${timeoutMs}ms`)),
      timeoutMs
    );

    const jar = new CookieJar();
    const setCookies: string[] = [];
    let current = request;
    let hops = 0;

    try {
      for (;;) {
        const response = await transport.send(withJarCookies(current, jar), {
          signal: controller.signal,
          sizeLimit: plan.sizeLimit,
        });

        const analyzer = new ResponseAnalyzer(response);
        const cookies = analyzer.getCookies();
        setCookies.push(...cookies);
        jar.store(response.url, cookies);

        const decision = decideRedirect({
          verb: plan.verb,
          follow: plan.follow,
          method: current.method,
          status: response.status,
          location: analyzer.getLocation(),
          currentUrl: current.url,
        });

        switch (decision.action) {
          case "stop":
            return { response, setCookies, jar };
          case "advise":
            this.diagnostics.note(decision.message);
            return { response, setCookies, jar };
          case "reject":
            throw new ExecutionError(decision.message);
          case "follow":
            if (hops >= MAX_REDIRECTS) {
              throw new ExecutionError(`stopped after ${MAX_REDIRECTS} redirects`);
            }
            hops++;
            this.diagnostics.note(`→ ${response.status} ${decision.method} ${decision.url}`);
            current = nextHop(current, decision);
            break;
        }
      }
    } finally {
      clearTimeout(timer);
    }
  }

  // ==========================================================================
  // Response handling
  // ==========================================================================

  private decode(response: HttpResponse): HttpResponse {
    const analyzer = new ResponseAnalyzer(response);
    const { body, applied } = decompress(response.body, analyzer.getContentEncoding());
    if (applied.length > 0) {
      this.diagnostics.note("Decompressed response");
      this.logger.debug({ encodings: applied }, "decompressed response");
    }
    return { ...response, body };
  }

  private printMeta(response: HttpResponse): void {
    const analyzer = new ResponseAnalyzer(response);
    this.diagnostics.note(`HTTP ${response.status} ${response.statusText}`.trimEnd());
    this.diagnostics.note(`URL: ${response.url}`);
    this.diagnostics.note(`Size: ${response.body.length} bytes`);
    const contentType = analyzer.getContentType();
    if (contentType !== undefined) this.diagnostics.note(`Content-Type: ${contentType}`);
  }

  private traceRequest(request: WireRequest): void {
    this.diagnostics.note(`> ${request.method} ${request.url}`);
    for (const { name, value } of request.headers) {
      this.diagnostics.note(`> ${name}: ${name.toLowerCase() === "authorization" ? "***" : value}`);
    }
  }

  private traceResponse(response: HttpResponse): void {
    for (const [name, values] of response.headers) {
      for (const value of values) this.diagnostics.note(`< ${name}: ${value}`);
    }
  }

  private async finish(
    plan: ExecutionPlan,
    prepared: PreparedRequest,
    exchange: Exchange
  ): Promise<HttpResponse> {
    const response = this.decode(exchange.response);
    this.printMeta(response);
    if (plan.verbose) this.traceResponse(response);

    const analyzer = new ResponseAnalyzer(response);

    if (plan.verb === "authenticate" && response.status < 400) {
      await this.captureSession(plan, exchange, response);
    }

    if (prepared.rangeStart !== undefined && response.status === 416) {
      this.diagnostics.note(`Nothing to resume, ${plan.output.destination ?? "file"} is complete`);
      return response;
    }

    if (plan.expect.length > 0) {
      assertChecks(analyzer, plan.expect);
    } else if (!analyzer.isSuccess()) {
      throw new ExecutionError(`HTTP ${response.status} ${response.statusText}`.trimEnd());
    }

    await this.writeOutput(plan, response);
    return response;
  }

  private async captureSession(
    plan: ExecutionPlan,
    exchange: Exchange,
    response: HttpResponse
  ): Promise<void> {
    const host = extractHost(plan.url);
    const jarCookies = Object.entries(exchange.jar.cookiesFor(plan.url)).map(
      ([name, value]) => `${name}=${value}`
    );

    try {
      await this.options.sessions.updateFromResponse(
        host,
        [...exchange.setCookies, ...jarCookies],
        response.body
      );
    } catch (error) {
      throw new ExecutionError(
        `failed to save session for ${host}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    this.diagnostics.note(`Session saved for ${host}`);
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  private async writeOutput(plan: ExecutionPlan, response: HttpResponse): Promise<void> {
    let body = response.body;
    if (plan.verb === "inspect") {
      body = Buffer.from(JSON.stringify(new ResponseAnalyzer(response).summary()));
    }
    if (plan.output.pick !== undefined) body = pick(body, plan.output.pick);

    const destination = plan.output.destination;
    if (destination !== undefined) {
      await this.writeFile(destination, body, plan.resume && response.status === 206);
      return;
    }

    const { stdout, isTty } = this.options;
    if (plan.verb === "watch") {
      stdout.write(formatWatchLines(body.toString("utf-8"), isTty, this.now()));
      return;
    }
    if (plan.output.format === "raw") {
      stdout.write(body);
      return;
    }

    const text = render(body, plan.output.format, isTty);
    stdout.write(text);
    if (isTty && text !== "" && !text.endsWith("\n")) stdout.write("\n");
  }

  private async writeFile(destination: string, body: Buffer, append: boolean): Promise<void> {
    try {
      await mkdir(dirname(destination), { recursive: true });
      if (append) {
        await appendFile(destination, body);
      } else {
        await writeFile(destination, body);
      }
    } catch (error) {
      throw new ExecutionError(
        `cannot write ${destination}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    this.diagnostics.note(`${append ? "Appended" : "Saved"} ${body.length} bytes to ${destination}`);
  }

  // ==========================================================================
  // Watch polling
  // ==========================================================================

  private async poll(
    plan: ExecutionPlan,
    prepared: PreparedRequest,
    transport: Transport
  ): Promise<HttpResponse> {
    const poll = plan.poll;
    if (poll === undefined) {
      throw new ExecutionError("watch polling requires every=");
    }

    const last = await pollUntil({
      intervalMs: poll.intervalMs,
      until: poll.until,
      sleep: this.sleep,
      maxPolls: this.options.maxPolls,
      attempt: async () => {
        const exchange = await this.exchangeWithRetry(plan, prepared.request, transport);
        return this.decode(exchange.response);
      },
      onResponse: async (response) => {
        this.diagnostics.note(`HTTP ${response.status} ${response.statusText}`.trimEnd());
        await this.writeOutput(plan, response);
      },
      onError: (error) => {
        this.diagnostics.note(
          `Poll failed: ${error instanceof Error ? error.message : String(error)}`
        );
      },
    });

    if (last === undefined) {
      throw new ExecutionError(`no successful response from ${plan.url}`);
    }
    if (poll.until.length > 0) assertChecks(new ResponseAnalyzer(last), poll.until);
    return last;
  }
}
