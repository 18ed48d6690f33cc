/**
 * reqline - Redirect Policy and Cookie Jar
 */

import type { ExecutionPlan, HttpMethod } from "./types";

export const WRITE_METHODS: readonly HttpMethod[] = ["POST", "PUT", "PATCH", "DELETE"];

const REDIRECT_STATUSES = [301, 302, 303, 307, 308];
const METHOD_CHANGING_STATUSES = [301, 302, 303];

/** Verbs that follow redirects without follow=smart */
const FOLLOWING_VERBS: ReadonlyArray<ExecutionPlan["verb"]> = ["read", "save", "authenticate"];

export type RedirectDecision =
  | { action: "stop" }
  | { action: "follow"; method: HttpMethod; url: string; keepBody: boolean }
  | { action: "advise"; message: string }
  | { action: "reject"; message: string };

export interface RedirectContext {
  verb: ExecutionPlan["verb"];
  follow: ExecutionPlan["follow"];
  method: HttpMethod;
  status: number;
  location?: string;
  currentUrl: string;
}

export function isWriteMethod(method: HttpMethod): boolean {
  return WRITE_METHODS.includes(method);
}

export function isRedirect(status: number): boolean {
  return REDIRECT_STATUSES.includes(status);
}

/**
 * Standard 3xx semantics: 301/302/303 switch to GET and drop the body,
 * 307/308 keep both
 */
function standardFollow(
  status: number,
  method: HttpMethod,
  url: string
): RedirectDecision {
  if (METHOD_CHANGING_STATUSES.includes(status) && method !== "HEAD") {
    return { action: "follow", method: "GET", url, keepBody: false };
  }
  return { action: "follow", method, url, keepBody: true };
}

/**
 * Decide what to do with one response, as a function of verb, follow
 * policy, method and status
 */
export function decideRedirect(ctx: RedirectContext): RedirectDecision {
  const { status, method } = ctx;
  if (!isRedirect(status) || !ctx.location) return { action: "stop" };

  let target: string;
  try {
    target = new URL(ctx.location, ctx.currentUrl).toString();
  } catch {
    return { action: "reject", message: `invalid redirect location '${ctx.location}'` };
  }

  const write = isWriteMethod(method);

  if (ctx.follow === "smart") {
    if (!write) return standardFollow(status, method, target);
    if (status === 307 || status === 308) {
      return { action: "follow", method, url: target, keepBody: true };
    }
    return {
      action: "reject",
      message: `not following ${status} redirect for write verb, use 307/308`,
    };
  }

  if (FOLLOWING_VERBS.includes(ctx.verb)) {
    return standardFollow(status, method, target);
  }

  if (write && METHOD_CHANGING_STATUSES.includes(status)) {
    return {
      action: "advise",
      message: `Advisory: ${status} redirect for write verb, not following`,
    };
  }
  return { action: "stop" };
}

export function sameOrigin(a: string, b: string): boolean {
  try {
    return new URL(a).origin === new URL(b).origin;
  } catch {
    return false;
  }
}

// ============================================================================
// Cookie Jar
// ============================================================================

/**
 * `name=value` prefix of a Set-Cookie line
 */
export function parseSetCookie(line: string): { name: string; value: string } | undefined {
  const pair = line.split(";")[0] ?? "";
  const index = pair.indexOf("=");
  if (index <= 0) return undefined;
  return { name: pair.slice(0, index).trim(), value: pair.slice(index + 1).trim() };
}

function isExpiring(line: string): boolean {
  return /;\s*max-age\s*=\s*(0|-\d+)\s*(;|$)/i.test(line);
}

/**
 * Per-exchange cookie store keyed by host
 */
export class CookieJar {
  private hosts = new Map<string, Map<string, string>>();

  private static hostOf(url: string): string | undefined {
    try {
      return new URL(url).host;
    } catch {
      return undefined;
    }
  }

  /**
   * Record Set-Cookie lines received from `url`
   */
  store(url: string, setCookies: readonly string[]): void {
    const host = CookieJar.hostOf(url);
    if (host === undefined) return;

    const cookies = this.hosts.get(host) ?? new Map<string, string>();
    for (const line of setCookies) {
      const cookie = parseSetCookie(line);
      if (!cookie) continue;
      if (isExpiring(line)) {
        cookies.delete(cookie.name);
      } else {
        cookies.set(cookie.name, cookie.value);
      }
    }
    this.hosts.set(host, cookies);
  }

  cookiesFor(url: string): Record<string, string> {
    const host = CookieJar.hostOf(url);
    const cookies = host === undefined ? undefined : this.hosts.get(host);
    return cookies ? Object.fromEntries(cookies) : {};
  }
}
