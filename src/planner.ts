/**
 * reqline - Planner
 * Resolves verb defaults and folds clauses into an ExecutionPlan
 */

import { statSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { Encoder } from "./encoder";
import { PlanError } from "./errors";
import type {
  Clause,
  Command,
  ExecutionPlan,
  HttpMethod,
  OutputFormat,
  PollPlan,
  Verb,
} from "./types";

export type PlannableVerb = Exclude<Verb, "session">;

interface VerbDefaults {
  method: HttpMethod;
  format: OutputFormat | "auto";
}

export const VERB_DEFAULTS: Record<PlannableVerb, VerbDefaults> = {
  read: { method: "GET", format: "auto" },
  save: { method: "GET", format: "raw" },
  send: { method: "GET", format: "auto" },
  upload: { method: "POST", format: "auto" },
  watch: { method: "GET", format: "auto" },
  inspect: { method: "HEAD", format: "json" },
  authenticate: { method: "POST", format: "auto" },
};

/** Methods `using=` may name per verb; authenticate takes any */
export const ALLOWED_METHODS: Partial<Record<PlannableVerb, readonly HttpMethod[]>> = {
  read: ["GET", "HEAD", "OPTIONS"],
  save: ["GET", "POST"],
  send: ["POST", "PUT", "PATCH"],
  upload: ["POST", "PUT"],
  watch: ["GET"],
  inspect: ["HEAD", "GET", "OPTIONS"],
};

export const DEFAULT_BACKOFF = { minMs: 200, maxMs: 5000 };
export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_FILENAME = "download";

export interface PlanOptions {
  /** Used to decide whether save's to= names a directory */
  isDirectory?: (path: string) => boolean;
}

function isExistingDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isPlannable(verb: Verb): verb is PlannableVerb {
  return verb !== "session";
}

/**
 * Set a header, replacing any existing entry whatever its case
 */
export function setHeader(
  headers: Record<string, string>,
  name: string,
  value: string
): void {
  const lowered = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lowered) delete headers[existing];
  }
  headers[name] = value;
}

export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowered = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowered) return value;
  }
  return undefined;
}

/**
 * Derive a local filename from the last path segment of a URL
 */
export function filenameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_FILENAME;
  }

  const segment = pathname.split("/").pop() ?? "";
  const decoded = Encoder.decodePathSegment(segment);
  const name = basename(decoded.replace(/\\/g, "/"));

  if (name === "" || name === "." || name === ".." || extname(name) === "") {
    return DEFAULT_FILENAME;
  }
  return name;
}

interface FoldState {
  explicitMethod: boolean;
  retryCount?: number;
  backoff?: { minMs: number; maxMs: number };
}

/**
 * Fold one clause into the plan under construction
 */
function applyClause(
  plan: ExecutionPlan,
  clause: Clause,
  state: FoldState
): void {
  switch (clause.kind) {
    case "method": {
      const allowed = ALLOWED_METHODS[plan.verb];
      if (allowed !== undefined && !allowed.includes(clause.method)) {
        throw new PlanError(
          `${plan.verb} does not allow method ${clause.method} (allowed: ${allowed.join(", ")})`
        );
      }
      plan.method = clause.method;
      state.explicitMethod = true;
      break;
    }
    case "body":
      if (plan.body?.type === "multipart") {
        throw new PlanError("with= and attach= cannot be combined");
      }
      plan.body = { type: clause.type, source: clause.source, inferred: clause.inferred };
      if (!state.explicitMethod && plan.method === "GET") plan.method = "POST";
      break;
    case "attach": {
      if (plan.body !== undefined && plan.body.type !== "multipart") {
        throw new PlanError("with= and attach= cannot be combined");
      }
      const parts = plan.body?.type === "multipart" ? plan.body.parts : [];
      const boundary =
        clause.boundary ?? (plan.body?.type === "multipart" ? plan.body.boundary : undefined);
      plan.body =
        boundary === undefined
          ? { type: "multipart", parts: [...parts, ...clause.parts] }
          : { type: "multipart", parts: [...parts, ...clause.parts], boundary };
      if (!state.explicitMethod && plan.method === "GET") plan.method = "POST";
      break;
    }
    case "include":
      for (const item of clause.items) {
        switch (item.type) {
          case "header":
            setHeader(plan.headers, item.name, item.value);
            break;
          case "param":
            plan.queryParams.push([item.name, item.value]);
            break;
          case "cookie":
            plan.cookies[item.name] = item.value;
            break;
          case "basic":
            setHeader(plan.headers, "Authorization", Encoder.basicAuth(item.credentials));
            break;
        }
      }
      break;
    case "expect":
      plan.expect = [...clause.checks];
      break;
    case "format":
      plan.output.format = clause.format;
      break;
    case "destination":
      plan.output.destination = clause.path;
      break;
    case "pick":
      plan.output.pick = clause.path;
      break;
    case "retry":
      state.retryCount = clause.count;
      break;
    case "backoff":
      state.backoff = { minMs: clause.minMs, maxMs: clause.maxMs };
      break;
    case "timeout":
      plan.timeoutMs = clause.ms;
      break;
    case "under":
      if (clause.limit.kind === "duration") {
        plan.timeoutMs = clause.limit.ms;
      } else {
        plan.sizeLimit = clause.limit.bytes;
      }
      break;
    case "proxy":
      plan.proxy = clause.url;
      break;
    case "follow":
      plan.follow = clause.policy;
      break;
    case "insecure":
      plan.insecure = clause.enabled;
      break;
    case "every":
    case "until": {
      if (plan.verb !== "watch") {
        throw new PlanError(`${clause.kind}= only applies to watch, not ${plan.verb}`);
      }
      const poll: PollPlan = plan.poll ?? { intervalMs: 0, until: [] };
      if (clause.kind === "every") {
        poll.intervalMs = clause.ms;
      } else {
        poll.until = [...clause.checks];
      }
      plan.poll = poll;
      break;
    }
    case "verbose":
      plan.verbose = true;
      break;
    case "resume":
      plan.resume = true;
      break;
    default: {
      const unhandled: never = clause;
      throw new PlanError(`unhandled clause ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Resolve a parsed command into a side-effect-free execution plan
 */
export function plan(command: Command, options: PlanOptions = {}): ExecutionPlan {
  const { verb } = command;
  if (!isPlannable(verb)) {
    throw new PlanError(
      "session commands act on stored sessions and make no request",
      "session show <host>"
    );
  }

  const defaults = VERB_DEFAULTS[verb];
  const result: ExecutionPlan = {
    verb,
    method: defaults.method,
    url: command.target,
    headers: {},
    queryParams: [],
    cookies: {},
    output: { format: defaults.format },
    insecure: false,
    follow: "default",
    verbose: false,
    resume: false,
    expect: [],
  };

  const state: FoldState = { explicitMethod: false };

  for (const clause of command.clauses) {
    applyClause(result, clause, state);
  }

  if (verb === "upload" && result.body === undefined) {
    throw new PlanError("upload requires with= or attach=", "attach=");
  }

  if (result.body !== undefined && result.method === "HEAD") {
    throw new PlanError(`${verb} sends HEAD, which cannot carry a request body`);
  }

  if (result.poll !== undefined && result.poll.intervalMs === 0) {
    throw new PlanError("until= requires every= to set the polling interval", "every=");
  }

  if (state.retryCount !== undefined || state.backoff !== undefined) {
    result.retry = {
      count: state.retryCount ?? DEFAULT_RETRY_COUNT,
      backoff: state.backoff ?? { ...DEFAULT_BACKOFF },
    };
  }

  if (verb === "save") {
    const isDirectory = options.isDirectory ?? isExistingDirectory;
    const destination = result.output.destination;
    if (destination === undefined) {
      result.output.destination = filenameFromUrl(result.url);
    } else if (isDirectory(destination)) {
      result.output.destination = join(destination, filenameFromUrl(result.url));
    }
  }

  return result;
}
