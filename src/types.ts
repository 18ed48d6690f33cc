/**
 * reqline - Type Definitions
 */

// ============================================================================
// Vocabulary
// ============================================================================

export const VERBS = [
  "read",
  "save",
  "send",
  "upload",
  "watch",
  "inspect",
  "authenticate",
  "session",
] as const;

export type Verb = (typeof VERBS)[number];

export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const SESSION_SUBCOMMANDS = ["show", "clear", "use"] as const;

export type SessionSubcommand = (typeof SESSION_SUBCOMMANDS)[number];

export type OutputFormat = "json" | "csv" | "text" | "raw";

export type BodyType = "json" | "form" | "raw";

/** Narrow a string to one of a literal vocabulary */
export function isOneOf<T extends string>(values: readonly T[], text: string): text is T {
  return values.some((value) => value === text);
}

// ============================================================================
// Tokens
// ============================================================================

export interface WordToken {
  kind: "word";
  text: string;
  position: number;
}

export interface UrlToken {
  kind: "url";
  text: string;
  position: number;
}

export interface ClauseToken {
  kind: "clause";
  key: string;
  value: string;
  /** Value began with a quote character */
  quoted: boolean;
  /** Value starts with http:// or https:// */
  isUrl: boolean;
  /** Unquoted `type:value` decomposition, e.g. json:'{...}' */
  typed?: { type: string; value: string };
  position: number;
}

export type Token = WordToken | UrlToken | ClauseToken;

// ============================================================================
// Clause payloads
// ============================================================================

export type IncludeItem =
  | { type: "header"; name: string; value: string }
  | { type: "param"; name: string; value: string }
  | { type: "cookie"; name: string; value: string }
  | { type: "basic"; credentials: string };

export interface AttachPart {
  name: string;
  filePath?: string;
  value?: string;
  filename?: string;
  contentType?: string;
}

export type ExpectCheck =
  | { type: "status"; value: string }
  | { type: "header"; name: string; value: string }
  | { type: "contains"; value: string }
  | { type: "jsonpath"; path: string; value?: string }
  | { type: "matches"; pattern: string };

export type BodySource =
  | { kind: "inline"; content: string }
  | { kind: "file"; path: string }
  | { kind: "stdin" };

export type UnderLimit =
  | { kind: "duration"; ms: number }
  | { kind: "size"; bytes: number };

// ============================================================================
// Clauses
// ============================================================================

export type Clause =
  | { kind: "method"; method: HttpMethod }
  | { kind: "body"; source: BodySource; type: BodyType; inferred: boolean }
  | { kind: "include"; items: IncludeItem[] }
  | { kind: "attach"; parts: AttachPart[]; boundary?: string }
  | { kind: "expect"; checks: ExpectCheck[] }
  | { kind: "format"; format: OutputFormat }
  | { kind: "destination"; path: string }
  | { kind: "retry"; count: number }
  | { kind: "backoff"; minMs: number; maxMs: number }
  | { kind: "timeout"; ms: number }
  | { kind: "under"; limit: UnderLimit }
  | { kind: "proxy"; url: string }
  | { kind: "follow"; policy: "smart" }
  | { kind: "insecure"; enabled: boolean }
  | { kind: "pick"; path: string }
  | { kind: "every"; ms: number }
  | { kind: "until"; checks: ExpectCheck[] }
  | { kind: "verbose" }
  | { kind: "resume" };

export type ClauseKind = Clause["kind"];

export interface Command {
  readonly verb: Verb;
  readonly target: string;
  readonly clauses: readonly Clause[];
  readonly sessionSubcommand?: SessionSubcommand;
}

// ============================================================================
// Execution plan
// ============================================================================

export type PlanBody =
  | { type: BodyType; source: BodySource; inferred: boolean }
  | { type: "multipart"; parts: AttachPart[]; boundary?: string };

export interface OutputPlan {
  format: OutputFormat | "auto";
  destination?: string;
  pick?: string;
}

export interface RetryPlan {
  count: number;
  backoff: { minMs: number; maxMs: number };
}

export interface PollPlan {
  intervalMs: number;
  until: ExpectCheck[];
}

export interface ExecutionPlan {
  verb: Exclude<Verb, "session">;
  method: HttpMethod;
  url: string;
  /** Keys are the header names as first written; lookups are case-insensitive */
  headers: Record<string, string>;
  queryParams: Array<[string, string]>;
  cookies: Record<string, string>;
  body?: PlanBody;
  output: OutputPlan;
  retry?: RetryPlan;
  timeoutMs?: number;
  sizeLimit?: number;
  proxy?: string;
  insecure: boolean;
  follow: "default" | "smart";
  verbose: boolean;
  resume: boolean;
  expect: ExpectCheck[];
  poll?: PollPlan;
}

// ============================================================================
// Wire level
// ============================================================================

export interface WireRequest {
  method: HttpMethod;
  url: string;
  headers: Array<{ name: string; value: string }>;
  body?: Buffer;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  /** Lower-cased header name to every value received */
  headers: Map<string, string[]>;
  body: Buffer;
  url: string;
}

// ============================================================================
// Sessions
// ============================================================================

export interface Session {
  host: string;
  cookies: Record<string, string>;
  authorization?: string;
}
