/**
 * reqline - HTTP client driven by a verb + clause sentence grammar
 *
 *   read https://api.example.com/users include='param: page=2' as=json
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Verb,
  HttpMethod,
  SessionSubcommand,
  OutputFormat,
  BodyType,
  Token,
  WordToken,
  UrlToken,
  ClauseToken,
  IncludeItem,
  AttachPart,
  ExpectCheck,
  BodySource,
  UnderLimit,
  Clause,
  ClauseKind,
  Command,
  PlanBody,
  OutputPlan,
  RetryPlan,
  PollPlan,
  ExecutionPlan,
  WireRequest,
  HttpResponse,
  Session,
} from "./types";
export { VERBS, HTTP_METHODS, SESSION_SUBCOMMANDS } from "./types";

// =============================================================================
// Grammar
// =============================================================================

export { tokenize, unquote } from "./tokenizer";
export { parse, parseCommand } from "./parser";
export { parseIncludeItems, parseExpectChecks, parseAttach } from "./clauses";
export { VERB_DEFINITIONS, CLAUSE_DEFINITIONS, FLAG_WORDS, formatHelp } from "./grammar";
export { suggest, levenshtein } from "./suggest";
export { parseDuration, parseSize } from "./units";

// =============================================================================
// Planning
// =============================================================================

export { plan, VERB_DEFAULTS, ALLOWED_METHODS } from "./planner";
export type { PlanOptions } from "./planner";
export { explainPlan } from "./explain";

// =============================================================================
// Execution
// =============================================================================

export { Executor } from "./executor";
export type { ExecutorOptions } from "./executor";
export { RequestBuilder, assembleBody } from "./builder";
export { buildMultipart } from "./multipart";
export { UndiciTransport } from "./transport";
export type { Transport, SendOptions, TransportOptions } from "./transport";
export { decideRedirect, CookieJar } from "./redirect";
export type { RedirectDecision, RedirectContext } from "./redirect";
export { decompress } from "./compression";
export { ResponseAnalyzer } from "./response";
export { assertChecks, evaluateChecks } from "./assertions";
export { render, pick } from "./render";
export { StreamDiagnostics, BufferedDiagnostics } from "./diagnostics";
export type { Diagnostics } from "./diagnostics";

// =============================================================================
// Sessions, configuration, errors
// =============================================================================

export { SessionStore, extractHost, redactSession } from "./session";
export { runSessionCommand } from "./sessionCommands";
export { loadConfig } from "./config";
export type { Config } from "./config";
export { Encoder } from "./encoder";
export {
  ExitCode,
  ReqlineError,
  ParseError,
  PlanError,
  ExecutionError,
  TransportError,
  ExpectationError,
  SessionPermissionError,
} from "./errors";
export { run } from "./cli";
export { VERSION } from "./version";
