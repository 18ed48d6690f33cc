/**
 * reqline - Grammar Parser
 * Turns a token stream into a typed Command
 */

import { parseAttach, parseExpectChecks, parseIncludeItems } from "./clauses";
import { ParseError } from "./errors";
import {
  CLAUSE_KEYS,
  FLAG_WORDS,
  RETIRED_KEYS,
  VERB_NAMES,
  isClauseKey,
  isRepeatable,
} from "./grammar";
import { suggest } from "./suggest";
import { isJsonShaped, isUrl, tokenize } from "./tokenizer";
import { parseDuration, parseSize } from "./units";
import {
  HTTP_METHODS,
  SESSION_SUBCOMMANDS,
  VERBS,
  isOneOf,
  type BodySource,
  type BodyType,
  type Clause,
  type ClauseToken,
  type Command,
  type HttpMethod,
  type OutputFormat,
  type SessionSubcommand,
  type Token,
  type Verb,
  type WordToken,
} from "./types";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "csv", "text", "raw"];
const BODY_TYPES: readonly BodyType[] = ["json", "form", "raw"];

function describe(token: Token): string {
  return token.kind === "clause" ? `${token.key}=${token.value}` : token.text;
}

function isVerb(text: string): text is Verb {
  return isOneOf(VERBS, text);
}

function isMethod(text: string): text is HttpMethod {
  return isOneOf(HTTP_METHODS, text);
}

function isSubcommand(text: string): text is SessionSubcommand {
  return isOneOf(SESSION_SUBCOMMANDS, text);
}

function isFormat(text: string): text is OutputFormat {
  return isOneOf(OUTPUT_FORMATS, text);
}

function isBodyType(text: string): text is BodyType {
  return isOneOf(BODY_TYPES, text);
}

// ============================================================================
// Clause values
// ============================================================================

function invalid(token: ClauseToken, message: string, suggestion?: string): ParseError {
  return new ParseError(message, {
    position: token.position,
    token: `${token.key}=${token.value}`,
    suggestion,
  });
}

function bodySource(text: string): BodySource {
  if (text === "@-") return { kind: "stdin" };
  if (text.startsWith("@") && text.length > 1) {
    return { kind: "file", path: text.slice(1) };
  }
  return { kind: "inline", content: text };
}

function parseBody(token: ClauseToken): Clause {
  let type: BodyType | undefined;
  let text = token.value;

  if (token.typed && isBodyType(token.typed.type)) {
    type = token.typed.type;
    text = token.typed.value;
  }

  if (text === "") {
    throw invalid(token, "with= requires a body, a @file or @- for stdin");
  }

  const source = bodySource(text);
  let inferred = false;

  if (type === undefined) {
    const looksJson =
      source.kind === "inline"
        ? isJsonShaped(source.content)
        : source.kind === "file" && source.path.toLowerCase().endsWith(".json");
    type = looksJson ? "json" : "raw";
    inferred = looksJson;
  }

  if (type === "json" && source.kind === "inline") {
    try {
      JSON.parse(source.content);
    } catch (error) {
      throw invalid(
        token,
        `with= body is not valid JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }

  return { kind: "body", source, type, inferred };
}

function parseBackoff(token: ClauseToken): Clause {
  const [min, max, ...rest] = token.value.split("..");
  const minMs = min === undefined ? undefined : parseDuration(min);
  const maxMs = max === undefined ? undefined : parseDuration(max);

  if (rest.length > 0 || minMs === undefined || maxMs === undefined) {
    throw invalid(token, `backoff= requires '<min>..<max>' durations, got '${token.value}'`);
  }
  if (minMs > maxMs) {
    throw invalid(token, `backoff= minimum ${min} exceeds maximum ${max}`);
  }
  return { kind: "backoff", minMs, maxMs };
}

function requireDuration(token: ClauseToken): number {
  const ms = parseDuration(token.value);
  if (ms === undefined) {
    throw invalid(
      token,
      `${token.key}= requires a duration such as 500ms, 10s or 1m30s, got '${token.value}'`
    );
  }
  return ms;
}

/**
 * Dispatch a clause token to its sub-grammar
 */
function parseClause(token: ClauseToken): Clause {
  const { key, value, position } = token;

  switch (key) {
    case "using": {
      const method = value.toUpperCase();
      if (!isMethod(method)) {
        throw invalid(
          token,
          `using= requires an HTTP method (${HTTP_METHODS.join(", ")}), got '${value}'`,
          suggest(method, HTTP_METHODS)
        );
      }
      return { kind: "method", method };
    }
    case "with":
      return parseBody(token);
    case "include":
      return { kind: "include", items: parseIncludeItems(value, position) };
    case "attach":
      return { kind: "attach", ...parseAttach(value, position) };
    case "expect":
      return { kind: "expect", checks: parseExpectChecks(value, position, "expect") };
    case "until":
      return { kind: "until", checks: parseExpectChecks(value, position, "until") };
    case "as": {
      const format = value.toLowerCase();
      if (!isFormat(format)) {
        throw invalid(
          token,
          `as= requires one of ${OUTPUT_FORMATS.join(", ")}, got '${value}'`,
          suggest(format, OUTPUT_FORMATS)
        );
      }
      return { kind: "format", format };
    }
    case "to":
      if (value.trim() === "") throw invalid(token, "to= requires a path");
      return { kind: "destination", path: value };
    case "retry":
      if (!/^\d+$/.test(value)) {
        throw invalid(token, `retry= requires a non-negative integer, got '${value}'`);
      }
      return { kind: "retry", count: parseInt(value, 10) };
    case "backoff":
      return parseBackoff(token);
    case "timeout":
      return { kind: "timeout", ms: requireDuration(token) };
    case "every": {
      const ms = requireDuration(token);
      if (ms <= 0) throw invalid(token, "every= requires a positive interval");
      return { kind: "every", ms };
    }
    case "under": {
      const ms = parseDuration(value);
      if (ms !== undefined) return { kind: "under", limit: { kind: "duration", ms } };
      const bytes = parseSize(value);
      if (bytes !== undefined) return { kind: "under", limit: { kind: "size", bytes } };
      throw invalid(
        token,
        `under= requires a duration (30s) or a size (10MB), got '${value}'`
      );
    }
    case "via":
      if (!token.isUrl) {
        throw invalid(token, `via= requires an http:// or https:// proxy URL, got '${value}'`);
      }
      return { kind: "proxy", url: value };
    case "follow":
      if (value !== "smart") {
        throw invalid(
          token,
          `follow= only accepts 'smart', got '${value}'`,
          suggest(value, ["smart"])
        );
      }
      return { kind: "follow", policy: "smart" };
    case "insecure": {
      const flag = value.toLowerCase();
      if (flag !== "true" && flag !== "false") {
        throw invalid(token, `insecure= requires true or false, got '${value}'`);
      }
      return { kind: "insecure", enabled: flag === "true" };
    }
    case "pick":
      if (!value.startsWith("$")) {
        throw invalid(token, `pick= requires a JSONPath starting with '$', got '${value}'`);
      }
      return { kind: "pick", path: value };
    default: {
      const replacement = RETIRED_KEYS[key];
      if (replacement !== undefined) {
        throw invalid(token, `'${key}=' is not supported`, `${replacement}=`);
      }
      const hint = suggest(key, CLAUSE_KEYS);
      throw invalid(
        token,
        `unknown clause '${key}='`,
        hint === undefined ? undefined : `${hint}=`
      );
    }
  }
}

function parseFlag(token: WordToken): Clause {
  switch (token.text.toLowerCase()) {
    case "verbose":
      return { kind: "verbose" };
    case "resume":
      return { kind: "resume" };
    case "insecure":
      return { kind: "insecure", enabled: true };
    default: {
      const hint =
        suggest(token.text, FLAG_WORDS) ??
        suggest(token.text, CLAUSE_KEYS);
      throw new ParseError(`unexpected word '${token.text}'`, {
        position: token.position,
        token: token.text,
        suggestion:
          hint === undefined || isOneOf(FLAG_WORDS, hint)
            ? hint
            : `${hint}=`,
      });
    }
  }
}

// ============================================================================
// Command
// ============================================================================

/**
 * Parse the `session <subcommand> <host>` form
 */
function parseSessionTarget(
  tokens: Token[]
): { subcommand: SessionSubcommand; target: string; next: number } {
  const sub = tokens[1];
  if (!sub || sub.kind !== "word") {
    throw new ParseError("session requires a subcommand: show, clear or use", {
      position: sub?.position ?? 0,
      token: sub ? describe(sub) : "",
    });
  }

  const subcommand = sub.text.toLowerCase();
  if (!isSubcommand(subcommand)) {
    throw new ParseError(`unknown session subcommand '${sub.text}'`, {
      position: sub.position,
      token: sub.text,
      suggestion: suggest(subcommand, SESSION_SUBCOMMANDS),
    });
  }

  const host = tokens[2];
  if (!host || host.kind === "clause") {
    throw new ParseError(`session ${subcommand} requires a host`, {
      position: host?.position ?? sub.position,
      token: host ? describe(host) : "",
    });
  }

  const target = isUrl(host.text) ? host.text : `https://${host.text}`;
  return { subcommand, target, next: 3 };
}

export function parse(tokens: Token[]): Command {
  const first = tokens[0];
  if (!first) {
    throw new ParseError("missing verb", { position: 0 });
  }
  const verb = first.kind === "word" ? first.text.toLowerCase() : "";
  if (!isVerb(verb)) {
    const text = describe(first);
    throw new ParseError(`unknown verb '${text}'`, {
      position: first.position,
      token: text,
      suggestion: suggest(first.kind === "clause" ? first.key : text, VERB_NAMES),
    });
  }

  let target: string;
  let sessionSubcommand: SessionSubcommand | undefined;
  let index: number;

  if (verb === "session") {
    const session = parseSessionTarget(tokens);
    target = session.target;
    sessionSubcommand = session.subcommand;
    index = session.next;
  } else {
    const urlToken = tokens[1];
    if (!urlToken) {
      throw new ParseError(`${verb} requires a target URL`, {
        position: first.position + describe(first).length,
      });
    }
    if (urlToken.kind !== "url") {
      throw new ParseError(
        `expected a URL starting with http:// or https://, got '${describe(urlToken)}'`,
        { position: urlToken.position, token: describe(urlToken) }
      );
    }
    target = urlToken.text;
    index = 2;
  }

  const clauses: Clause[] = [];
  const seen = new Set<string>();

  for (const token of tokens.slice(index)) {
    let clause: Clause;
    let key: string;

    if (token.kind === "url") {
      throw new ParseError(`unexpected URL '${token.text}', only one target is allowed`, {
        position: token.position,
        token: token.text,
      });
    } else if (token.kind === "word") {
      clause = parseFlag(token);
      key = token.text.toLowerCase();
    } else {
      clause = parseClause(token);
      key = token.key;
    }

    if (!isClauseKey(key) || !isRepeatable(key)) {
      if (seen.has(key)) {
        throw new ParseError(`duplicate clause '${key}', only one is allowed`, {
          position: token.position,
          token: describe(token),
        });
      }
      seen.add(key);
    }

    clauses.push(clause);
  }

  return sessionSubcommand === undefined
    ? { verb, target, clauses }
    : { verb, target, clauses, sessionSubcommand };
}

/**
 * Tokenize and parse a full command line
 */
export function parseCommand(input: string): Command {
  return parse(tokenize(input));
}
