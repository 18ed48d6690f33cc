/**
 * reqline - Grammar Vocabulary
 * Verbs, clause keys and the help text generated from them
 */

import type { Verb } from "./types";

export interface VerbDefinition {
  name: Verb;
  description: string;
}

export interface ClauseDefinition {
  key: string;
  description: string;
  repeatable: boolean;
  example: string;
}

export const VERB_DEFINITIONS: readonly VerbDefinition[] = [
  { name: "read", description: "GET, print to stdout" },
  { name: "save", description: "GET, write to file via to=" },
  { name: "send", description: "GET, or POST once a body is given" },
  { name: "upload", description: "POST with with= or attach=, required" },
  { name: "watch", description: "GET, stream lines or poll with every=" },
  { name: "inspect", description: "HEAD, print status and headers" },
  { name: "authenticate", description: "log in and store session state" },
  { name: "session", description: "session management (show, clear, use)" },
];

export const CLAUSE_DEFINITIONS: readonly ClauseDefinition[] = [
  {
    key: "using",
    description: "HTTP method override",
    repeatable: false,
    example: "using=PUT",
  },
  {
    key: "include",
    description: "Add headers, params, cookies, basic auth",
    repeatable: true,
    example:
      "include='header: Authorization: Bearer token; param: q=search query; basic: user:pass'",
  },
  {
    key: "with",
    description: "Request body",
    repeatable: false,
    example: `with=@user.json or with='{"name":"Ada"}'`,
  },
  {
    key: "attach",
    description: "Multipart parts for upload or send",
    repeatable: true,
    example:
      "attach='part: name=avatar, file=@me.png; part: name=meta, value=xyz'",
  },
  {
    key: "expect",
    description: "Assertions on the response",
    repeatable: false,
    example:
      'expect=status:200, header:Content-Type=application/json, contains:"ok"',
  },
  {
    key: "as",
    description: "Output format for stdout (json, csv, text, raw)",
    repeatable: false,
    example: "as=json",
  },
  {
    key: "to",
    description: "Destination path",
    repeatable: false,
    example: "to=out.json",
  },
  {
    key: "pick",
    description: "JSONPath selection of the printed body",
    repeatable: false,
    example: "pick=$.items[0].id",
  },
  {
    key: "retry",
    description: "Retry attempts for transient errors",
    repeatable: false,
    example: "retry=3",
  },
  {
    key: "backoff",
    description: "Retry wait range",
    repeatable: false,
    example: "backoff=200ms..5s",
  },
  {
    key: "timeout",
    description: "Deadline for the whole exchange",
    repeatable: false,
    example: "timeout=10s",
  },
  {
    key: "under",
    description: "Timeout or size limit",
    repeatable: false,
    example: "under=30s or under=10MB",
  },
  {
    key: "via",
    description: "Proxy URL",
    repeatable: false,
    example: "via=http://proxy:8080",
  },
  {
    key: "follow",
    description: "Redirect policy for write verbs",
    repeatable: false,
    example: "follow=smart",
  },
  {
    key: "insecure",
    description: "Disable TLS verification for this request",
    repeatable: false,
    example: "insecure=true",
  },
  {
    key: "every",
    description: "Polling interval for watch",
    repeatable: false,
    example: "every=5s",
  },
  {
    key: "until",
    description: "Stop condition for watch polling",
    repeatable: false,
    example: "until=status:200, contains:ready",
  },
];

/** Bare words accepted in clause position */
export const FLAG_WORDS = ["verbose", "resume", "insecure"] as const;

export const CLAUSE_KEYS: readonly string[] = CLAUSE_DEFINITIONS.map(
  (c) => c.key
);

export const VERB_NAMES: readonly string[] = VERB_DEFINITIONS.map(
  (v) => v.name
);

/** Keys retired in favour of the sentence grammar */
export const RETIRED_KEYS: Record<string, string> = {
  method: "using",
  headers: "include",
  header: "include",
  params: "include",
  proxy: "via",
  field: "attach",
};

export function isClauseKey(key: string): boolean {
  return CLAUSE_KEYS.includes(key);
}

export function isRepeatable(key: string): boolean {
  return CLAUSE_DEFINITIONS.some((c) => c.key === key && c.repeatable);
}

/**
 * Format the grammar as help text
 */
export function formatHelp(): string {
  const lines: string[] = [
    "reqline - HTTP client with a sentence grammar",
    "",
    "Usage: reqline <verb> <url> [clauses...]",
    "",
    "Verbs:",
  ];

  for (const verb of VERB_DEFINITIONS) {
    lines.push(`  ${verb.name.padEnd(13)} - ${verb.description}`);
  }

  lines.push("", "Clauses:");
  for (const clause of CLAUSE_DEFINITIONS) {
    const suffix = clause.repeatable ? " (repeatable)" : "";
    lines.push(`  ${(clause.key + "=").padEnd(13)} - ${clause.description}${suffix}`);
    lines.push(`${" ".repeat(17)}Example: ${clause.example}`);
  }

  lines.push(
    "",
    "Flags:",
    `  ${FLAG_WORDS.join(", ")}`,
    "",
    "Examples:",
    "  reqline read https://api.example.com/search include='param: q=search query' as=json",
    "  reqline read https://api.example.com/basic-auth include='basic: user:passwd' expect=status:200",
    `  reqline send https://api.example.com/users using=PUT with='{"name":"Ada"}' expect=status:200`,
    "  reqline upload https://api.example.com/upload attach='part: name=file, file=@./avatar.png, type=image/png'",
    `  reqline authenticate https://api.example.com/login with='{"user":"ada","pass":"test-secret"}'`,
    "  reqline session show api.example.com",
    ""
  );

  return lines.join("\n");
}
