/**
 * reqline - Tokenizer
 * Splits a command line into words, URLs and key=value clauses
 */

import { CLAUSE_KEYS, FLAG_WORDS } from "./grammar";
import { isOneOf, type ClauseToken, type Token } from "./types";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*/;
const TYPED_PATTERN = /^([A-Za-z][A-Za-z0-9_-]*):([\s\S]*)$/;
const URL_PREFIX = /^https?:\/\//i;

function isWhitespace(c: string | undefined): boolean {
  return c === " " || c === "\t" || c === "\n" || c === "\r";
}

function isQuote(c: string | undefined): c is "'" | '"' {
  return c === "'" || c === '"';
}

export function isUrl(text: string): boolean {
  return URL_PREFIX.test(text);
}

export function isJsonShaped(text: string): boolean {
  const trimmed = text.trimStart();
  return trimmed.startsWith("{") || trimmed.startsWith("[");
}

/**
 * Strip one pair of matching outer quotes, resolving escapes inside them
 */
export function unquote(text: string): string {
  const first = text[0];
  if (!isQuote(first) || text.length < 2 || !text.endsWith(first)) {
    return text;
  }
  let out = "";
  for (let i = 1; i < text.length - 1; i++) {
    const c = text[i];
    const next = text[i + 1];
    if (c === "\\" && i + 1 < text.length - 1 && (next === first || next === "\\")) {
      out += next;
      i++;
    } else {
      out += c;
    }
  }
  return out;
}

/**
 * Does the remainder of the line begin a new clause or a bare flag?
 */
function startsNextToken(rest: string): boolean {
  if (rest === "") return true;

  const key = rest.match(KEY_PATTERN)?.[0];
  if (!key) return false;

  const after = rest[key.length];
  if (after === "=" && CLAUSE_KEYS.includes(key)) return true;

  return (
    isOneOf(FLAG_WORDS, key) &&
    (after === undefined || isWhitespace(after))
  );
}

interface ScannedValue {
  value: string;
  quoted: boolean;
  end: number;
}

/**
 * Read a clause value starting at `start`.
 *
 * A quote opening the value is dropped along with its escapes. Quoted
 * segments later in the value are kept verbatim so the clause sub-grammars
 * can still split around them.
 */
function scanValue(input: string, start: number): ScannedValue {
  const quoted = isQuote(input[start]);
  let out = "";
  let quote: string | null = null;
  let stripping = false;
  let i = start;

  while (i < input.length) {
    const c = input[i];
    if (c === undefined) break;

    if (quote !== null) {
      const next = input[i + 1];
      if (c === "\\" && (next === quote || next === "\\")) {
        out += stripping ? next : c + next;
        i += 2;
        continue;
      }
      if (c === quote) {
        if (!stripping) out += c;
        quote = null;
        stripping = false;
        i++;
        continue;
      }
      out += c;
      i++;
      continue;
    }

    if (isQuote(c)) {
      quote = c;
      stripping = i === start;
      if (!stripping) out += c;
      i++;
      continue;
    }

    if (isWhitespace(c)) {
      if (startsNextToken(input.slice(i).trimStart())) break;
    }

    out += c;
    i++;
  }

  return { value: out, quoted, end: i };
}

/**
 * Read a bare chunk up to the next unquoted whitespace, dropping quotes
 */
function scanWord(input: string, start: number): { text: string; end: number } {
  let out = "";
  let quote: string | null = null;
  let i = start;

  while (i < input.length) {
    const c = input[i];
    if (c === undefined) break;

    if (quote !== null) {
      const next = input[i + 1];
      if (c === "\\" && (next === quote || next === "\\")) {
        out += next;
        i += 2;
        continue;
      }
      if (c === quote) {
        quote = null;
      } else {
        out += c;
      }
      i++;
      continue;
    }

    if (isQuote(c)) {
      quote = c;
      i++;
      continue;
    }
    if (isWhitespace(c)) break;

    out += c;
    i++;
  }

  return { text: out, end: i };
}

function clauseToken(
  key: string,
  scanned: ScannedValue,
  position: number
): ClauseToken {
  const token: ClauseToken = {
    kind: "clause",
    key,
    value: scanned.value,
    quoted: scanned.quoted,
    isUrl: isUrl(scanned.value),
    position,
  };

  if (!scanned.quoted && !token.isUrl && !isJsonShaped(scanned.value)) {
    const typed = scanned.value.match(TYPED_PATTERN);
    if (typed && typed[1] !== undefined && typed[2] !== undefined) {
      token.typed = { type: typed[1], value: unquote(typed[2]) };
    }
  }

  return token;
}

/**
 * Tokenize a command line. Never throws; malformed input surfaces as a
 * parse error later on.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    while (i < input.length && isWhitespace(input[i])) i++;
    if (i >= input.length) break;

    const rest = input.slice(i);

    if (isUrl(rest)) {
      const { text, end } = scanWord(input, i);
      tokens.push({ kind: "url", text, position: i });
      i = end;
      continue;
    }

    const key = rest.match(KEY_PATTERN)?.[0];
    if (key && rest[key.length] === "=") {
      const scanned = scanValue(input, i + key.length + 1);
      tokens.push(clauseToken(key, scanned, i));
      i = scanned.end;
      continue;
    }

    const { text, end } = scanWord(input, i);
    tokens.push(
      isUrl(text)
        ? { kind: "url", text, position: i }
        : { kind: "word", text, position: i }
    );
    i = end;
  }

  return tokens;
}
