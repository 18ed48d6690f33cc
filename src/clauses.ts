/**
 * reqline - Clause Sub-grammars
 * Item-level parsing for include=, attach=, expect= and until=
 */

import { ParseError } from "./errors";
import { suggest } from "./suggest";
import { unquote } from "./tokenizer";
import { isOneOf, type AttachPart, type ExpectCheck, type IncludeItem } from "./types";

const INCLUDE_TAGS = ["header", "param", "cookie", "basic"] as const;
const EXPECT_TAGS = ["status", "header", "contains", "jsonpath", "matches"] as const;
const ATTACH_TAGS = ["part", "boundary"] as const;
const PART_KEYS = ["name", "file", "value", "filename", "type"] as const;

type PartKey = (typeof PART_KEYS)[number];

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split on a separator that is outside quotes and brackets
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === undefined) break;

    if (quote !== null) {
      if (c === "\\" && i + 1 < text.length) {
        current += c + text[i + 1];
        i++;
        continue;
      }
      if (c === quote) quote = null;
      current += c;
      continue;
    }

    if (c === "'" || c === '"') {
      quote = c;
    } else if (c === "[") {
      depth++;
    } else if (c === "]" && depth > 0) {
      depth--;
    } else if (c === separator && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += c;
  }

  parts.push(current);
  return parts;
}

function tagOf<T extends string>(fragment: string, tags: readonly T[]): T | undefined {
  const match = fragment.trimStart().match(/^([A-Za-z]+)\s*:/);
  const tag = match?.[1]?.toLowerCase();
  return tags.find((t) => t === tag);
}

/**
 * Split a clause value into tagged items. A fragment without a known tag
 * belongs to the item before it, separator included.
 */
export function splitItems(
  text: string,
  separator: string,
  tags: readonly string[]
): string[] {
  const items: string[] = [];

  for (const fragment of splitTopLevel(text, separator)) {
    const last = items.length - 1;
    if (tagOf(fragment, tags) === undefined && last >= 0) {
      items[last] += separator + fragment;
    } else {
      items.push(fragment);
    }
  }

  return items.map((item) => item.trim()).filter((item) => item !== "");
}

function itemBody(item: string): string {
  return item.slice(item.indexOf(":") + 1).trim();
}

function splitAt(text: string, separator: string): [string, string] | undefined {
  const index = text.indexOf(separator);
  if (index === -1) return undefined;
  return [text.slice(0, index).trim(), text.slice(index + separator.length).trim()];
}

function unknownTag(
  kind: string,
  item: string,
  tags: readonly string[],
  position: number
): ParseError {
  const word = item.trim().split(/[\s:=]/)[0] ?? item;
  const hint = suggest(word, tags);
  return new ParseError(
    `unknown ${kind} item '${item.trim()}', expected one of: ${tags.join(", ")}`,
    { position, token: item, suggestion: hint === undefined ? undefined : `${hint}:` }
  );
}

// ============================================================================
// include=
// ============================================================================

export function parseIncludeItems(value: string, position = 0): IncludeItem[] {
  const items: IncludeItem[] = [];

  for (const item of splitItems(value, ";", INCLUDE_TAGS)) {
    const tag = tagOf(item, INCLUDE_TAGS);
    const body = itemBody(item);
    const fail = (message: string) =>
      new ParseError(`${message}, got '${item}'`, { position, token: item });

    switch (tag) {
      case "header": {
        const pair = splitAt(body, ":");
        if (!pair || pair[0] === "") {
          throw fail("header item requires 'header: Name: Value'");
        }
        items.push({ type: "header", name: pair[0], value: unquote(pair[1]) });
        break;
      }
      case "param":
      case "cookie": {
        const pair = splitAt(body, "=");
        if (!pair || pair[0] === "") {
          throw fail(`${tag} item requires '${tag}: name=value'`);
        }
        items.push({ type: tag, name: pair[0], value: unquote(pair[1]) });
        break;
      }
      case "basic": {
        const credentials = unquote(body);
        if (credentials.split(":").length !== 2) {
          throw fail("basic item requires exactly one ':' as in 'basic: user:pass'");
        }
        items.push({ type: "basic", credentials });
        break;
      }
      default:
        throw unknownTag("include", item, INCLUDE_TAGS, position);
    }
  }

  if (items.length === 0) {
    throw new ParseError("include= requires at least one item", { position });
  }
  return items;
}

// ============================================================================
// expect= / until=
// ============================================================================

/**
 * Split `$.a[?(@.b=='x')]=value` at the first `=` outside brackets and quotes
 */
function splitJsonPath(text: string): { path: string; value?: string } {
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quote !== null) {
      if (c === quote) quote = null;
    } else if (c === "'" || c === '"') {
      quote = c;
    } else if (c === "[") {
      depth++;
    } else if (c === "]") {
      depth = Math.max(0, depth - 1);
    } else if (c === "=" && depth === 0) {
      return { path: text.slice(0, i).trim(), value: unquote(text.slice(i + 1).trim()) };
    }
  }

  return { path: text.trim() };
}

export function parseExpectChecks(
  value: string,
  position = 0,
  clause = "expect"
): ExpectCheck[] {
  const checks: ExpectCheck[] = [];

  for (const item of splitItems(value, ",", EXPECT_TAGS)) {
    const tag = tagOf(item, EXPECT_TAGS);
    const body = itemBody(item);
    const fail = (message: string) =>
      new ParseError(`${message}, got '${item}'`, { position, token: item });

    switch (tag) {
      case "status":
        if (!/^\d{3}$/.test(body)) {
          throw fail("status check requires a three-digit code");
        }
        checks.push({ type: "status", value: body });
        break;
      case "header": {
        const pair = splitAt(body, "=");
        if (!pair || pair[0] === "") {
          throw fail("header check requires 'header:Name=Value'");
        }
        checks.push({ type: "header", name: pair[0], value: unquote(pair[1]) });
        break;
      }
      case "contains": {
        const text = unquote(body);
        if (text === "") throw fail("contains check requires text");
        checks.push({ type: "contains", value: text });
        break;
      }
      case "jsonpath": {
        const { path, value: expected } = splitJsonPath(body);
        if (!path.startsWith("$")) {
          throw fail("jsonpath check requires a path starting with '$'");
        }
        checks.push(
          expected === undefined
            ? { type: "jsonpath", path }
            : { type: "jsonpath", path, value: expected }
        );
        break;
      }
      case "matches": {
        const pattern = unquote(body);
        try {
          new RegExp(pattern);
        } catch (error) {
          throw fail(
            `matches check has an invalid pattern (${error instanceof Error ? error.message : String(error)})`
          );
        }
        checks.push({ type: "matches", pattern });
        break;
      }
      default:
        throw unknownTag(clause, item, EXPECT_TAGS, position);
    }
  }

  if (checks.length === 0) {
    throw new ParseError(`${clause}= requires at least one check`, { position });
  }
  return checks;
}

// ============================================================================
// attach=
// ============================================================================

function isPartKey(key: string): key is PartKey {
  return isOneOf(PART_KEYS, key);
}

function parsePart(fieldList: string, item: string, position: number): AttachPart {
  const fields = new Map<PartKey, string>();

  // A fragment without `key=` continues the previous value, e.g. value=a,b
  const pairs: string[] = [];
  for (const fragment of splitTopLevel(fieldList, ",")) {
    const last = pairs.length - 1;
    if (!/^\s*[A-Za-z]+\s*=/.test(fragment) && last >= 0) {
      pairs[last] += "," + fragment;
    } else {
      pairs.push(fragment);
    }
  }

  for (const pair of pairs) {
    const split = splitAt(pair, "=");
    if (!split) {
      throw new ParseError(`part field requires key=value, got '${pair.trim()}'`, {
        position,
        token: item,
      });
    }
    const [key, raw] = split;
    const lowered = key.toLowerCase();
    if (!isPartKey(lowered)) {
      const hint = suggest(key, PART_KEYS);
      throw new ParseError(`unknown part field '${key}'`, {
        position,
        token: item,
        suggestion: hint === undefined ? undefined : `${hint}=`,
      });
    }
    fields.set(lowered, unquote(raw));
  }

  const name = fields.get("name");
  if (name === undefined || name === "") {
    throw new ParseError(`part requires name=, got '${item}'`, { position, token: item });
  }

  const file = fields.get("file");
  const value = fields.get("value");
  if ((file === undefined) === (value === undefined)) {
    throw new ParseError(`part '${name}' requires exactly one of file= or value=`, {
      position,
      token: item,
    });
  }

  const part: AttachPart = { name };
  if (file !== undefined) {
    if (!file.startsWith("@") || file.length < 2) {
      throw new ParseError(`part '${name}' file must be written as file=@path`, {
        position,
        token: item,
      });
    }
    part.filePath = file.slice(1);
  }
  if (value !== undefined) part.value = value;

  const filename = fields.get("filename");
  if (filename !== undefined) part.filename = filename;
  const type = fields.get("type");
  if (type !== undefined) part.contentType = type;

  return part;
}

export function parseAttach(
  value: string,
  position = 0
): { parts: AttachPart[]; boundary?: string } {
  const parts: AttachPart[] = [];
  let boundary: string | undefined;

  for (const item of splitItems(value, ";", ATTACH_TAGS)) {
    const tag = tagOf(item, ATTACH_TAGS);
    const body = itemBody(item);

    if (tag === "part") {
      parts.push(parsePart(body, item, position));
    } else if (tag === "boundary") {
      const text = unquote(body);
      if (!/^[A-Za-z0-9'()+_,\-./:=? ]{1,70}$/.test(text) || text.endsWith(" ")) {
        throw new ParseError(`invalid multipart boundary '${text}'`, {
          position,
          token: item,
        });
      }
      boundary = text;
    } else {
      throw unknownTag("attach", item, ATTACH_TAGS, position);
    }
  }

  if (parts.length === 0) {
    throw new ParseError("attach= requires at least one part", { position });
  }
  return boundary === undefined ? { parts } : { parts, boundary };
}
