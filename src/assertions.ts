/**
 * reqline - Response Assertions
 * Evaluates expect= and until= checks against a response
 */

import { ExpectationError } from "./errors";
import { evaluateJsonPath, nodeText } from "./jsonpath";
import type { ResponseAnalyzer } from "./response";
import type { ExpectCheck } from "./types";

export type CheckResult =
  | { ok: true }
  | { ok: false; message: string; expected: string; actual: string };

function failure(message: string, expected: string, actual: string): CheckResult {
  return { ok: false, message, expected, actual };
}

export function describeCheck(check: ExpectCheck): string {
  switch (check.type) {
    case "status":
      return `status:${check.value}`;
    case "header":
      return `header:${check.name}=${check.value}`;
    case "contains":
      return `contains:${check.value}`;
    case "jsonpath":
      return check.value === undefined
        ? `jsonpath:${check.path}`
        : `jsonpath:${check.path}=${check.value}`;
    case "matches":
      return `matches:${check.pattern}`;
  }
}

function runJsonPath(
  response: ResponseAnalyzer,
  path: string,
  expected: string | undefined
): CheckResult {
  const document = response.json();
  if (document === undefined) {
    return failure(`expected JSON body for ${path}, body is not JSON`, "JSON", "non-JSON body");
  }

  let nodes: unknown[];
  try {
    nodes = evaluateJsonPath(document, path);
  } catch (error) {
    return failure(
      `cannot evaluate ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "evaluation error"
    );
  }

  if (nodes.length === 0) {
    return failure(`expected ${path} to match, found nothing`, path, "no match");
  }
  if (expected === undefined) return { ok: true };

  const values = nodes.map(nodeText);
  if (values.includes(expected)) return { ok: true };

  const actual = values.length === 1 ? (values[0] ?? "") : JSON.stringify(values);
  return failure(`expected ${path} = ${expected}, got ${actual}`, expected, actual);
}

/**
 * Evaluate a single check
 */
export function runCheck(response: ResponseAnalyzer, check: ExpectCheck): CheckResult {
  switch (check.type) {
    case "status": {
      const actual = String(response.status);
      return actual === check.value
        ? { ok: true }
        : failure(`expected status ${check.value}, got ${actual}`, check.value, actual);
    }
    case "header": {
      const actual = response.getFirstHeader(check.name);
      if (actual === check.value) return { ok: true };
      return actual === undefined
        ? failure(`expected header ${check.name}=${check.value}, header missing`, check.value, "missing")
        : failure(`expected header ${check.name}=${check.value}, got ${actual}`, check.value, actual);
    }
    case "contains":
      return response.bodyContains(check.value)
        ? { ok: true }
        : failure(`expected body to contain '${check.value}'`, check.value, "not found");
    case "jsonpath":
      return runJsonPath(response, check.path, check.value);
    case "matches":
      return response.bodyMatches(new RegExp(check.pattern))
        ? { ok: true }
        : failure(`expected body to match /${check.pattern}/`, check.pattern, "no match");
  }
}

/**
 * Run checks in order; the first failure wins
 */
export function evaluateChecks(
  response: ResponseAnalyzer,
  checks: readonly ExpectCheck[]
): CheckResult {
  for (const check of checks) {
    const result = runCheck(response, check);
    if (!result.ok) return result;
  }
  return { ok: true };
}

/**
 * Throw ExpectationError on the first failing check
 */
export function assertChecks(response: ResponseAnalyzer, checks: readonly ExpectCheck[]): void {
  const result = evaluateChecks(response, checks);
  if (!result.ok) {
    throw new ExpectationError(result.message, result.expected, result.actual);
  }
}
