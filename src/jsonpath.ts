/**
 * reqline - JSONPath Evaluation
 */

import { JSONPath } from "jsonpath-plus";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const ROOT_KEY = "root";

/**
 * Every node matched by `path`; throws on a path jsonpath-plus cannot evaluate
 */
export function evaluateJsonPath(document: JsonValue, path: string): unknown[] {
  if (!path.startsWith("$")) {
    throw new Error(`JSONPath must start with '$', got '${path}'`);
  }

  // jsonpath-plus matches nothing on a falsy document (0, false, null)
  const result: unknown = JSONPath({
    path: `$.${ROOT_KEY}${path.slice(1)}`,
    json: { [ROOT_KEY]: document },
    wrap: true,
  });
  return Array.isArray(result) ? result : [];
}

/**
 * String form used to compare a matched node with an expected value
 */
export function nodeText(node: unknown): string {
  return typeof node === "string" ? node : JSON.stringify(node) ?? "undefined";
}
