/**
 * reqline - Output Rendering
 */

import { ExecutionError } from "./errors";
import { evaluateJsonPath, nodeText, type JsonValue } from "./jsonpath";
import type { OutputPlan } from "./types";

function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

function pretty(value: JsonValue): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/**
 * Render a body for stdout. json re-indents, auto re-indents only on a
 * terminal, everything else passes through.
 */
export function render(body: Buffer, format: OutputPlan["format"], isTty: boolean): string {
  const text = body.toString("utf-8");

  switch (format) {
    case "json": {
      const parsed = parseJson(text);
      return parsed === undefined ? text : pretty(parsed);
    }
    case "auto": {
      if (!isTty) return text;
      const parsed = parseJson(text);
      return parsed === undefined ? text : pretty(parsed);
    }
    case "csv":
    case "text":
    case "raw":
      return text;
  }
}

/**
 * Replace a JSON body with the nodes selected by `path`. A single string
 * node is returned bare, one other node as JSON, several as a JSON array.
 */
export function pick(body: Buffer, path: string): Buffer {
  const document = parseJson(body.toString("utf-8"));
  if (document === undefined) {
    throw new ExecutionError(`pick=${path} needs a JSON response body`);
  }

  let nodes: unknown[];
  try {
    nodes = evaluateJsonPath(document, path);
  } catch (error) {
    throw new ExecutionError(`cannot evaluate pick=${path}`, error);
  }

  if (nodes.length === 0) {
    throw new ExecutionError(`pick=${path} matched nothing`);
  }

  const selected = nodes.length === 1 ? nodeText(nodes[0]) : JSON.stringify(nodes);
  return Buffer.from(selected, "utf-8");
}
