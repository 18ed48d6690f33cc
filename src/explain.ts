/**
 * reqline - Plan Explanation
 */

import { describeCheck } from "./assertions";
import type { ExecutionPlan, PlanBody } from "./types";

function describeBody(body: PlanBody): string {
  if (body.type === "multipart") {
    const names = body.parts.map((p) => (p.filePath !== undefined ? `${p.name}=@${p.filePath}` : p.name));
    return `multipart (${names.join(", ")})`;
  }
  const source =
    body.source.kind === "inline"
      ? `${body.source.content.length} bytes inline`
      : body.source.kind === "file"
        ? `file ${body.source.path}`
        : "stdin";
  return `${body.type}${body.inferred ? " (inferred)" : ""}, ${source}`;
}

/**
 * Human-readable summary of what a plan would do
 */
export function explainPlan(plan: ExecutionPlan): string {
  const lines = [`${plan.verb}: ${plan.method} ${plan.url}`];

  for (const [name, value] of Object.entries(plan.headers)) {
    lines.push(`  header   ${name}: ${value}`);
  }
  for (const [name, value] of plan.queryParams) {
    lines.push(`  param    ${name}=${value}`);
  }
  for (const name of Object.keys(plan.cookies)) {
    lines.push(`  cookie   ${name}`);
  }
  if (plan.body !== undefined) lines.push(`  body     ${describeBody(plan.body)}`);

  const output = plan.output.destination !== undefined
    ? `to ${plan.output.destination}`
    : `stdout as ${plan.output.format}`;
  lines.push(`  output   ${output}${plan.output.pick !== undefined ? `, pick ${plan.output.pick}` : ""}`);

  if (plan.expect.length > 0) {
    lines.push(`  expect   ${plan.expect.map(describeCheck).join(", ")}`);
  }
  if (plan.retry !== undefined) {
    const { count, backoff } = plan.retry;
    lines.push(`  retry    ${count} times, ${backoff.minMs}ms..${backoff.maxMs}ms`);
  }
  if (plan.timeoutMs !== undefined) lines.push(`  timeout  ${plan.timeoutMs}ms`);
  if (plan.sizeLimit !== undefined) lines.push(`  limit    ${plan.sizeLimit} bytes`);
  if (plan.proxy !== undefined) lines.push(`  proxy    ${plan.proxy}`);
  if (plan.follow === "smart") lines.push("  follow   smart (307/308 only for writes)");
  if (plan.insecure) lines.push("  tls      verification disabled");
  if (plan.poll !== undefined) {
    const until = plan.poll.until.map(describeCheck).join(", ");
    lines.push(`  poll     every ${plan.poll.intervalMs}ms${until !== "" ? ` until ${until}` : ""}`);
  }

  return `${lines.join("\n")}\n`;
}
