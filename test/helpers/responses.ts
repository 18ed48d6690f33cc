import type { HttpResponse } from "../../src/types";

/**
 * In-memory response for analyzer and assertion tests
 */
export function makeResponse(
  status: number,
  body: string | Buffer = "",
  headers: Record<string, string | string[]> = {}
): HttpResponse {
  const map = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    map.set(name.toLowerCase(), Array.isArray(value) ? value : [value]);
  }
  return {
    status,
    statusText: status === 200 ? "OK" : "",
    headers: map,
    body: typeof body === "string" ? Buffer.from(body) : body,
    url: "https://api.example.com/",
  };
}
