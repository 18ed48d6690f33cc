/**
 * reqline - Response Analyzer
 */

import type { JsonValue } from "./jsonpath";
import type { HttpResponse } from "./types";

export class ResponseAnalyzer {
  constructor(private response: HttpResponse) {}

  get status(): number {
    return this.response.status;
  }

  /**
   * Body decoded as UTF-8
   */
  text(): string {
    return this.response.body.toString("utf-8");
  }

  /**
   * Body parsed as JSON, undefined when it is not JSON
   */
  json(): JsonValue | undefined {
    try {
      const parsed: JsonValue = JSON.parse(this.text());
      return parsed;
    } catch {
      return undefined;
    }
  }

  /**
   * Check if the raw body bytes contain a string
   */
  bodyContains(search: string): boolean {
    return this.response.body.includes(Buffer.from(search, "utf-8"));
  }

  /**
   * Check if response body matches a regex
   */
  bodyMatches(pattern: RegExp): boolean {
    return pattern.test(this.text());
  }

  /**
   * Check if a header exists
   */
  hasHeader(name: string): boolean {
    return this.response.headers.has(name.toLowerCase());
  }

  /**
   * Get header value(s)
   */
  getHeader(name: string): string[] | undefined {
    return this.response.headers.get(name.toLowerCase());
  }

  /**
   * Get first header value
   */
  getFirstHeader(name: string): string | undefined {
    return this.getHeader(name)?.[0];
  }

  /**
   * Check status code
   */
  hasStatus(code: number): boolean {
    return this.response.status === code;
  }

  /**
   * Check if status is in range (e.g., 200-299 for success)
   */
  hasStatusInRange(min: number, max: number): boolean {
    return this.response.status >= min && this.response.status <= max;
  }

  isSuccess(): boolean {
    return this.hasStatusInRange(200, 299);
  }

  isServerError(): boolean {
    return this.hasStatusInRange(500, 599);
  }

  getContentType(): string | undefined {
    return this.getFirstHeader("content-type");
  }

  /**
   * Every Content-Encoding value, comma-joined in arrival order
   */
  getContentEncoding(): string | undefined {
    return this.getHeader("content-encoding")?.join(", ");
  }

  getLocation(): string | undefined {
    return this.getFirstHeader("location");
  }

  /**
   * Extract all cookies from Set-Cookie headers
   */
  getCookies(): string[] {
    return this.getHeader("set-cookie") ?? [];
  }

  /**
   * Status and headers as a plain object, one string per single-valued header
   */
  summary(): { status: number; statusText: string; headers: Record<string, string | string[]> } {
    const headers: Record<string, string | string[]> = {};
    for (const [name, values] of this.response.headers) {
      headers[name] = values.length === 1 && values[0] !== undefined ? values[0] : values;
    }
    return { status: this.response.status, statusText: this.response.statusText, headers };
  }
}
