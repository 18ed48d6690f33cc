/**
 * reqline - Encoding Utilities
 */

export class Encoder {
  /**
   * Base64 encode a UTF-8 string
   */
  static base64(str: string): string {
    return Buffer.from(str, "utf-8").toString("base64");
  }

  /**
   * Authorization value for `user:pass` credentials
   */
  static basicAuth(credentials: string): string {
    return `Basic ${this.base64(credentials)}`;
  }

  /**
   * Percent-decode a path segment, leaving malformed escapes as they are
   */
  static decodePathSegment(segment: string): string {
    try {
      return decodeURIComponent(segment);
    } catch {
      return segment;
    }
  }

  /**
   * Escape a value for a quoted header parameter such as filename="..."
   */
  static quotedParam(str: string): string {
    return str
      .replace(/\\/g, "\\\\")
      .replace(/"/g, '\\"')
      .replace(/\r|\n/g, " ");
  }
}
