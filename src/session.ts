/**
 * reqline - Session Store
 * Per-host cookies and authorization persisted under one base directory
 */

import { chmod, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ExitCode, ReqlineError, SessionPermissionError, isNotFound } from "./errors";
import { parseSetCookie } from "./redirect";
import type { Session } from "./types";

const SessionSchema = z.object({
  host: z.string().min(1),
  cookies: z.record(z.string()).default({}),
  authorization: z.string().optional(),
});

/**
 * Authority (host[:port]) of a URL, used as the session key
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).host;
  } catch (error) {
    throw new ReqlineError(ExitCode.INVALID_COMMAND, `invalid URL '${url}'`, {
      cause: error,
    });
  }
}

export class SessionStore {
  constructor(private readonly baseDir: string) {}

  /**
   * Session file path; ':' and '/' in the host become '_'
   */
  pathFor(host: string): string {
    return join(this.baseDir, `session_${host.replace(/[:/]/g, "_")}.json`);
  }

  /**
   * Load a host's session, null when none is stored. Refuses files that
   * group or others can read.
   */
  async load(host: string): Promise<Session | null> {
    const path = this.pathFor(host);

    let mode: number;
    try {
      mode = (await stat(path)).mode;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new ReqlineError(ExitCode.EXECUTION_FAILED, `cannot read session file ${path}`, {
        cause: error,
      });
    }

    if ((mode & 0o044) !== 0) {
      throw new SessionPermissionError(path, mode);
    }

    const raw = await readFile(path, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ReqlineError(ExitCode.EXECUTION_FAILED, `session file ${path} is not valid JSON`, {
        cause: error,
      });
    }

    const result = SessionSchema.safeParse(data);
    if (!result.success) {
      throw new ReqlineError(
        ExitCode.EXECUTION_FAILED,
        `session file ${path} is malformed: ${result.error.issues.map((i) => i.message).join("; ")}`
      );
    }

    const { authorization, ...rest } = result.data;
    return authorization === undefined ? rest : { ...rest, authorization };
  }

  /**
   * Persist a session with owner-only permissions
   */
  async save(session: Session): Promise<void> {
    await mkdir(this.baseDir, { recursive: true, mode: 0o700 });
    const path = this.pathFor(session.host);
    await writeFile(path, `${JSON.stringify(session, null, 2)}\n`, { mode: 0o600 });
    await chmod(path, 0o600);
  }

  /**
   * Remove a host's session; a missing file is not an error
   */
  async delete(host: string): Promise<void> {
    await rm(this.pathFor(host), { force: true });
  }

  /**
   * Merge cookies and an access token from an authenticate response into
   * the stored session
   */
  async updateFromResponse(
    host: string,
    setCookies: readonly string[],
    body: Buffer
  ): Promise<Session> {
    const session = applyResponse(
      (await this.load(host)) ?? { host, cookies: {} },
      setCookies,
      body
    );
    await this.save(session);
    return session;
  }
}

/**
 * Fold Set-Cookie lines and a top-level access_token into a session
 */
export function applyResponse(
  session: Session,
  setCookies: readonly string[],
  body: Buffer
): Session {
  const updated: Session = { ...session, cookies: { ...session.cookies } };

  for (const line of setCookies) {
    const cookie = parseSetCookie(line);
    if (cookie) updated.cookies[cookie.name] = cookie.value;
  }

  if (body.length > 0) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString("utf-8"));
    } catch {
      parsed = undefined;
    }
    if (typeof parsed === "object" && parsed !== null && "access_token" in parsed) {
      const token = parsed.access_token;
      if (typeof token === "string" && token !== "") {
        updated.authorization = `Bearer ${token}`;
      }
    }
  }

  return updated;
}

/**
 * Copy of a session with every secret replaced by ***
 */
export function redactSession(session: Session): Session {
  const cookies: Record<string, string> = {};
  for (const name of Object.keys(session.cookies)) cookies[name] = "***";

  const redacted: Session = { host: session.host, cookies };
  if (session.authorization !== undefined) {
    const scheme = session.authorization.split(" ")[0] ?? "";
    redacted.authorization = scheme !== "" && scheme !== session.authorization
      ? `${scheme} ***`
      : "***";
  }
  return redacted;
}
