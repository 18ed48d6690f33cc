/**
 * reqline - Session Subcommands
 */

import { ExecutionError, PlanError } from "./errors";
import { extractHost, redactSession, type SessionStore } from "./session";
import type { Command } from "./types";

export interface SessionCommandIo {
  sessions: SessionStore;
  stdout: NodeJS.WritableStream;
}

function wantsJson(command: Command): boolean {
  return command.clauses.some((c) => c.kind === "format" && c.format === "json");
}

/**
 * show, clear and use act on the store alone and send no request
 */
export async function runSessionCommand(command: Command, io: SessionCommandIo): Promise<void> {
  const extra = command.clauses.find((c) => c.kind !== "format");
  if (extra !== undefined) {
    throw new PlanError(`session ${command.sessionSubcommand ?? ""} accepts only as=, got ${extra.kind}`, "as=json");
  }

  const host = extractHost(command.target);

  switch (command.sessionSubcommand) {
    case "show": {
      const session = await io.sessions.load(host);
      if (session === null) {
        io.stdout.write(`No session found for ${host}\n`);
        return;
      }
      if (wantsJson(command)) {
        io.stdout.write(`${JSON.stringify(session, null, 2)}\n`);
        return;
      }

      const redacted = redactSession(session);
      const lines = [`Session for ${redacted.host}:`];
      const names = Object.keys(redacted.cookies);
      if (names.length > 0) {
        lines.push("Cookies:", ...names.map((name) => `  ${name}: ***`));
      }
      if (redacted.authorization !== undefined) {
        lines.push(`Authorization: ${redacted.authorization}`);
      }
      io.stdout.write(`${lines.join("\n")}\n`);
      return;
    }
    case "clear":
      await io.sessions.delete(host);
      io.stdout.write(`Session cleared for ${host}\n`);
      return;
    case "use": {
      const session = await io.sessions.load(host);
      if (session === null) {
        throw new ExecutionError(`no session found for ${host}`);
      }
      io.stdout.write(`export REQLINE_SESSION_HOST=${host}\n`);
      return;
    }
    case undefined:
      throw new PlanError("session requires a subcommand: show, clear or use");
  }
}
