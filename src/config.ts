/**
 * reqline - Runtime Configuration
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ExitCode, ReqlineError } from "./errors";
import { parseDuration } from "./units";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_REDIRECTS = 5;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const ConfigSchema = z.object({
  sessionDir: z.string().min(1),
  timeoutMs: z
    .number({ required_error: "REQLINE_TIMEOUT must be a duration such as 30s" })
    .int()
    .positive(),
  logLevel: z.enum(LOG_LEVELS),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Build the configuration once at start-up from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const timeout = env.REQLINE_TIMEOUT;
  const timeoutMs =
    timeout === undefined || timeout === "" ? DEFAULT_TIMEOUT_MS : parseDuration(timeout);

  const result = ConfigSchema.safeParse({
    sessionDir: env.REQLINE_SESSION_DIR || join(homedir(), ".config", "reqline"),
    timeoutMs,
    logLevel: (env.REQLINE_LOG_LEVEL || "warn").toLowerCase(),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ReqlineError(ExitCode.INVALID_COMMAND, `invalid configuration: ${issues}`);
  }

  return result.data;
}
