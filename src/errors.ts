/**
 * reqline - Errors and Exit Codes
 */

export enum ExitCode {
  SUCCESS = 0,
  EXPECTATION_FAILED = 3,
  EXECUTION_FAILED = 4,
  INVALID_COMMAND = 5,
}

export class ReqlineError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: Record<string, unknown>;

  constructor(
    exitCode: ExitCode,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ReqlineError";
    this.exitCode = exitCode;
    this.context = options?.context;
  }
}

/**
 * Grammar error with the character offset and offending token
 */
export class ParseError extends ReqlineError {
  readonly position: number;
  readonly token: string;
  readonly suggestion?: string;

  constructor(
    message: string,
    details: { position?: number; token?: string; suggestion?: string } = {}
  ) {
    super(ExitCode.INVALID_COMMAND, message);
    this.name = "ParseError";
    this.position = details.position ?? 0;
    this.token = details.token ?? "";
    this.suggestion = details.suggestion;
  }
}

export class PlanError extends ReqlineError {
  readonly suggestion?: string;

  constructor(message: string, suggestion?: string) {
    super(ExitCode.INVALID_COMMAND, message);
    this.name = "PlanError";
    this.suggestion = suggestion;
  }
}

/**
 * Network, TLS, timeout, size limit, redirect or HTTP status failure
 */
export class ExecutionError extends ReqlineError {
  constructor(message: string, cause?: unknown) {
    super(ExitCode.EXECUTION_FAILED, message, { cause });
    this.name = "ExecutionError";
  }
}

/**
 * Connection failure or timeout before a complete response arrived;
 * the only failure retry= repeats
 */
export class TransportError extends ExecutionError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TransportError";
  }
}

export class ExpectationError extends ReqlineError {
  readonly expected: string;
  readonly actual: string;

  constructor(message: string, expected: string, actual: string) {
    super(ExitCode.EXPECTATION_FAILED, message, {
      context: { expected, actual },
    });
    this.name = "ExpectationError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Session file readable by group or others
 */
export class SessionPermissionError extends ReqlineError {
  readonly path: string;

  constructor(path: string, mode: number) {
    super(
      ExitCode.EXECUTION_FAILED,
      `session file ${path} has insecure permissions ${(mode & 0o777).toString(8)}, expected 600`,
      { context: { path } }
    );
    this.name = "SessionPermissionError";
    this.path = path;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function suggestionOf(error: unknown): string | undefined {
  if (error instanceof ParseError || error instanceof PlanError) {
    return error.suggestion;
  }
  return undefined;
}

export function exitCodeOf(error: unknown): ExitCode {
  return error instanceof ReqlineError
    ? error.exitCode
    : ExitCode.EXECUTION_FAILED;
}
