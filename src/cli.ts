/**
 * reqline - Command Line Interface
 */

import chalk from "chalk";
import { Command as Program, CommanderError } from "commander";
import { loadConfig } from "./config";
import { StreamDiagnostics } from "./diagnostics";
import { ExitCode, exitCodeOf, suggestionOf } from "./errors";
import { Executor } from "./executor";
import { explainPlan } from "./explain";
import { formatHelp } from "./grammar";
import { createLogger } from "./logger";
import { parseCommand } from "./parser";
import { plan } from "./planner";
import { SessionStore } from "./session";
import { runSessionCommand } from "./sessionCommands";
import type { Transport } from "./transport";
import { VERSION } from "./version";

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream;
  env: NodeJS.ProcessEnv;
  stdoutIsTty: boolean;
  stderrIsTty: boolean;
  /** Replaces the undici transport */
  transport?: Transport;
  sleep?: (ms: number) => Promise<void>;
}

export function processIo(): CliIo {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    env: process.env,
    stdoutIsTty: process.stdout.isTTY === true,
    stderrIsTty: process.stderr.isTTY === true,
  };
}

// ============================================================================
// Argument joining
// ============================================================================

const CLAUSE_ARG = /^([A-Za-z_][A-Za-z0-9_-]*)=([\s\S]*)$/;

function escapeSingle(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function isWrapped(value: string): boolean {
  const first = value[0];
  return value.length >= 2 && (first === "'" || first === '"') && value.endsWith(first);
}

/**
 * Quote one shell argument so the tokenizer sees it as a single word or
 * clause value
 */
export function quoteArg(arg: string): string {
  if (!/[\s'"]/.test(arg)) return arg;

  const match = CLAUSE_ARG.exec(arg);
  const key = match?.[1];
  const value = match?.[2];
  if (key !== undefined && value !== undefined) {
    if (isWrapped(value)) return arg;
    return `${key}='${escapeSingle(value)}'`;
  }
  return isWrapped(arg) ? arg : `'${escapeSingle(arg)}'`;
}

/**
 * Rebuild the command line from argv. Arguments without whitespace or
 * quotes pass through, so a clause the shell split at its spaces joins
 * back up.
 */
export function joinArgs(args: readonly string[]): string {
  return args.map(quoteArg).join(" ");
}

// ============================================================================
// Runner
// ============================================================================

interface RunOptions {
  dryRun: boolean;
}

async function runSentence(words: string[], options: RunOptions, io: CliIo): Promise<void> {
  const first = words[0]?.toLowerCase();

  if (first === undefined || first === "help") {
    io.stdout.write(formatHelp());
    return;
  }

  const explain = first === "explain";
  const line = joinArgs(explain ? words.slice(1) : words);

  const config = loadConfig(io.env);
  const logger = createLogger(config.logLevel);
  const sessions = new SessionStore(config.sessionDir);
  const command = parseCommand(line);
  logger.debug({ verb: command.verb, target: command.target }, "parsed command");

  if (command.verb === "session") {
    if (explain || options.dryRun) {
      io.stdout.write(`session ${command.sessionSubcommand ?? ""} ${command.target}\n`);
      return;
    }
    await runSessionCommand(command, { sessions, stdout: io.stdout });
    return;
  }

  const executionPlan = plan(command);

  if (explain) {
    io.stdout.write(explainPlan(executionPlan));
    return;
  }
  if (options.dryRun) {
    io.stdout.write(`${JSON.stringify(executionPlan, null, 2)}\n`);
    return;
  }

  const executor = new Executor({
    sessions,
    diagnostics: new StreamDiagnostics(io.stderr),
    stdout: io.stdout,
    stdin: io.stdin,
    isTty: io.stdoutIsTty,
    logger,
    transport: io.transport,
    sleep: io.sleep,
    defaultTimeoutMs: config.timeoutMs,
  });
  await executor.execute(executionPlan);
}

function reportError(error: unknown, io: CliIo): void {
  const color = new chalk.Instance({ level: io.stderrIsTty ? 1 : 0 });
  const message = error instanceof Error ? error.message : String(error);
  io.stderr.write(`${color.red("Error:")} ${message}\n`);

  const suggestion = suggestionOf(error);
  if (suggestion !== undefined) {
    io.stderr.write(`${color.yellow("Hint:")} Try using '${suggestion}' instead\n`);
  }
}

/**
 * Run one invocation and return its exit code
 */
export async function run(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  const program = new Program("reqline")
    .description("HTTP client driven by a verb + clause sentence grammar")
    .version(VERSION, "-V, --version")
    .option("--dry-run", "print the execution plan as JSON without sending anything")
    .argument("[words...]", "verb, target and clauses")
    .configureHelp({ formatHelp: () => formatHelp() })
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .exitOverride();

  let failure: unknown;
  program.action(async (words: string[], options: { dryRun?: boolean }) => {
    try {
      await runSentence(words, { dryRun: options.dryRun === true }, io);
    } catch (error) {
      failure = error;
    }
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_COMMAND;
    }
    failure = error;
  }

  if (failure !== undefined) {
    reportError(failure, io);
    return exitCodeOf(failure);
  }
  return ExitCode.SUCCESS;
}
