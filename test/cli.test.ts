import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { joinArgs, quoteArg, run, type CliIo } from "../src/cli";
import { formatHelp } from "../src/grammar";
import { MemoryStream } from "./helpers/streams";
import { startServer, type TestServer } from "./helpers/testServer";

let dir: string;
let server: TestServer;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "reqline-cli-"));
  server = await startServer({
    "/ok": (_req, res) => res.writeHead(200, { "Content-Type": "text/plain" }).end("fine"),
  });
});

afterEach(async () => {
  await server.close();
  await rm(dir, { recursive: true, force: true });
});

function io(): CliIo & { stdout: MemoryStream; stderr: MemoryStream } {
  return {
    stdout: new MemoryStream(),
    stderr: new MemoryStream(),
    stdin: Readable.from([]),
    env: { REQLINE_SESSION_DIR: join(dir, "sessions"), REQLINE_LOG_LEVEL: "silent" },
    stdoutIsTty: false,
    stderrIsTty: false,
    sleep: async () => undefined,
  };
}

describe("argument quoting", () => {
  test("plain arguments pass through", () => {
    expect(quoteArg("read")).toBe("read");
    expect(quoteArg("as=json")).toBe("as=json");
  });

  test("clause values with spaces or quotes are single-quoted", () => {
    expect(quoteArg("include=header: Accept: text/plain")).toBe(
      "include='header: Accept: text/plain'"
    );
    expect(quoteArg(`with={"a":1}`)).toBe(`with='{"a":1}'`);
    expect(quoteArg("with=it's")).toBe("with='it\\'s'");
  });

  test("already quoted values are kept", () => {
    expect(quoteArg("with='a b'")).toBe("with='a b'");
  });

  test("joins a clause the shell split at its spaces", () => {
    expect(joinArgs(["read", "https://x.test", "expect=status:200,", "contains:ok"])).toBe(
      "read https://x.test expect=status:200, contains:ok"
    );
  });
});

describe("run", () => {
  test("--version prints the version", async () => {
    const streams = io();
    expect(await run(["--version"], streams)).toBe(0);
    expect(streams.stdout.text()).toBe("0.1.0\n");
  });

  test("help prints the grammar", async () => {
    const streams = io();
    expect(await run(["help"], streams)).toBe(0);
    expect(streams.stdout.text()).toBe(formatHelp());
  });

  test("no arguments prints help", async () => {
    const streams = io();
    expect(await run([], streams)).toBe(0);
    expect(streams.stdout.text()).toBe(formatHelp());
  });

  test("success exits 0 and prints the body", async () => {
    const streams = io();
    expect(await run(["read", `${server.url}/ok`], streams)).toBe(0);
    expect(streams.stdout.text()).toBe("fine");
    expect(streams.stderr.lines()).toEqual([
      "HTTP 200 OK",
      `URL: ${server.url}/ok`,
      "Size: 4 bytes",
      "Content-Type: text/plain",
    ]);
  });

  test("404 without checks exits 4", async () => {
    const streams = io();
    expect(await run(["read", `${server.url}/missing`], streams)).toBe(4);
    expect(streams.stderr.lines().at(-1)).toBe("Error: HTTP 404 Not Found");
  });

  test("404 with expect=status:404 exits 0", async () => {
    expect(await run(["read", `${server.url}/missing`, "expect=status:404"], io())).toBe(0);
  });

  test("a failed expectation exits 3", async () => {
    const streams = io();
    expect(await run(["read", `${server.url}/ok`, "expect=status:201"], streams)).toBe(3);
    expect(streams.stderr.lines().at(-1)).toBe("Error: expected status 201, got 200");
  });

  test("an unknown clause exits 5 with a hint", async () => {
    const streams = io();
    expect(await run(["read", `${server.url}/ok`, "expct=status:200"], streams)).toBe(5);
    expect(streams.stderr.lines()).toEqual([
      "Error: unknown clause 'expct='",
      "Hint: Try using 'expect=' instead",
    ]);
    expect(server.requests).toHaveLength(0);
  });

  test("a plan error exits 5", async () => {
    const streams = io();
    expect(await run(["upload", `${server.url}/ok`], streams)).toBe(5);
    expect(streams.stderr.lines()).toEqual([
      "Error: upload requires with= or attach=",
      "Hint: Try using 'attach=' instead",
    ]);
  });

  test("--dry-run prints the plan without sending", async () => {
    const streams = io();

    expect(
      await run(["--dry-run", "read", `${server.url}/ok`, "include=param: page=2"], streams)
    ).toBe(0);

    expect(JSON.parse(streams.stdout.text())).toMatchObject({
      verb: "read",
      method: "GET",
      url: `${server.url}/ok`,
      queryParams: [["page", "2"]],
    });
    expect(server.requests).toHaveLength(0);
  });

  test("explain describes the plan", async () => {
    const streams = io();

    expect(
      await run(["explain", "read", "https://api.example.com/users", "include=param: page=2"], streams)
    ).toBe(0);

    expect(streams.stdout.text()).toBe(
      "read: GET https://api.example.com/users\n  param    page=2\n  output   stdout as auto\n"
    );
  });

  test("session commands run without a request", async () => {
    const streams = io();
    expect(await run(["session", "show", "api.example.com"], streams)).toBe(0);
    expect(streams.stdout.text()).toBe("No session found for api.example.com\n");
  });

  test("an invalid configuration exits 5", async () => {
    const streams = io();
    streams.env.REQLINE_TIMEOUT = "soon";

    expect(await run(["read", `${server.url}/ok`], streams)).toBe(5);
    expect(streams.stderr.text().startsWith("Error: invalid configuration")).toBe(true);
  });

  test("an unknown option exits 5", async () => {
    expect(await run(["--bogus"], io())).toBe(5);
  });
});
