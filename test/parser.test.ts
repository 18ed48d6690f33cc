import { describe, expect, test } from "vitest";
import { ParseError } from "../src/errors";
import { parseCommand } from "../src/parser";

function parseFailure(input: string): ParseError {
  try {
    parseCommand(input);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`expected '${input}' to fail`);
}

describe("parseCommand", () => {
  describe("verb and target", () => {
    test("parses a bare read", () => {
      expect(parseCommand("read https://api.example.com/users")).toEqual({
        verb: "read",
        target: "https://api.example.com/users",
        clauses: [],
      });
    });

    test("verbs are case-insensitive", () => {
      expect(parseCommand("READ https://x.test").verb).toBe("read");
    });

    test("suggests the closest verb", () => {
      const error = parseFailure("reed https://x.test");
      expect(error.message).toBe("unknown verb 'reed'");
      expect(error.suggestion).toBe("read");
      expect(error.position).toBe(0);
    });

    test("requires a URL target", () => {
      const error = parseFailure("read api.example.com");
      expect(error.message).toBe(
        "expected a URL starting with http:// or https://, got 'api.example.com'"
      );
      expect(error.position).toBe(5);
    });

    test("a missing target is reported after the verb", () => {
      const error = parseFailure("save");
      expect(error.message).toBe("save requires a target URL");
      expect(error.position).toBe(4);
    });

    test("rejects a second URL", () => {
      expect(parseFailure("read https://a.test https://b.test").message).toBe(
        "unexpected URL 'https://b.test', only one target is allowed"
      );
    });

    test("missing verb", () => {
      expect(parseFailure("").message).toBe("missing verb");
    });
  });

  describe("session", () => {
    test("a bare host becomes an https target", () => {
      expect(parseCommand("session show api.example.com")).toEqual({
        verb: "session",
        target: "https://api.example.com",
        clauses: [],
        sessionSubcommand: "show",
      });
    });

    test("keeps an explicit URL", () => {
      const command = parseCommand("session clear http://localhost:8080");
      expect(command.target).toBe("http://localhost:8080");
      expect(command.sessionSubcommand).toBe("clear");
    });

    test("unknown subcommand gets a hint", () => {
      const error = parseFailure("session shw api.example.com");
      expect(error.message).toBe("unknown session subcommand 'shw'");
      expect(error.suggestion).toBe("show");
    });

    test("requires a host", () => {
      expect(parseFailure("session use").message).toBe("session use requires a host");
    });
  });

  describe("clauses", () => {
    test("using= upper-cases the method", () => {
      expect(parseCommand("send https://x.test using=put").clauses).toEqual([
        { kind: "method", method: "PUT" },
      ]);
    });

    test("using= suggests a method", () => {
      const error = parseFailure("send https://x.test using=PUTT");
      expect(error.suggestion).toBe("PUT");
    });

    test("infers a JSON body", () => {
      const command = parseCommand(`send https://x.test with='{"name":"Ada"}'`);
      expect(command.clauses).toEqual([
        {
          kind: "body",
          source: { kind: "inline", content: '{"name":"Ada"}' },
          type: "json",
          inferred: true,
        },
      ]);
    });

    test("typed form body", () => {
      const command = parseCommand("send https://x.test with=form:a=1&b=2");
      expect(command.clauses).toEqual([
        { kind: "body", source: { kind: "inline", content: "a=1&b=2" }, type: "form", inferred: false },
      ]);
    });

    test("file and stdin bodies", () => {
      expect(parseCommand("send https://x.test with=@data.json").clauses).toEqual([
        { kind: "body", source: { kind: "file", path: "data.json" }, type: "json", inferred: true },
      ]);
      expect(parseCommand("send https://x.test with=@-").clauses).toEqual([
        { kind: "body", source: { kind: "stdin" }, type: "raw", inferred: false },
      ]);
    });

    test("rejects invalid inline JSON", () => {
      const error = parseFailure("send https://x.test with='{bad'");
      expect(error.message.startsWith("with= body is not valid JSON")).toBe(true);
    });

    test("durations and sizes", () => {
      const command = parseCommand(
        "read https://x.test timeout=10s under=10MB backoff=100ms..2s retry=2"
      );
      expect(command.clauses).toEqual([
        { kind: "timeout", ms: 10_000 },
        { kind: "under", limit: { kind: "size", bytes: 10 * 1024 * 1024 } },
        { kind: "backoff", minMs: 100, maxMs: 2000 },
        { kind: "retry", count: 2 },
      ]);
    });

    test("under= takes a duration too", () => {
      expect(parseCommand("read https://x.test under=2s").clauses).toEqual([
        { kind: "under", limit: { kind: "duration", ms: 2000 } },
      ]);
    });

    test("backoff= rejects an inverted range", () => {
      expect(parseFailure("read https://x.test backoff=5s..1s").message).toBe(
        "backoff= minimum 5s exceeds maximum 1s"
      );
    });

    test("flags", () => {
      expect(parseCommand("save https://x.test/a.bin resume verbose insecure").clauses).toEqual([
        { kind: "resume" },
        { kind: "verbose" },
        { kind: "insecure", enabled: true },
      ]);
    });

    test("unknown word suggests a flag", () => {
      const error = parseFailure("read https://x.test verbos");
      expect(error.message).toBe("unexpected word 'verbos'");
      expect(error.suggestion).toBe("verbose");
    });

    test("include= may repeat", () => {
      const command = parseCommand(
        "read https://x.test include='header: A: 1' include='param: b=2'"
      );
      expect(command.clauses).toHaveLength(2);
    });

    test("a quoted header value keeps its commas, semicolons and equals signs", () => {
      const command = parseCommand(
        "read https://x.test include='header: Accept: application/json, text/plain; q=0.9'"
      );
      expect(command.clauses).toEqual([
        {
          kind: "include",
          items: [
            { type: "header", name: "Accept", value: "application/json, text/plain; q=0.9" },
          ],
        },
      ]);
    });

    test("singleton clauses may not repeat", () => {
      const error = parseFailure("read https://x.test as=json as=raw");
      expect(error.message).toBe("duplicate clause 'as', only one is allowed");
    });

    test.each([
      ["using", "using=POST using=PUT"],
      ["with", "with=a with=b"],
      ["expect", "expect=status:200 expect=status:201"],
      ["to", "to=a.txt to=b.txt"],
      ["pick", "pick=$.a pick=$.b"],
      ["retry", "retry=1 retry=2"],
      ["backoff", "backoff=1s..2s backoff=1s..3s"],
      ["timeout", "timeout=1s timeout=2s"],
      ["under", "under=1KB under=2KB"],
      ["via", "via=http://a.test via=http://b.test"],
      ["follow", "follow=smart follow=smart"],
      ["every", "every=1s every=2s"],
      ["until", "until=status:200 until=status:201"],
      ["insecure", "insecure insecure"],
      ["verbose", "verbose verbose"],
      ["resume", "resume resume"],
    ])("%s may appear only once", (key, clauses) => {
      const error = parseFailure(`watch https://x.test ${clauses}`);
      expect(error.message).toBe(`duplicate clause '${key}', only one is allowed`);
    });

    test("unknown clause suggests the closest key", () => {
      const error = parseFailure("read https://x.test expct=status:200");
      expect(error.message).toBe("unknown clause 'expct='");
      expect(error.suggestion).toBe("expect=");
      expect(error.position).toBe(20);
    });

    test("retired keys point at their replacement", () => {
      const error = parseFailure("read https://x.test headers='Accept: text/plain'");
      expect(error.message).toBe("'headers=' is not supported");
      expect(error.suggestion).toBe("include=");
    });

    test("via= requires a URL", () => {
      expect(parseFailure("read https://x.test via=proxy.test").message).toBe(
        "via= requires an http:// or https:// proxy URL, got 'proxy.test'"
      );
    });

    test("pick= requires a JSONPath", () => {
      expect(parseCommand("read https://x.test pick=$.items[0]").clauses).toEqual([
        { kind: "pick", path: "$.items[0]" },
      ]);
      expect(parseFailure("read https://x.test pick=items").message).toBe(
        "pick= requires a JSONPath starting with '$', got 'items'"
      );
    });
  });
});
