import { describe, expect, test } from "vitest";
import { assertChecks, evaluateChecks } from "../src/assertions";
import { ExpectationError } from "../src/errors";
import { ResponseAnalyzer } from "../src/response";
import { makeResponse } from "./helpers/responses";

describe("ResponseAnalyzer", () => {
  const response = makeResponse(200, '{"ok":true}', {
    "Content-Type": "application/json",
    "Set-Cookie": ["a=1; Path=/", "b=2"],
    "Content-Encoding": ["gzip", "br"],
  });
  const analyzer = new ResponseAnalyzer(response);

  test("reads headers case-insensitively", () => {
    expect(analyzer.hasHeader("CONTENT-TYPE")).toBe(true);
    expect(analyzer.getContentType()).toBe("application/json");
    expect(analyzer.getHeader("x-missing")).toBeUndefined();
  });

  test("joins repeated content encodings", () => {
    expect(analyzer.getContentEncoding()).toBe("gzip, br");
  });

  test("collects every Set-Cookie line", () => {
    expect(analyzer.getCookies()).toEqual(["a=1; Path=/", "b=2"]);
  });

  test("parses JSON bodies", () => {
    expect(analyzer.json()).toEqual({ ok: true });
    expect(new ResponseAnalyzer(makeResponse(200, "plain")).json()).toBeUndefined();
  });

  test("status helpers", () => {
    expect(analyzer.isSuccess()).toBe(true);
    expect(new ResponseAnalyzer(makeResponse(503)).isServerError()).toBe(true);
    expect(analyzer.hasStatus(200)).toBe(true);
  });

  test("summary flattens single-valued headers", () => {
    expect(analyzer.summary()).toEqual({
      status: 200,
      statusText: "OK",
      headers: {
        "content-type": "application/json",
        "set-cookie": ["a=1; Path=/", "b=2"],
        "content-encoding": ["gzip", "br"],
      },
    });
  });
});

describe("assertions", () => {
  const body = JSON.stringify({ items: [{ id: 42, name: "Ada" }, { id: 7, name: "Grace" }] });
  const analyzer = new ResponseAnalyzer(
    makeResponse(200, body, { "Content-Type": "application/json" })
  );

  test("all checks pass", () => {
    expect(
      evaluateChecks(analyzer, [
        { type: "status", value: "200" },
        { type: "header", name: "content-type", value: "application/json" },
        { type: "contains", value: "Grace" },
        { type: "jsonpath", path: "$.items[0].id", value: "42" },
        { type: "jsonpath", path: "$.items[*].name", value: "Grace" },
        { type: "matches", pattern: '"id":\\s*7' },
      ])
    ).toEqual({ ok: true });
  });

  test("status mismatch", () => {
    expect(evaluateChecks(analyzer, [{ type: "status", value: "201" }])).toEqual({
      ok: false,
      message: "expected status 201, got 200",
      expected: "201",
      actual: "200",
    });
  });

  test("the first failure wins", () => {
    const result = evaluateChecks(analyzer, [
      { type: "contains", value: "Linus" },
      { type: "status", value: "500" },
    ]);
    expect(result).toMatchObject({ ok: false, message: "expected body to contain 'Linus'" });
  });

  test("missing and mismatched headers", () => {
    expect(evaluateChecks(analyzer, [{ type: "header", name: "X-Id", value: "1" }])).toMatchObject({
      message: "expected header X-Id=1, header missing",
    });
    expect(
      evaluateChecks(analyzer, [{ type: "header", name: "Content-Type", value: "text/plain" }])
    ).toMatchObject({ message: "expected header Content-Type=text/plain, got application/json" });
  });

  test("jsonpath failures", () => {
    expect(
      evaluateChecks(analyzer, [{ type: "jsonpath", path: "$.items[0].id", value: "7" }])
    ).toMatchObject({ message: "expected $.items[0].id = 7, got 42" });
    expect(evaluateChecks(analyzer, [{ type: "jsonpath", path: "$.missing" }])).toMatchObject({
      message: "expected $.missing to match, found nothing",
    });
    expect(
      evaluateChecks(new ResponseAnalyzer(makeResponse(200, "<html>")), [
        { type: "jsonpath", path: "$.a" },
      ])
    ).toMatchObject({ message: "expected JSON body for $.a, body is not JSON" });
  });

  test("jsonpath matches a falsy document root", () => {
    for (const body of ["false", "0", "null"]) {
      const falsy = new ResponseAnalyzer(makeResponse(200, body));
      expect(evaluateChecks(falsy, [{ type: "jsonpath", path: "$" }])).toEqual({ ok: true });
      expect(evaluateChecks(falsy, [{ type: "jsonpath", path: "$", value: body }])).toEqual({
        ok: true,
      });
    }
  });

  test("jsonpath compares objects as JSON", () => {
    expect(
      evaluateChecks(analyzer, [{ type: "jsonpath", path: "$.items[1]", value: '{"id":7,"name":"Grace"}' }])
    ).toEqual({ ok: true });
  });

  test("assertChecks throws an ExpectationError", () => {
    expect(() => assertChecks(analyzer, [{ type: "matches", pattern: "^\\[" }])).toThrow(
      new ExpectationError("expected body to match /^\\[/", "^\\[", "no match")
    );
  });
});
