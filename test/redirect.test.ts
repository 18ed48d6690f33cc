import { describe, expect, test } from "vitest";
import { CookieJar, decideRedirect, parseSetCookie, sameOrigin } from "../src/redirect";
import type { RedirectContext } from "../src/redirect";

function context(overrides: Partial<RedirectContext>): RedirectContext {
  return {
    verb: "read",
    follow: "default",
    method: "GET",
    status: 302,
    location: "/next",
    currentUrl: "https://api.example.com/start",
    ...overrides,
  };
}

describe("decideRedirect", () => {
  test("non-redirect statuses stop", () => {
    expect(decideRedirect(context({ status: 200 }))).toEqual({ action: "stop" });
    expect(decideRedirect(context({ location: undefined }))).toEqual({ action: "stop" });
  });

  test("read follows and resolves relative locations", () => {
    expect(decideRedirect(context({}))).toEqual({
      action: "follow",
      method: "GET",
      url: "https://api.example.com/next",
      keepBody: false,
    });
  });

  test("authenticate turns POST into GET on 303", () => {
    expect(decideRedirect(context({ verb: "authenticate", method: "POST", status: 303 }))).toEqual({
      action: "follow",
      method: "GET",
      url: "https://api.example.com/next",
      keepBody: false,
    });
  });

  test("307 and 308 keep method and body", () => {
    expect(decideRedirect(context({ verb: "save", method: "POST", status: 308 }))).toEqual({
      action: "follow",
      method: "POST",
      url: "https://api.example.com/next",
      keepBody: true,
    });
  });

  test("send advises on 301 instead of following", () => {
    expect(decideRedirect(context({ verb: "send", method: "POST", status: 301 }))).toEqual({
      action: "advise",
      message: "Advisory: 301 redirect for write verb, not following",
    });
  });

  test("send stops silently on 307 without smart follow", () => {
    expect(decideRedirect(context({ verb: "send", method: "PUT", status: 307 }))).toEqual({
      action: "stop",
    });
  });

  test("smart follow keeps writes on 307", () => {
    expect(
      decideRedirect(context({ verb: "send", method: "PATCH", status: 307, follow: "smart" }))
    ).toEqual({
      action: "follow",
      method: "PATCH",
      url: "https://api.example.com/next",
      keepBody: true,
    });
  });

  test("smart follow rejects other redirects for writes", () => {
    expect(
      decideRedirect(context({ verb: "send", method: "POST", status: 302, follow: "smart" }))
    ).toEqual({
      action: "reject",
      message: "not following 302 redirect for write verb, use 307/308",
    });
  });

  test("smart follow treats reads normally", () => {
    expect(decideRedirect(context({ verb: "inspect", method: "HEAD", status: 301, follow: "smart" })))
      .toEqual({
        action: "follow",
        method: "HEAD",
        url: "https://api.example.com/next",
        keepBody: true,
      });
  });

  test("watch does not follow", () => {
    expect(decideRedirect(context({ verb: "watch" }))).toEqual({ action: "stop" });
  });
});

describe("cookies", () => {
  test("parseSetCookie takes the leading pair", () => {
    expect(parseSetCookie("sid=abc=; Path=/; HttpOnly")).toEqual({ name: "sid", value: "abc=" });
    expect(parseSetCookie("=broken")).toBeUndefined();
  });

  test("the jar scopes cookies by host and honours expiry", () => {
    const jar = new CookieJar();
    jar.store("https://a.test/login", ["sid=1", "theme=dark"]);
    jar.store("https://a.test/logout", ["theme=; Max-Age=0"]);
    jar.store("https://b.test/", ["other=2"]);

    expect(jar.cookiesFor("https://a.test/home")).toEqual({ sid: "1" });
    expect(jar.cookiesFor("https://b.test/x")).toEqual({ other: "2" });
    expect(jar.cookiesFor("https://c.test/")).toEqual({});
  });

  test("sameOrigin compares scheme, host and port", () => {
    expect(sameOrigin("https://a.test/x", "https://a.test/y")).toBe(true);
    expect(sameOrigin("https://a.test/", "http://a.test/")).toBe(false);
    expect(sameOrigin("http://a.test:8080/", "http://a.test/")).toBe(false);
  });
});
