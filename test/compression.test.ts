import { brotliCompressSync, deflateRawSync, deflateSync, gzipSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import { decompress, parseContentEncoding } from "../src/compression";
import { ExecutionError } from "../src/errors";

const text = "hello, compressed world";

describe("parseContentEncoding", () => {
  test("splits and lower-cases tokens", () => {
    expect(parseContentEncoding("GZIP, br ,")).toEqual(["gzip", "br"]);
    expect(parseContentEncoding(undefined)).toEqual([]);
  });
});

describe("decompress", () => {
  test("gzip", () => {
    const result = decompress(gzipSync(text), "gzip");
    expect(result.body.toString()).toBe(text);
    expect(result.applied).toEqual(["gzip"]);
  });

  test("brotli", () => {
    expect(decompress(brotliCompressSync(text), "br").body.toString()).toBe(text);
  });

  test("zlib and raw deflate", () => {
    expect(decompress(deflateSync(text), "deflate").body.toString()).toBe(text);
    expect(decompress(deflateRawSync(text), "deflate").body.toString()).toBe(text);
  });

  test("unwraps layers in reverse order", () => {
    const layered = brotliCompressSync(gzipSync(text));
    const result = decompress(layered, "gzip, br");

    expect(result.body.toString()).toBe(text);
    expect(result.applied).toEqual(["br", "gzip"]);
  });

  test("identity and unknown encodings pass through", () => {
    const result = decompress(Buffer.from(text), "identity, zstd");
    expect(result.body.toString()).toBe(text);
    expect(result.applied).toEqual([]);
  });

  test("an empty body is left alone", () => {
    expect(decompress(Buffer.alloc(0), "gzip").applied).toEqual([]);
  });

  test("corrupt data is an execution error", () => {
    expect(() => decompress(Buffer.from("not gzip"), "gzip")).toThrow(ExecutionError);
  });
});
