import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  checksumBytes,
  checksumFile,
  checksumFromHex,
  checksumToHex,
  cleanPath,
  compareVersions,
  createConsoleLogger,
  defaultStatusMessage,
  parseLogLevel,
  prettifyJson,
  sortVersions,
} from "../src/index.js";

const HELLO_SHA1 = "aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d";
const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

describe("cleanPath", () => {
  it("drops root, current and parent components", () => {
    expect(cleanPath("/../a/./b//c/..\\d")).toBe("a/b/c/d");
    expect(cleanPath("pool/main/m/myapp_1.0_all.deb")).toBe("pool/main/m/myapp_1.0_all.deb");
  });
});

describe("checksums", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("hashes bytes with sha1 and sha256", () => {
    const checksum = checksumBytes(new TextEncoder().encode("hello"));
    expect(checksumToHex(checksum.sha1)).toBe(HELLO_SHA1);
    expect(checksumToHex(checksum.sha256)).toBe(HELLO_SHA256);
  });

  it("hashes a file by streaming it", async () => {
    dir = await mkdtemp(join(tmpdir(), "bintray-checksum-"));
    const file = join(dir, "hello.txt");
    await writeFile(file, "hello");

    const checksum = await checksumFile(file);
    expect(checksumToHex(checksum.sha1)).toBe(HELLO_SHA1);
    expect(checksumToHex(checksum.sha256)).toBe(HELLO_SHA256);
  });

  it("decodes hex and rejects malformed digests", () => {
    const bytes = checksumFromHex("00FFa0");
    expect(bytes).toEqual(new Uint8Array([0, 255, 160]));
    expect(checksumFromHex("abc")).toBeUndefined();
    expect(checksumFromHex("zz")).toBeUndefined();
    expect(checksumFromHex("")).toBeUndefined();
  });
});

describe("compareVersions", () => {
  it("uses semver ordering for semver strings", () => {
    expect(compareVersions("1.10.0", "1.9.0")).toBe(1);
    expect(compareVersions("1.0.0-beta.2", "1.0.0")).toBe(-1);
    expect(compareVersions("2.0.0", "2.0.0")).toBe(0);
  });

  it("falls back to numeric and alphabetic runs", () => {
    expect(sortVersions(["1.10", "1.9", "1.9.1", "1.0rc1", "1.0"])).toEqual([
      "1.0",
      "1.0rc1",
      "1.9",
      "1.9.1",
      "1.10",
    ]);
    expect(compareVersions("1.0.1", "1.0rc1")).toBe(1);
  });

  it("leaves the input untouched", () => {
    const input = ["2", "1"];
    sortVersions(input);
    expect(input).toEqual(["2", "1"]);
  });
});

describe("error helpers", () => {
  it("maps statuses to default messages", () => {
    expect(defaultStatusMessage(401)).toBe("Missing or refused authentication");
    expect(defaultStatusMessage(403)).toBe("Requires admin privileges");
    expect(defaultStatusMessage(404)).toBe("Not found");
    expect(defaultStatusMessage(502)).toBe("Unrecognized error");
  });

  it("pretty-prints JSON and leaves other text alone", () => {
    expect(prettifyJson('{"message":"nope"}')).toBe('{\n  "message": "nope"\n}');
    expect(prettifyJson("<html>")).toBe("<html>");
  });
});

describe("console logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses levels case-insensitively with a warn fallback", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("warn");
    expect(parseLogLevel(undefined, "info")).toBe("info");
  });

  it("prefixes lines with the scope and honours the threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const logger = createConsoleLogger("warn");

    logger.log("warn", "content", "checksum mismatch");
    logger.log("debug", "client", "GET https://api.bintray.com/repos/acme");

    expect(warn).toHaveBeenCalledWith("[bintray:content] checksum mismatch");
    expect(debug).not.toHaveBeenCalled();
  });
});
