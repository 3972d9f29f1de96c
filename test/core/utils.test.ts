import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { escapeRegExp, hasGlobCharacters, matchesGlob } from "../../src/core/utils/glob.js";
import { getByPath, parseConfigValue, setByPath } from "../../src/core/utils/object-path.js";
import { parseIntegerOption, parseLineNumberOption, parseMergeStrategyOption } from "../../src/core/utils/options.js";
import { nameFromArn } from "../../src/core/utils/records.js";

describe("matchesGlob", () => {
  it("matches shell wildcards against the whole name", () => {
    expect(matchesGlob("app.ts", "*.ts")).toBe(true);
    expect(matchesGlob("app.tsx", "*.ts")).toBe(false);
    expect(matchesGlob("file1.md", "file?.md")).toBe(true);
    expect(matchesGlob("file12.md", "file?.md")).toBe(false);
  });

  it("supports character sets and negated sets", () => {
    expect(matchesGlob("b.txt", "[abc].txt")).toBe(true);
    expect(matchesGlob("bcd", "[!a]*")).toBe(true);
    expect(matchesGlob("abc", "[!a]*")).toBe(false);
  });

  it("treats an unclosed bracket and regex characters literally", () => {
    expect(matchesGlob("[abc", "[abc")).toBe(true);
    expect(matchesGlob("a+b", "a+b")).toBe(true);
    expect(matchesGlob("aab", "a+b")).toBe(false);
  });
});

describe("glob helpers", () => {
  it("detects wildcard characters", () => {
    expect(hasGlobCharacters("svc-*")).toBe(true);
    expect(hasGlobCharacters("service")).toBe(false);
  });

  it("escapes regular expression characters", () => {
    expect(escapeRegExp("a.b(c)")).toBe("a\\.b\\(c\\)");
  });
});

describe("object paths", () => {
  it("reads dotted and indexed paths", () => {
    const value = { a: { b: [{ c: 1 }, { c: 2 }] } };

    expect(getByPath(value, "a.b[1].c")).toBe(2);
    expect(getByPath(value, "a.b.0.c")).toBe(1);
    expect(getByPath(value, "a.x.c")).toBeUndefined();
    expect(getByPath(value, "")).toBe(value);
  });

  it("creates intermediate objects when setting", () => {
    const target: Record<string, unknown> = { defaults: "flat" };

    setByPath(target, "defaults.mainBranch", "main");

    expect(target).toEqual({ defaults: { mainBranch: "main" } });
  });

  it("parses JSON literals and keeps other text", () => {
    expect(parseConfigValue("30")).toBe(30);
    expect(parseConfigValue("true")).toBe(true);
    expect(parseConfigValue('"x"')).toBe("x");
    expect(parseConfigValue("main")).toBe("main");
  });
});

describe("option parsers", () => {
  it("parses integers", () => {
    expect(parseIntegerOption(" 12 ")).toBe(12);
    expect(() => parseIntegerOption("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption("99999999999999999999")).toThrow("number is out of supported range: 99999999999999999999");
  });

  it("requires positive line numbers", () => {
    expect(parseLineNumberOption("4")).toBe(4);
    expect(() => parseLineNumberOption("0")).toThrow("line number must be a positive integer, got: 0");
  });

  it("accepts only known merge strategies", () => {
    expect(parseMergeStrategyOption("three_way")).toBe("three_way");
    expect(() => parseMergeStrategyOption("rebase")).toThrow(
      "strategy must be one of fast_forward, squash, three_way, got: rebase"
    );
  });
});

describe("nameFromArn", () => {
  it("keeps the last path segment", () => {
    expect(nameFromArn("arn:aws:sts::123456789012:assumed-role/dev/alice")).toBe("alice");
    expect(nameFromArn("arn:aws:iam::123456789012:user/bob")).toBe("bob");
    expect(nameFromArn(undefined)).toBe("");
  });
});
