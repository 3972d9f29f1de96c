import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { consoleUrl, formatLinkLine, hyperlink } from "../../src/core/output/links.js";
import { stripAnsi, styleText, visibleLength } from "../../src/core/output/style.js";
import { formatCell, renderTable } from "../../src/core/output/table.js";
import { formatTimeAgo, formatTimestamp } from "../../src/core/output/time.js";

const plain = new Chalk({ level: 0 });
const ansi = new Chalk({ level: 1 });
const NOW = new Date("2024-05-01T12:00:00Z");

function secondsAgo(seconds: number): Date {
  return new Date(NOW.getTime() - seconds * 1000);
}

describe("renderTable", () => {
  it("draws a titled table with a counter column", () => {
    const output = renderTable(
      [
        { name: "a", n: 1 },
        { name: "bbb", n: 22 },
      ],
      ["name", "count=n"],
      { colors: plain, counter: true, title: "repos:" }
    );

    expect(output.split("\n")).toEqual([
      "repos:",
      "┏━━━┳━━━━━━┳━━━━━━━┓",
      "┃ # ┃ name ┃ count ┃",
      "┡━━━╇━━━━━━╇━━━━━━━┩",
      "│ 1 │ a    │ 1     │",
      "│ 2 │ bbb  │ 22    │",
      "└───┴──────┴───────┘",
      "",
    ]);
  });

  it("colors the first matching pattern and pads by visible width", () => {
    const output = renderTable([{ status: "Succeeded" }, { status: "Failed" }], ["status"], {
      colors: ansi,
      colorize: { status: ["Succ=green", ".*=red"] },
    });
    const lines = output.split("\n");

    expect(lines[1]).toBe(`┃ ${ansi.bold("status")}    ┃`);
    expect(lines[3]).toBe(`│ ${ansi.green("Succeeded")} │`);
    expect(lines[4]).toBe(`│ ${ansi.red("Failed")}    │`);
  });

  it("dims flagged records", () => {
    const output = renderTable([{ stage: "Build", _dim: true }], ["stage"], { colors: ansi });

    expect(output.split("\n")[3]).toBe(`│ ${ansi.dim("Build")} │`);
  });

  it("renders relative times for timeAgo columns", () => {
    const output = renderTable([{ when: secondsAgo(7200) }], ["when"], { colors: plain, timeAgo: ["when"], now: NOW });

    expect(output.split("\n")[3]).toBe("│ 2 hours ago │");
  });
});

describe("formatCell", () => {
  it("formats the supported value types", () => {
    expect(formatCell(undefined, false, NOW)).toBe("");
    expect(formatCell(null, false, NOW)).toBe("");
    expect(formatCell(new Date("2024-03-01T09:05:00Z"), false, NOW)).toBe("2024-03-01 09:05:00");
    expect(formatCell(3, false, NOW)).toBe("3");
    expect(formatCell(true, false, NOW)).toBe("true");
    expect(formatCell({ a: 1 }, false, NOW)).toBe('{"a":1}');
  });

  it("keeps strings that are not dates in relative columns", () => {
    expect(formatCell("soon", true, NOW)).toBe("soon");
    expect(formatCell("2024-05-01T11:00:00Z", true, NOW)).toBe("1 hour ago");
  });
});

describe("formatTimeAgo", () => {
  it("picks the largest whole unit", () => {
    expect(formatTimeAgo(secondsAgo(5), NOW)).toBe("just now");
    expect(formatTimeAgo(secondsAgo(45), NOW)).toBe("45 seconds ago");
    expect(formatTimeAgo(secondsAgo(61), NOW)).toBe("1 minute ago");
    expect(formatTimeAgo(secondsAgo(3 * 86400), NOW)).toBe("3 days ago");
    expect(formatTimeAgo(secondsAgo(45 * 86400), NOW)).toBe("1 month ago");
  });

  it("describes future dates", () => {
    expect(formatTimeAgo(secondsAgo(-3600), NOW)).toBe("in 1 hour");
    expect(formatTimeAgo(secondsAgo(-2), NOW)).toBe("right now");
  });
});

describe("formatTimestamp", () => {
  it("prints UTC without milliseconds", () => {
    expect(formatTimestamp(new Date("2024-03-01T09:05:00.123Z"))).toBe("2024-03-01 09:05:00");
  });
});

describe("links", () => {
  it("builds regional console URLs", () => {
    expect(consoleUrl("eu-west-1", "/codepipeline/pipelines/service_master/view")).toBe(
      "https://eu-west-1.console.aws.amazon.com/codesuite/codepipeline/pipelines/service_master/view?region=eu-west-1"
    );
    expect(consoleUrl("eu-west-1", "/codecommit/repositories?x=1")).toBe(
      "https://eu-west-1.console.aws.amazon.com/codesuite/codecommit/repositories?x=1&region=eu-west-1"
    );
    expect(consoleUrl("eu-west-1", "https://example.test/a")).toBe("https://example.test/a");
  });

  it("emits hyperlinks only when colors are on", () => {
    expect(hyperlink(plain, "https://example.test", "docs")).toBe("docs");
    expect(hyperlink(ansi, "https://example.test", "docs")).toBe(
      "\u001b]8;;https://example.test\u0007docs\u001b]8;;\u0007"
    );
  });

  it("formats the link line", () => {
    expect(formatLinkLine(plain, "https://example.test")).toBe("link: https://example.test\n");
  });
});

describe("style", () => {
  it("applies style specs", () => {
    expect(styleText(ansi, "bold red", "x")).toBe(ansi.bold.red("x"));
    expect(() => styleText(plain, "blink", "x")).toThrow("Unknown style: blink");
  });

  it("measures text without escape sequences", () => {
    const text = `${ansi.green("ok")} ${hyperlink(ansi, "https://example.test", "link")}`;

    expect(stripAnsi(text)).toBe("ok link");
    expect(visibleLength(text)).toBe(7);
  });
});
