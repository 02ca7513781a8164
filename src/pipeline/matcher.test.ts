import { describe, it, expect } from "vitest";
import { compilePattern, filterMatching } from "./matcher";
import { PatternError } from "../errors";
import type { CandidateItem } from "./types";

function item(title: string): CandidateItem {
  return { guid: title, title, link: null, enclosures: [], vendorLinks: [] };
}

describe("compilePattern", () => {
  it("matches a title prefix and rejects other titles", () => {
    const matcher = compilePattern("^Ubuntu");

    expect(matcher.matches("Ubuntu 24.04 Desktop")).toBe(true);
    expect(matcher.matches("Debian 12 Netinst")).toBe(false);
  });

  it("matches anywhere in the title, not the whole string", () => {
    const matcher = compilePattern("1080p");

    expect(matcher.matches("Some.Show.S01E02.1080p.WEB")).toBe(true);
  });

  it("is case-sensitive", () => {
    const matcher = compilePattern("ubuntu");

    expect(matcher.matches("Ubuntu 24.04 Desktop")).toBe(false);
  });

  it("gives the same answer on repeated calls", () => {
    const matcher = compilePattern("Desktop");

    expect(matcher.matches("Ubuntu 24.04 Desktop")).toBe(true);
    expect(matcher.matches("Ubuntu 24.04 Desktop")).toBe(true);
  });

  it("throws PatternError for an unterminated group", () => {
    expect(() => compilePattern("(unterminated")).toThrow(PatternError);
  });

  it("carries the offending pattern on the error", () => {
    let caught: unknown;
    try {
      compilePattern("[a-");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PatternError);
    if (caught instanceof PatternError) {
      expect(caught.pattern).toBe("[a-");
      expect(caught.message).toMatch(/^invalid pattern "\[a-": /);
    }
  });
});

describe("filterMatching", () => {
  it("keeps matching items in feed order", () => {
    const matcher = compilePattern("^Ubuntu");
    const items = [
      item("Ubuntu 24.04 Desktop"),
      item("Debian 12 Netinst"),
      item("Ubuntu 24.04 Server"),
    ];

    expect(filterMatching(matcher, items).map((i) => i.title)).toEqual([
      "Ubuntu 24.04 Desktop",
      "Ubuntu 24.04 Server",
    ]);
  });
});
