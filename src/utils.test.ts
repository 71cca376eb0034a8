import { describe, expect, it } from "vitest";
import { isWebUrl, normalizeResults, trimTo } from "./utils";
import { makeResult } from "./testing/fakes";

describe("trimTo", () => {
  it("collapses whitespace", () => {
    expect(trimTo("  a \n\t b  ")).toBe("a b");
  });

  it("cuts long text with an ellipsis", () => {
    expect(trimTo("abcdefghij", 5)).toBe("abcd…");
    expect(trimTo("abcde", 5)).toBe("abcde");
  });

  it("counts emoji as single characters", () => {
    expect(trimTo("ab😀😀cd", 4)).toBe("ab😀…");
    expect(trimTo("😀😀😀", 3)).toBe("😀😀😀");
  });

  it("passes empty values through", () => {
    expect(trimTo(undefined)).toBeUndefined();
    expect(trimTo("")).toBe("");
  });
});

describe("normalizeResults", () => {
  it("falls back to the URL as title and drops results with neither", () => {
    const results = normalizeResults(
      [
        makeResult(1, "google", { title: "  Spaced \n title " }),
        makeResult(2, "google", { title: "" }),
        makeResult(3, "google", { title: " ", url: " " }),
      ],
      10,
    );

    expect(results.map((r) => r.title)).toEqual(["Spaced title", "https://example.test/google/2"]);
  });

  it("keeps provider order and applies the limit", () => {
    const results = normalizeResults([makeResult(3), makeResult(1), makeResult(2)], 2);
    expect(results.map((r) => r.url)).toEqual(["https://example.test/exa/3", "https://example.test/exa/1"]);
  });
});

describe("isWebUrl", () => {
  it("accepts only http and https", () => {
    expect(isWebUrl("https://example.test")).toBe(true);
    expect(isWebUrl("http://example.test/a")).toBe(true);
    expect(isWebUrl("javascript:alert(1)")).toBe(false);
    expect(isWebUrl("not a url")).toBe(false);
  });
});
