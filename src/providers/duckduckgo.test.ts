import { describe, expect, it } from "vitest";
import { createDuckDuckGoSearch, decodeDuckDuckGoUrl, parseDuckDuckGoHtml } from "./duckduckgo";
import { ProviderNetworkError } from "../errors";
import { DUCKDUCKGO_HTML_URL } from "../constants";
import { stubAdapter } from "../testing/http-stub";

const html = `
<html><body><div class="results">
  <div class="result results_links result--ad">
    <h2><a class="result__a" href="https://ads.example/x">Sponsored</a></h2>
    <a class="result__snippet">Buy now</a>
  </div>
  <div class="result results_links">
    <h2><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.org%2Fclimate%3Fa%3D1&amp;rut=abc">Climate policy overview</a></h2>
    <a class="result__snippet">An overview of   climate policy.</a>
  </div>
  <div class="result results_links">
    <h2><a class="result__a" href="https://example.net/direct">Direct link</a></h2>
  </div>
  <div class="result results_links">
    <h2><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.org%2Fclimate%3Fa%3D1&amp;rut=def">Duplicate</a></h2>
  </div>
</div></body></html>`;

describe("decodeDuckDuckGoUrl", () => {
  it("unwraps redirect links", () => {
    expect(decodeDuckDuckGoUrl("//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.org%2F&rut=x")).toBe("https://example.org/");
  });

  it("leaves direct links alone", () => {
    expect(decodeDuckDuckGoUrl("https://example.net/direct")).toBe("https://example.net/direct");
  });
});

describe("parseDuckDuckGoHtml", () => {
  it("skips ads and keeps the first of duplicate URLs", () => {
    const results = parseDuckDuckGoHtml(html);
    expect(results.map((r) => [r.title, r.url])).toEqual([
      ["Climate policy overview", "https://example.org/climate?a=1"],
      ["Direct link", "https://example.net/direct"],
    ]);
    expect(results[0].snippet).toBe("An overview of   climate policy.");
    expect(results[1].snippet).toBe("");
  });
});

describe("createDuckDuckGoSearch", () => {
  it("queries the HTML endpoint and normalizes snippets", async () => {
    const { adapter, calls } = stubAdapter({ status: 200, data: html });
    const backend = createDuckDuckGoSearch({ adapter });

    const results = await backend.search("climate policy", 5);

    expect(calls[0].url).toBe(DUCKDUCKGO_HTML_URL);
    expect(calls[0].params).toEqual({ q: "climate policy" });
    expect(results).toHaveLength(2);
    expect(results[0]).toEqual({
      title: "Climate policy overview",
      url: "https://example.org/climate?a=1",
      snippet: "An overview of climate policy.",
      source: "duckduckgo",
    });
  });

  it("returns an empty list when the page has no results", async () => {
    const { adapter } = stubAdapter({ status: 200, data: "<html><body>No results.</body></html>" });
    expect(await createDuckDuckGoSearch({ adapter }).search("zzzz", 5)).toEqual([]);
  });

  it("reports HTTP failures as network errors", async () => {
    const { adapter } = stubAdapter({ status: 503, data: "" });
    await expect(createDuckDuckGoSearch({ adapter }).search("climate policy", 5)).rejects.toBeInstanceOf(
      ProviderNetworkError,
    );
  });
});
