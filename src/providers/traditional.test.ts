import { describe, expect, it, vi } from "vitest";
import { createFallbackSearch, createTraditionalSearch } from "./traditional";
import type { CseList } from "./googleSearch";
import { loadConfig } from "../env";
import { ConfigurationError, ProviderEmptyResultError, ProviderNetworkError } from "../errors";
import { fakeProvider, makeResult } from "../testing/fakes";
import { stubAdapter } from "../testing/http-stub";

describe("createFallbackSearch", () => {
  it("returns the first backend's results without calling the rest", async () => {
    const first = fakeProvider("first", async () => [makeResult(1, "google")]);
    const second = fakeProvider("second", async () => [makeResult(2, "duckduckgo")]);

    const results = await createFallbackSearch([first, second]).search("q", 5);

    expect(results.map((r) => r.source)).toEqual(["google"]);
    expect(first.search).toHaveBeenCalledWith("q", 5);
    expect(second.search).not.toHaveBeenCalled();
  });

  it("falls through failures and empty lists", async () => {
    const failing = fakeProvider("failing", async () => {
      throw new ProviderNetworkError("failing", "HTTP 500", { status: 500 });
    });
    const empty = fakeProvider("empty", async () => []);
    const working = fakeProvider("working", async () => [makeResult(1, "duckduckgo")]);

    const results = await createFallbackSearch([failing, empty, working]).search("q", 5);
    expect(results).toEqual([makeResult(1, "duckduckgo")]);
  });

  it("raises the last failure when nothing succeeds", async () => {
    const a = fakeProvider("a", async () => {
      throw new Error("socket hang up");
    });
    const b = fakeProvider("b", async () => {
      throw new Error("connect ECONNREFUSED");
    });

    await expect(createFallbackSearch([a, b]).search("q", 5)).rejects.toMatchObject({
      provider: "b",
      message: "b: connect ECONNREFUSED",
    });
  });

  it("signals an empty result when every backend is empty", async () => {
    const client = createFallbackSearch([fakeProvider("a", async () => []), fakeProvider("b", async () => [])]);
    await expect(client.search("q", 5)).rejects.toBeInstanceOf(ProviderEmptyResultError);
  });

  it("needs at least one backend", () => {
    expect(() => createFallbackSearch([])).toThrow(ConfigurationError);
  });
});

const ddgPage = `<div class="result"><a class="result__a" href="https://example.test/ddg">Solar power</a><a class="result__snippet">Panels.</a></div>`;

describe("createTraditionalSearch", () => {
  const base = { EXA_API_KEY: "test-key" };

  it("uses DuckDuckGo in auto mode without Google credentials", () => {
    expect(createTraditionalSearch(loadConfig(base)).name).toBe("DuckDuckGo");
  });

  it("puts Google first in auto mode when configured", () => {
    const config = loadConfig({ ...base, GOOGLE_API_KEY: "test-google", GOOGLE_CX: "test-cx" });
    expect(createTraditionalSearch(config).name).toBe("Google Custom Search → DuckDuckGo");
  });

  it("honours an explicit backend", () => {
    expect(createTraditionalSearch(loadConfig({ ...base, TRADITIONAL_SEARCH_PROVIDER: "simulated" })).name).toBe(
      "Simulated keyword search",
    );
    expect(createTraditionalSearch(loadConfig({ ...base, TRADITIONAL_SEARCH_PROVIDER: "duckduckgo" })).name).toBe(
      "DuckDuckGo",
    );
  });

  it("splits the provider timeout across a Google and DuckDuckGo chain", async () => {
    const config = loadConfig({ ...base, GOOGLE_API_KEY: "test-google", GOOGLE_CX: "test-cx", PROVIDER_TIMEOUT_MS: "8000" });
    const googleList = vi.fn<CseList>(async () => {
      throw Object.assign(new Error("Backend Error"), { response: { status: 500 } });
    });
    const { adapter, calls } = stubAdapter({ status: 200, data: ddgPage });

    const results = await createTraditionalSearch(config, { adapter, googleList }).search("solar power", 5);

    expect(googleList.mock.calls[0][1]).toEqual({ timeout: 4000 });
    expect(calls[0].timeout).toBe(4000);
    expect(results.map((r) => [r.source, r.url])).toEqual([["duckduckgo", "https://example.test/ddg"]]);
  });

  it("gives a single backend the whole provider timeout", async () => {
    const config = loadConfig({ ...base, TRADITIONAL_SEARCH_PROVIDER: "duckduckgo", PROVIDER_TIMEOUT_MS: "8000" });
    const { adapter, calls } = stubAdapter({ status: 200, data: ddgPage });

    await createTraditionalSearch(config, { adapter }).search("solar power", 5);

    expect(calls[0].timeout).toBe(8000);
  });
});
