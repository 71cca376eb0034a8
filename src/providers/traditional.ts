import type { AxiosAdapter } from "axios";
import { createLogger } from "../logger";
import { ConfigurationError, ProviderEmptyResultError, type ProviderError } from "../errors";
import type { AppConfig } from "../env";
import { toProviderError } from "./classify";
import { createGoogleSearch, type CseList } from "./googleSearch";
import { createDuckDuckGoSearch } from "./duckduckgo";
import { createSimulatedSearch } from "./simulated";
import type { SearchProvider, SearchResult } from "../types";

const log = createLogger("traditional");

/**
 * Tries each backend in order and returns the first non-empty result list.
 * If no backend has results, the last real failure is raised, or
 * ProviderEmptyResultError when every backend simply came back empty.
 */
export function createFallbackSearch(backends: SearchProvider[]): SearchProvider {
  if (backends.length === 0) {
    throw new ConfigurationError("TRADITIONAL_SEARCH_PROVIDER", "no traditional search backend is configured");
  }
  const name = backends.map((b) => b.name).join(" → ");

  async function search(query: string, maxResults: number): Promise<SearchResult[]> {
    let lastFailure: ProviderError | undefined;

    for (const backend of backends) {
      try {
        const results = await backend.search(query, maxResults);
        if (results.length > 0) {
          log.info("Search complete", { backend: backend.name, resultsFound: results.length });
          return results;
        }
        log.info("No results, trying next backend", { backend: backend.name });
      } catch (error) {
        const failure = toProviderError(backend.name, error);
        if (failure instanceof ProviderEmptyResultError) {
          log.info("No results, trying next backend", { backend: backend.name });
          continue;
        }
        lastFailure = failure;
        log.warn("Backend failed", { backend: backend.name, error: failure.message });
      }
    }

    if (lastFailure) throw lastFailure;
    throw new ProviderEmptyResultError(name, query);
  }

  return { name, search };
}

export type TraditionalSearchDeps = {
  adapter?: AxiosAdapter;
  googleList?: CseList;
};

/**
 * Builds the backend chain for the configured mode. A chain shares one
 * provider timeout: each backend gets an equal slice of PROVIDER_TIMEOUT_MS.
 */
export function createTraditionalSearch(config: AppConfig, deps: TraditionalSearchDeps = {}): SearchProvider {
  const { mode, google } = config.traditional;
  const useGoogle = google !== undefined && (mode === "google" || mode === "auto");
  const chainLength = mode === "auto" && useGoogle ? 2 : 1;
  const timeoutMs = Math.floor(config.providerTimeoutMs / chainLength);

  const duckduckgo = () =>
    createDuckDuckGoSearch({
      timeoutMs,
      userAgent: config.userAgent,
      adapter: deps.adapter,
    });
  const googleBackend = () =>
    google && useGoogle ? [createGoogleSearch({ ...google, timeoutMs, list: deps.googleList })] : [];

  switch (mode) {
    case "google":
      return createFallbackSearch(googleBackend());
    case "duckduckgo":
      return createFallbackSearch([duckduckgo()]);
    case "simulated":
      return createFallbackSearch([createSimulatedSearch()]);
    case "auto":
      return createFallbackSearch([...googleBackend(), duckduckgo()]);
  }
}
