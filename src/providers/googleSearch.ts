import { google, type customsearch_v1 } from "googleapis";
import { createLogger } from "../logger";
import { GOOGLE_MAX_PER_PAGE } from "../constants";
import { normalizeResults } from "../utils";
import { toProviderError } from "./classify";
import type { SearchProvider, SearchResult } from "../types";

const log = createLogger("google");

const PROVIDER = "Google Custom Search";

/** The one call made against the Custom Search API. */
export type CseList = (
  params: customsearch_v1.Params$Resource$Cse$List,
  options: { timeout?: number },
) => Promise<{ data: customsearch_v1.Schema$Search }>;

export type GoogleSearchOptions = {
  apiKey: string;
  cx: string;
  timeoutMs?: number;
  list?: CseList;
};

export function fromGoogleItems(items: customsearch_v1.Schema$Result[] | undefined): SearchResult[] {
  return (items ?? []).map((i) => ({
    title: i.title ?? "",
    url: i.link ?? "",
    snippet: i.snippet ?? "",
    source: "google" as const,
  }));
}

function defaultList(): CseList {
  const customsearch = google.customsearch("v1");
  return (params, options) => customsearch.cse.list(params, options);
}

export function createGoogleSearch(options: GoogleSearchOptions): SearchProvider {
  const list = options.list ?? defaultList();

  async function search(query: string, maxResults: number): Promise<SearchResult[]> {
    log.info("Searching", { query, maxResults });
    try {
      const res = await list(
        {
          q: query,
          cx: options.cx,
          key: options.apiKey,
          num: Math.min(maxResults, GOOGLE_MAX_PER_PAGE),
        },
        { timeout: options.timeoutMs },
      );
      return normalizeResults(fromGoogleItems(res.data.items), maxResults);
    } catch (error) {
      throw toProviderError(PROVIDER, error);
    }
  }

  return { name: PROVIDER, search };
}
