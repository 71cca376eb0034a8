import type { AxiosAdapter } from "axios";
import { load } from "cheerio";
import { createHttpClient } from "../http";
import { createLogger } from "../logger";
import { DUCKDUCKGO_HTML_URL } from "../constants";
import { normalizeResults } from "../utils";
import { toProviderError } from "./classify";
import type { SearchProvider, SearchResult } from "../types";

const log = createLogger("duckduckgo");

const PROVIDER = "DuckDuckGo";

export type DuckDuckGoOptions = {
  endpoint?: string;
  timeoutMs?: number;
  userAgent?: string;
  adapter?: AxiosAdapter;
};

/**
 * DuckDuckGo wraps result links as //duckduckgo.com/l/?uddg=<encoded>&rut=...
 */
export function decodeDuckDuckGoUrl(href: string): string {
  const absolute = href.startsWith("//") ? `https:${href}` : href;
  try {
    const url = new URL(absolute, "https://duckduckgo.com");
    const target = url.searchParams.get("uddg");
    if (url.hostname.endsWith("duckduckgo.com") && url.pathname.startsWith("/l/") && target) {
      return target;
    }
    return url.toString();
  } catch {
    return absolute;
  }
}

export function parseDuckDuckGoHtml(html: string): SearchResult[] {
  const $ = load(html);
  const results: SearchResult[] = [];

  $(".result").each((_, el) => {
    const $el = $(el);
    if ($el.hasClass("result--ad")) return;

    const anchor = $el.find("a.result__a").first();
    const href = anchor.attr("href");
    const title = anchor.text().trim();
    if (!href || !title) return;

    results.push({
      title,
      url: decodeDuckDuckGoUrl(href),
      snippet: $el.find(".result__snippet").first().text().trim(),
      source: "duckduckgo",
    });
  });

  const seen = new Set<string>();
  return results.filter((r) => {
    if (seen.has(r.url)) return false;
    seen.add(r.url);
    return true;
  });
}

export function createDuckDuckGoSearch(options: DuckDuckGoOptions = {}): SearchProvider {
  const endpoint = options.endpoint ?? DUCKDUCKGO_HTML_URL;
  const http = createHttpClient({
    timeout: options.timeoutMs,
    userAgent: options.userAgent,
    adapter: options.adapter,
  });

  async function search(query: string, maxResults: number): Promise<SearchResult[]> {
    log.info("Searching", { query, maxResults });
    try {
      const { data: html } = await http.get<string>(endpoint, {
        params: { q: query },
        responseType: "text",
      });
      return normalizeResults(parseDuckDuckGoHtml(html), maxResults);
    } catch (error) {
      throw toProviderError(PROVIDER, error);
    }
  }

  return { name: PROVIDER, search };
}
