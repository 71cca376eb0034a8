import type { AxiosAdapter } from "axios";
import { z } from "zod";
import { createHttpClient } from "../http";
import { createLogger } from "../logger";
import { cleanAnswer, cleanMarkdown } from "../markdown";
import { ConfigurationError, ProviderEmptyResultError, ProviderNetworkError, errorMessage } from "../errors";
import { EXA_TEXT_MAX_CHARACTERS } from "../constants";
import { normalizeResults, trimTo } from "../utils";
import { toProviderError } from "./classify";
import type { Answer, AnswerProvider, SearchProvider, SearchResult } from "../types";

const log = createLogger("exa");

const PROVIDER = "Exa";

// a result whose title or url is the wrong type is dropped; a bad optional field is blanked
const ExaResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  text: z.string().nullish().catch(null),
  score: z.number().nullish().catch(null),
  publishedDate: z.string().nullish().catch(null),
  author: z.string().nullish().catch(null),
});

const ExaSearchResponseSchema = z.object({
  requestId: z.string().optional(),
  results: z.array(z.unknown()).default([]),
});

const ExaAnswerResponseSchema = z.object({
  answer: z.string().nullish(),
  citations: z.array(z.unknown()).default([]),
});

const CitationSchema = z.object({ url: z.string().min(1) });

export type ExaResult = z.infer<typeof ExaResultSchema>;

export type ExaClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  adapter?: AxiosAdapter;
};

export type ExaClient = SearchProvider & AnswerProvider;

export function toSearchResult(r: ExaResult): SearchResult {
  const content = cleanMarkdown(r.text);
  return {
    title: r.title ?? "",
    url: r.url ?? "",
    snippet: trimTo(content) ?? "",
    source: "exa",
    content,
    score: r.score ?? undefined,
    publishedDate: r.publishedDate ?? undefined,
    author: r.author ?? undefined,
  };
}

function parseResults(items: unknown[]): ExaResult[] {
  const results: ExaResult[] = [];
  for (const item of items) {
    const parsed = ExaResultSchema.safeParse(item);
    if (parsed.success) {
      results.push(parsed.data);
    } else {
      log.debug("Skipping malformed result", { issues: parsed.error.issues.map((i) => i.message) });
    }
  }
  return results;
}

export function createExaClient(options: ExaClientOptions): ExaClient {
  if (!options.apiKey.trim()) {
    throw new ConfigurationError("EXA_API_KEY", "EXA_API_KEY is not set");
  }

  const http = createHttpClient({
    baseURL: options.baseUrl ?? "https://api.exa.ai",
    timeout: options.timeoutMs,
    userAgent: options.userAgent,
    adapter: options.adapter,
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      "x-api-key": options.apiKey,
    },
  });

  async function post(path: string, body: object): Promise<unknown> {
    try {
      const { data } = await http.post<unknown>(path, body);
      return data;
    } catch (error) {
      throw toProviderError(PROVIDER, error);
    }
  }

  async function search(query: string, maxResults: number): Promise<SearchResult[]> {
    log.info("Searching", { query, maxResults });
    const start = Date.now();

    let data: unknown;
    try {
      data = await post("/search", {
        query,
        numResults: maxResults,
        type: "auto",
        contents: {
          text: { maxCharacters: EXA_TEXT_MAX_CHARACTERS, includeHtmlTags: false },
        },
      });
    } catch (error) {
      log.warn("Search failed", { query, error: errorMessage(error), durationMs: Date.now() - start });
      throw error;
    }

    const parsed = ExaSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderNetworkError(PROVIDER, "unexpected response from /search");
    }

    const results = normalizeResults(parseResults(parsed.data.results).map(toSearchResult), maxResults);
    if (results.length === 0) {
      throw new ProviderEmptyResultError(PROVIDER, query);
    }

    log.info("Search complete", { query, resultsFound: results.length, durationMs: Date.now() - start });
    return results;
  }

  async function answer(query: string): Promise<Answer> {
    log.debug("Requesting answer", { query });

    const parsed = ExaAnswerResponseSchema.safeParse(await post("/answer", { query, text: true }));
    if (!parsed.success) {
      throw new ProviderNetworkError(PROVIDER, "unexpected response from /answer");
    }

    const citationUrls: string[] = [];
    for (const citation of parsed.data.citations) {
      const c = CitationSchema.safeParse(citation);
      if (c.success) citationUrls.push(c.data.url);
    }

    return { text: cleanAnswer(parsed.data.answer), citationUrls };
  }

  return { name: PROVIDER, search, answer };
}
