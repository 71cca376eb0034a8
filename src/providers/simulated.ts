import _ from "lodash";
import { createLogger } from "../logger";
import { normalizeResults } from "../utils";
import templates from "../data/simulated-results.json";
import type { SearchProvider, SearchResult } from "../types";

const log = createLogger("simulated");

const INTERPOLATE = /{{([\s\S]+?)}}/g;

const compiled = templates.map((t) => ({
  title: _.template(t.title, { interpolate: INTERPOLATE }),
  url: _.template(t.url, { interpolate: INTERPOLATE }),
  snippet: _.template(t.snippet, { interpolate: INTERPOLATE }),
}));

/**
 * Keyword-search stand-in: titles, URLs and meta-description style snippets
 * built from the query, with no page content. Same query, same results.
 */
export function createSimulatedSearch(): SearchProvider {
  async function search(query: string, maxResults: number): Promise<SearchResult[]> {
    log.debug("Generating results", { query, maxResults });
    const vars = {
      query,
      Title: _.startCase(query),
      slug: _.kebabCase(query),
      path: _.words(query.toLowerCase()).join("/"),
      wiki: _.startCase(query).replace(/ /g, "_"),
    };

    return normalizeResults(
      compiled.map((t) => ({
        title: t.title(vars),
        url: t.url(vars),
        snippet: t.snippet(vars),
        source: "simulated" as const,
      })),
      maxResults,
    );
  }

  return { name: "Simulated keyword search", search };
}
