import type { SearchResult } from "./types";

export const SNIPPET_MAX_CHARS = 300;

export function trimTo(s: string | undefined, n = SNIPPET_MAX_CHARS): string | undefined {
  if (!s) return s;
  // code points, not UTF-16 units
  const chars = Array.from(s.replace(/\s+/g, " ").trim());
  return chars.length > n ? chars.slice(0, n - 1).join("") + "…" : chars.join("");
}

export function isWebUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Collapses whitespace, falls back to the URL when a result has no title and
 * drops results with neither. Provider order is kept.
 */
export function normalizeResults(results: SearchResult[], limit: number): SearchResult[] {
  return results
    .map((r) => {
      const url = r.url.trim();
      return {
        ...r,
        url,
        title: r.title.replace(/\s+/g, " ").trim() || url,
        snippet: trimTo(r.snippet) ?? "",
      };
    })
    .filter((r) => r.title || r.url)
    .slice(0, limit);
}
