export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const MAX_RESULTS_LIMIT = 10;
export const RESULT_COUNT_CHOICES = [3, 5, 10] as const;

export const EXA_TEXT_MAX_CHARACTERS = 10_000;
export const GOOGLE_MAX_PER_PAGE = 10; // Google caps at 10
export const DUCKDUCKGO_HTML_URL = "https://html.duckduckgo.com/html/";

export const PANEL_LABELS = {
  neural: "Neural search",
  traditional: "Traditional search",
} as const;
