export type SearchSource = "exa" | "google" | "duckduckgo" | "simulated";

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
  source: SearchSource;
  // neural results only
  content?: string;
  score?: number;
  publishedDate?: string;
  author?: string;
};

export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

export type Answer = {
  text: string;
  citationUrls: string[];
};

export interface AnswerProvider {
  readonly name: string;
  answer(query: string): Promise<Answer>;
}

export type PanelRole = "neural" | "traditional";

export type PanelErrorKind = "auth" | "network" | "timeout" | "unknown";

export type PanelState =
  | { status: "idle" }
  | { status: "ok"; results: SearchResult[]; stats: PanelStats }
  | { status: "empty" }
  | { status: "error"; kind: PanelErrorKind; message: string };

export type PanelStats = {
  resultCount: number;
  contentChars: number;
};

export type Panel = {
  role: PanelRole;
  label: string;
  source: string;
  durationMs: number;
  state: PanelState;
};

export type ComparisonView = {
  query: string;
  maxResults: number;
  panels: [Panel, Panel];
  answer: Answer | null;
};
