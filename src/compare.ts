import { createLogger } from "./logger";
import { ProviderAuthError, ProviderEmptyResultError, ProviderNetworkError, errorMessage } from "./errors";
import { PANEL_LABELS } from "./constants";
import type {
  Answer,
  AnswerProvider,
  ComparisonView,
  Panel,
  PanelRole,
  PanelState,
  SearchProvider,
  SearchResult,
} from "./types";

const log = createLogger("compare");

export type ComparisonServiceOptions = {
  neural: SearchProvider;
  traditional: SearchProvider;
  answers?: AnswerProvider;
  defaultMaxResults?: number;
};

export function toPanelState(error: unknown): PanelState {
  if (error instanceof ProviderEmptyResultError) return { status: "empty" };
  if (error instanceof ProviderAuthError) return { status: "error", kind: "auth", message: error.message };
  if (error instanceof ProviderNetworkError) {
    return { status: "error", kind: error.timedOut ? "timeout" : "network", message: error.message };
  }
  return { status: "error", kind: "unknown", message: errorMessage(error) };
}

function contentChars(results: SearchResult[]): number {
  return results.reduce((sum, r) => sum + (r.content ?? r.snippet).length, 0);
}

export type ComparisonService = {
  readonly providerNames: Record<PanelRole, string>;
  readonly answerEnabled: boolean;
  readonly defaultMaxResults: number;
  compare(query: string, maxResults?: number): Promise<ComparisonView>;
};

function idlePanel(role: PanelRole, provider: SearchProvider): Panel {
  return { role, label: PANEL_LABELS[role], source: provider.name, durationMs: 0, state: { status: "idle" } };
}

// never rejects: failures become the panel's state
async function runPanel(role: PanelRole, provider: SearchProvider, query: string, maxResults: number): Promise<Panel> {
  const start = Date.now();
  let state: PanelState;

  try {
    const results = await provider.search(query, maxResults);
    state =
      results.length > 0
        ? { status: "ok", results, stats: { resultCount: results.length, contentChars: contentChars(results) } }
        : { status: "empty" };
  } catch (error) {
    state = toPanelState(error);
    if (state.status === "error") {
      log.warn("Provider failed", { role, provider: provider.name, kind: state.kind, error: state.message });
    }
  }

  return { role, label: PANEL_LABELS[role], source: provider.name, durationMs: Date.now() - start, state };
}

async function fetchAnswer(answers: AnswerProvider | undefined, query: string): Promise<Answer | null> {
  if (!answers) return null;
  try {
    const answer = await answers.answer(query);
    return answer.text ? answer : null;
  } catch (error) {
    log.warn("Answer failed", { provider: answers.name, error: errorMessage(error) });
    return null;
  }
}

export function createComparisonService(options: ComparisonServiceOptions): ComparisonService {
  const { neural, traditional, answers } = options;
  const defaultMaxResults = options.defaultMaxResults ?? 5;

  async function compare(rawQuery: string, maxResults = defaultMaxResults): Promise<ComparisonView> {
    const query = rawQuery.trim();

    if (!query) {
      return {
        query,
        maxResults,
        panels: [idlePanel("neural", neural), idlePanel("traditional", traditional)],
        answer: null,
      };
    }

    log.info("Comparing", { query, maxResults });
    const [neuralPanel, traditionalPanel, answer] = await Promise.all([
      runPanel("neural", neural, query, maxResults),
      runPanel("traditional", traditional, query, maxResults),
      fetchAnswer(answers, query),
    ]);

    return { query, maxResults, panels: [neuralPanel, traditionalPanel], answer };
  }

  return {
    providerNames: { neural: neural.name, traditional: traditional.name },
    answerEnabled: answers !== undefined,
    defaultMaxResults,
    compare,
  };
}
