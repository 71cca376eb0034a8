import { readFileSync } from "fs";
import { load, type CheerioAPI } from "cheerio";
import { RESULT_COUNT_CHOICES } from "./constants";
import { isWebUrl } from "./utils";
import workflow from "./data/traditional-workflow.json";
import type { Answer, ComparisonView, Panel, PanelErrorKind, SearchResult } from "./types";

const ERROR_TEXT: Record<PanelErrorKind, (source: string) => string> = {
  auth: (source) => `${source} rejected the credentials. Check the API key.`,
  network: (source) => `Could not reach ${source}.`,
  timeout: (source) => `${source} did not respond in time.`,
  unknown: (source) => `${source} failed unexpectedly.`,
};

export const PROMPT_TEXT = "Enter a query above to compare results.";
export const EMPTY_TEXT = "No results.";

export type PageRenderer = {
  render(view: ComparisonView, notice?: string): string;
};

function count(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

function renderCountOptions($: CheerioAPI, selected: number): void {
  const choices = Array.from(new Set<number>([...RESULT_COUNT_CHOICES, selected])).sort((a, b) => a - b);
  const $select = $("select[name='n']");
  for (const n of choices) {
    const $option = $("<option></option>").attr("value", String(n)).text(count(n, "result"));
    if (n === selected) $option.attr("selected", "selected");
    $select.append($option);
  }
}

function renderAnswer($: CheerioAPI, answer: Answer): void {
  const $answer = $(".answer").removeAttr("hidden");
  $answer.find(".answer-text").text(answer.text);
  const $citations = $answer.find(".answer-citations");
  for (const url of answer.citationUrls.filter(isWebUrl)) {
    $citations.append($("<li></li>").append($("<a></a>").attr("href", url).text(url)));
  }
}

function resultItem($: CheerioAPI, result: SearchResult) {
  const $item = $("<li class='result'></li>").attr("data-source", result.source);
  const $title = isWebUrl(result.url)
    ? $("<a></a>").attr("href", result.url).attr("rel", "noopener noreferrer").attr("target", "_blank")
    : $("<span></span>");
  $item.append($title.text(result.title));
  if (result.url) $item.append($("<div class='result-url'></div>").text(result.url));
  if (result.snippet) $item.append($("<p class='result-snippet'></p>").text(result.snippet));
  return $item;
}

function renderPanel($: CheerioAPI, panel: Panel): void {
  const $panel = $(`[data-panel='${panel.role}']`);
  $panel.find(".panel-label").text(panel.label);

  const meta = [panel.source];
  if (panel.state.status !== "idle") meta.push(`${panel.durationMs} ms`);
  if (panel.state.status === "ok") {
    meta.push(count(panel.state.stats.resultCount, "result"), count(panel.state.stats.contentChars, "character") + " of text");
  }
  $panel.find(".panel-meta").text(meta.join(" · "));

  const $body = $panel.find(".panel-body");
  const state = panel.state;
  switch (state.status) {
    case "idle":
      $body.append($("<p class='panel-prompt'></p>").text(PROMPT_TEXT));
      break;
    case "empty":
      $body.append($("<p class='panel-empty'></p>").text(EMPTY_TEXT));
      break;
    case "error":
      $body.append(
        $("<p class='panel-error'></p>")
          .attr("data-error-kind", state.kind)
          .text(ERROR_TEXT[state.kind](panel.source)),
      );
      break;
    case "ok": {
      const $list = $("<ol class='results'></ol>");
      for (const result of state.results) $list.append(resultItem($, result));
      $body.append($list);
      break;
    }
  }
}

/** Fills the page template for one comparison. Provider text only ever lands in text nodes. */
export function createPageRenderer(template: string): PageRenderer {
  function render(view: ComparisonView, notice?: string): string {
    const $ = load(template);

    $("input[name='q']").attr("value", view.query);
    renderCountOptions($, view.maxResults);

    if (view.query) {
      $("title").text(`${view.query} · Search compare`);
    }
    if (notice) {
      $(".notice").text(notice).removeAttr("hidden");
    }
    if (view.answer) {
      renderAnswer($, view.answer);
    }
    for (const panel of view.panels) {
      renderPanel($, panel);
    }

    const $workflow = $(".workflow");
    for (const step of workflow.steps) $workflow.find(".workflow-steps").append($("<li></li>").text(step));
    for (const problem of workflow.problems) $workflow.find(".workflow-problems").append($("<li></li>").text(problem));

    return $.html();
  }

  return { render };
}

export function loadPageRenderer(templatePath: string): PageRenderer {
  return createPageRenderer(readFileSync(templatePath, "utf-8"));
}
