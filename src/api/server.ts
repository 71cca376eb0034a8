import express, { type ErrorRequestHandler, type Request, type Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { z } from "zod";
import { MAX_RESULTS_LIMIT } from "../constants";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { ComparisonService } from "../compare";
import type { PageRenderer } from "../render";

const log = createLogger("api");

const maxResults = z.coerce.number().int().min(1).max(MAX_RESULTS_LIMIT).optional();

const CompareQuerySchema = z.object({
  q: z.string().default(""),
  n: maxResults,
});

const CompareBodySchema = z.object({
  query: z.string().default(""),
  max_results: maxResults,
});

export type AppDeps = {
  service: ComparisonService;
  renderer: PageRenderer;
  requestLogging?: boolean;
};

export function createApp({ service, renderer, requestLogging = true }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "16kb" }));
  app.use(express.urlencoded({ extended: false, limit: "16kb" }));
  if (requestLogging) {
    app.use(morgan("dev"));
  }

  const compareJson = async (res: Response, query: string, n: number | undefined) => {
    try {
      const view = await service.compare(query, n);
      res.json({ ok: true, ...view });
    } catch (err) {
      log.error("Comparison failed", { query, error: errorMessage(err) });
      res.status(500).json({ ok: false, error: errorMessage(err) || "comparison failed" });
    }
  };

  app.get("/", async (req: Request, res: Response) => {
    const parsed = CompareQuerySchema.safeParse(req.query);
    try {
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        const view = await service.compare("");
        res.status(400).type("html").send(renderer.render(view, `Invalid request: ${issues}`));
        return;
      }
      const view = await service.compare(parsed.data.q, parsed.data.n);
      res.type("html").send(renderer.render(view));
    } catch (err) {
      log.error("Page render failed", { error: errorMessage(err) });
      res.status(500).type("text").send("Internal server error");
    }
  });

  app.get("/api/compare", async (req: Request, res: Response) => {
    const parsed = CompareQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.flatten() });
      return;
    }
    await compareJson(res, parsed.data.q, parsed.data.n);
  });

  app.post("/api/compare", async (req: Request, res: Response) => {
    const parsed = CompareBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.flatten() });
      return;
    }
    await compareJson(res, parsed.data.query, parsed.data.max_results);
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      neuralProvider: service.providerNames.neural,
      traditionalProvider: service.providerNames.traditional,
      answerEnabled: service.answerEnabled,
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = typeof err?.status === "number" && err.status < 500 ? err.status : 500;
    if (status === 500) log.error("Unhandled error", { error: errorMessage(err) });
    res.status(status).json({ ok: false, error: status === 500 ? "Internal server error" : errorMessage(err) });
  };
  app.use(onError);

  return app;
}
