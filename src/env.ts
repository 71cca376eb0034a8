import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";
import { DEFAULT_USER_AGENT, MAX_RESULTS_LIMIT } from "./constants";

export const TRADITIONAL_PROVIDERS = ["auto", "google", "duckduckgo", "simulated"] as const;
export type TraditionalProviderMode = (typeof TRADITIONAL_PROVIDERS)[number];

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((v) => v === "true" || v === "1");

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  EXA_API_KEY: z
    .string({ required_error: "EXA_API_KEY is not set" })
    .trim()
    .min(1, "EXA_API_KEY is not set"),
  EXA_BASE_URL: z.string().url().default("https://api.exa.ai"),
  EXA_INCLUDE_ANSWER: flag("true"),
  TRADITIONAL_SEARCH_PROVIDER: z.enum(TRADITIONAL_PROVIDERS).default("auto"),
  GOOGLE_API_KEY: optionalString,
  GOOGLE_CX: optionalString,
  Google_CX: optionalString, // tolerate both
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default("0.0.0.0"),
  DEFAULT_MAX_RESULTS: z.coerce.number().int().min(1).max(MAX_RESULTS_LIMIT).default(5),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  TEMPLATE_PATH: z.string().default("templates/index.html"),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" ? v.toLowerCase() : v),
    z.enum(LOG_LEVELS).default("info"),
  ),
});

export type AppConfig = {
  exa: {
    apiKey: string;
    baseUrl: string;
    includeAnswer: boolean;
  };
  traditional: {
    mode: TraditionalProviderMode;
    google?: { apiKey: string; cx: string };
  };
  server: {
    port: number;
    host: string;
  };
  defaultMaxResults: number;
  providerTimeoutMs: number;
  userAgent: string;
  templatePath: string;
  logLevel: LogLevel;
};

/**
 * Reads and validates the environment. Throws ConfigurationError naming the
 * first offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue.path[0] ?? "environment");
    const message = issue.message.includes(variable) ? issue.message : `${variable}: ${issue.message}`;
    throw new ConfigurationError(variable, message);
  }

  const e = parsed.data;
  const cx = e.GOOGLE_CX ?? e.Google_CX;
  const google = e.GOOGLE_API_KEY && cx ? { apiKey: e.GOOGLE_API_KEY, cx } : undefined;

  if (e.TRADITIONAL_SEARCH_PROVIDER === "google" && !google) {
    const missing = e.GOOGLE_API_KEY ? "GOOGLE_CX" : "GOOGLE_API_KEY";
    throw new ConfigurationError(missing, `${missing} is required when TRADITIONAL_SEARCH_PROVIDER=google`);
  }

  return {
    exa: {
      apiKey: e.EXA_API_KEY,
      baseUrl: e.EXA_BASE_URL,
      includeAnswer: e.EXA_INCLUDE_ANSWER,
    },
    traditional: {
      mode: e.TRADITIONAL_SEARCH_PROVIDER,
      google,
    },
    server: {
      port: e.PORT,
      host: e.HOST,
    },
    defaultMaxResults: e.DEFAULT_MAX_RESULTS,
    providerTimeoutMs: e.PROVIDER_TIMEOUT_MS,
    userAgent: e.USER_AGENT,
    templatePath: path.resolve(e.TEMPLATE_PATH),
    logLevel: e.LOG_LEVEL,
  };
}
