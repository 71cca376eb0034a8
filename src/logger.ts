import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Meta = Record<string, unknown>;
type Paint = (text: string) => string;

const PAINT: Record<Exclude<LogLevel, "silent">, Paint> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? "";
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function log(level: Exclude<LogLevel, "silent">, scope: string, message: string, meta?: Meta): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const line = [
    chalk.gray(new Date().toISOString()),
    PAINT[level](level.toUpperCase().padEnd(5)),
    chalk.bold(`[${scope}]`),
    message,
    meta ? chalk.gray(JSON.stringify(meta)) : "",
  ]
    .filter(Boolean)
    .join(" ");

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(scope: string) {
  return {
    debug: (message: string, meta?: Meta) => log("debug", scope, message, meta),
    info: (message: string, meta?: Meta) => log("info", scope, message, meta),
    warn: (message: string, meta?: Meta) => log("warn", scope, message, meta),
    error: (message: string, meta?: Meta) => log("error", scope, message, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
