import {
  ProviderAuthError,
  ProviderError,
  ProviderNetworkError,
  errorMessage,
} from "../errors";

// axios sets `code`; node-fetch (under gaxios) sets `type` and no code
const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const TIMEOUT_TYPES = new Set(["request-timeout", "body-timeout"]);

// axios and gaxios both hang the HTTP response off `error.response`
function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("response" in error)) return undefined;
  const { response } = error;
  if (typeof response !== "object" || response === null || !("status" in response)) return undefined;
  return typeof response.status === "number" ? response.status : undefined;
}

// GaxiosError keeps the transport error it wrapped under `error.error`
function isTimeout(error: unknown, depth = 0): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && typeof error.code === "string" && TIMEOUT_CODES.has(error.code)) return true;
  if ("type" in error && typeof error.type === "string" && TIMEOUT_TYPES.has(error.type)) return true;
  if ("name" in error && error.name === "AbortError") return true;
  return depth === 0 && "error" in error && isTimeout(error.error, depth + 1);
}

/** Maps anything an HTTP client throws onto the provider error taxonomy. */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const status = readStatus(error);
  if (status === 401 || status === 403) {
    return new ProviderAuthError(provider, status);
  }

  if (isTimeout(error)) {
    return new ProviderNetworkError(provider, "request timed out", { timedOut: true });
  }

  if (status !== undefined) {
    return new ProviderNetworkError(provider, `HTTP ${status}`, { status });
  }

  return new ProviderNetworkError(provider, errorMessage(error));
}
