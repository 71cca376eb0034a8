export abstract class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends AppError {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.variable = variable;
  }
}

export abstract class ProviderError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, code: string) {
    super(`${provider}: ${message}`, code);
    this.provider = provider;
  }
}

export class ProviderAuthError extends ProviderError {
  public readonly status: number;

  constructor(provider: string, status: number) {
    super(provider, `authentication failed (HTTP ${status})`, "PROVIDER_AUTH_ERROR");
    this.status = status;
  }
}

export class ProviderNetworkError extends ProviderError {
  public readonly status?: number;
  public readonly timedOut: boolean;

  constructor(provider: string, message: string, options: { status?: number; timedOut?: boolean } = {}) {
    super(provider, message, "PROVIDER_NETWORK_ERROR");
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

export class ProviderEmptyResultError extends ProviderError {
  constructor(provider: string, query: string) {
    super(provider, `no results for "${query}"`, "PROVIDER_EMPTY_RESULT");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
