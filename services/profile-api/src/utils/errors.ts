export type FactProviderFailure = 'timeout' | 'network' | 'http_status' | 'malformed_body';

/**
 * Raised by the cat fact client when the provider could not supply a fact.
 * Callers are expected to absorb it and fall back.
 */
export class FactProviderError extends Error {
  readonly reason: FactProviderFailure;
  readonly status?: number;

  constructor(reason: FactProviderFailure, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FactProviderError';
    this.reason = reason;
    this.status = options.status;
  }
}

export class ConfigError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
