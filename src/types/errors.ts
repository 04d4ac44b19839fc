/**
 * Error classes for the conversion pipeline.
 *
 * Only infrastructure failures are thrown. Problems with a generated statement
 * (validation violations, database errors) are reported as values on the
 * conversion result so the correction loop can act on them.
 */

function formatMessage(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return message;
  }
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Base class: every error carries the suggestions that were appended to its message.
 */
export abstract class QuerywrightError extends Error {
  public readonly suggestions: string[];
  public readonly detail: string;

  protected constructor(name: string, message: string, suggestions: string[], options?: ErrorOptions) {
    super(formatMessage(message, suggestions), options);
    this.name = name;
    this.detail = message;
    this.suggestions = suggestions;
  }
}

/**
 * Error thrown when the text-generation provider fails (timeout, quota, transport).
 *
 * The pipeline never retries these; they surface to the caller unchanged.
 */
export class LLMError extends QuerywrightError {
  constructor(message: string, suggestions?: string[], options?: ErrorOptions) {
    super('LLMError', message, suggestions ?? LLMError.getDefaultSuggestions(), options);
    Object.setPrototypeOf(this, LLMError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Verify the API key for the configured LLM_PROVIDER',
      'Check provider status and remaining quota',
      'Increase LLM_MAX_RETRIES for transient network failures',
    ];
  }
}

/**
 * Error thrown when SQL cannot be executed for reasons outside the statement,
 * e.g. no executor is configured.
 */
export class SQLExecutionError extends QuerywrightError {
  constructor(message: string, suggestions?: string[], options?: ErrorOptions) {
    super('SQLExecutionError', message, suggestions ?? SQLExecutionError.getDefaultSuggestions(), options);
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check that the database is reachable with the configured credentials',
      'Pass an executor when constructing the converter if execution is requested',
    ];
  }
}

/**
 * Error thrown when no schema snapshot is available or the schema source fails.
 */
export class SchemaError extends QuerywrightError {
  constructor(message: string, suggestions?: string[], options?: ErrorOptions) {
    super('SchemaError', message, suggestions ?? SchemaError.getDefaultSuggestions(), options);
    Object.setPrototypeOf(this, SchemaError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Call init() before converting questions',
      'Make sure the database user can read table metadata',
    ];
  }
}

/**
 * Error thrown when the backing cache store fails.
 */
export class CacheError extends QuerywrightError {
  constructor(message: string, suggestions?: string[], options?: ErrorOptions) {
    super('CacheError', message, suggestions ?? CacheError.getDefaultSuggestions(), options);
    Object.setPrototypeOf(this, CacheError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check REDIS_URL and that the Redis server is reachable',
      'Unset REDIS_URL to fall back to the in-memory cache',
    ];
  }
}

/**
 * Error thrown when configuration is incomplete for the requested operation.
 */
export class ConfigError extends QuerywrightError {
  constructor(message: string, suggestions?: string[]) {
    super('ConfigError', message, suggestions ?? []);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
