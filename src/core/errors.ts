/**
 * Error types
 *
 * ConfigurationError aborts startup. HttpRequestError is raised by the HTTP
 * client on transport failures and is always handled inside a pass.
 */
import type { ZodError } from 'zod';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }

  static missingFile(filename: string): ConfigurationError {
    return new ConfigurationError(`Could not find file '${filename}'.`, 'CONFIG_NOT_FOUND', { filename });
  }

  static unreadable(filename: string, cause: unknown): ConfigurationError {
    return new ConfigurationError(
      `Could not load JSON data from file '${filename}'.`,
      'CONFIG_UNREADABLE',
      { filename },
      { cause }
    );
  }

  static invalid(source: string, error: ZodError): ConfigurationError {
    const issues = formatZodError(error);
    const summary = issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message));
    return new ConfigurationError(`Invalid configuration in ${source}: ${summary.join('; ')}`, 'CONFIG_INVALID', issues);
  }
}

export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HttpRequestError';
  }
}

/**
 * Format Zod validation errors as `[0].hostnames[1]`-style field paths
 */
export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`)).join('').replace(/^\./, ''),
    message: err.message,
  }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
