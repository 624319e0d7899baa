/**
 * Common error classes
 *
 * Every fatal condition of a sync run maps to one of these classes.
 * Rate limiting (HTTP 429) is recovered inside the API client and has no class.
 * Database errors are the driver's own and propagate unchanged.
 */

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Missing or invalid configuration. Raised at startup, before any I/O.
 */
export class ConfigError extends Error {
  /** Names of the settings that were missing or invalid */
  readonly keys: string[];

  constructor(keys: string[], message?: string) {
    super(message ?? `Missing required settings: ${keys.join(", ")}`);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

/**
 * The OAuth provider rejected the refresh token or returned no access token.
 */
export class AuthenticationError extends Error {
  readonly status: number | null;
  readonly body: string;

  constructor(message: string, status: number | null = null, body: string = "") {
    super(message);
    this.name = "AuthenticationError";
    this.status = status;
    this.body = body;
  }
}

/**
 * Non-success API response that is neither a rate limit nor a tolerated 403/404.
 */
export class StravaApiError extends Error {
  readonly status: number;
  readonly body: string;
  readonly url: string;

  constructor(status: number, body: string, url: string, message?: string) {
    super(message ?? `HTTP ${status}: ${body}`);
    this.name = "StravaApiError";
    this.status = status;
    this.body = body;
    this.url = url;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isStravaApiError(error: unknown): error is StravaApiError {
  return error instanceof StravaApiError;
}

/**
 * Message of any thrown value, for logs and bookkeeping rows
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
