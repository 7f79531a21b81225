/**
 * Error types that cross module boundaries.
 *
 * Per-key fetch failures are never thrown: the request executor turns them
 * into counted outcomes. Only the classes below propagate.
 */

/** TMDB answered 401. The token is wrong for every call, so the run stops. */
export class AuthFailureError extends Error {
  readonly endpoint: string;

  constructor(endpoint: string) {
    super(`TMDB API 401: Unauthorized for ${endpoint}. Check TMDB_BEARER in the secrets file.`);
    this.name = "AuthFailureError";
    this.endpoint = endpoint;
  }
}

/** Invalid configuration value or missing credentials, raised at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An entity's candidate input is missing or empty; that entity is skipped. */
export class MissingInputError extends Error {
  readonly inputPath: string;

  constructor(inputPath: string, reason: string) {
    super(`${reason}: ${inputPath}`);
    this.name = "MissingInputError";
    this.inputPath = inputPath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
