/**
 * dbscout failure taxonomy
 *
 * Every failure below process startup is captured at the operation boundary
 * and reported as data; DbToolError carries what the outcome needs.
 */

export type ErrorKind =
  | "unknown_database"
  | "disallowed_query"
  | "connection_failure"
  | "execution_failure"
  | "introspection_failure"
  | "config_load";

export class DbToolError extends Error {
  readonly kind: ErrorKind;
  readonly database?: string;

  constructor(kind: ErrorKind, message: string, options?: { database?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DbToolError";
    this.kind = kind;
    this.database = options?.database;
  }
}

/**
 * Fatal at startup: the server cannot run without a parseable registry.
 */
export class ConfigLoadError extends DbToolError {
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super("config_load", message, { cause: options?.cause });
    this.name = "ConfigLoadError";
    this.path = options?.path;
  }
}

export function errorMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.message) return error.message;
  // AggregateError from a refused dual-stack connect has no message, only a code
  const code = "code" in error ? error.code : undefined;
  return typeof code === "string" ? code : error.name;
}

/**
 * Keep a DbToolError as is; anything else (driver errors, bugs) becomes
 * the given fallback kind.
 */
export function toDbToolError(
  error: unknown,
  fallback: ErrorKind,
  options?: { database?: string }
): DbToolError {
  if (error instanceof DbToolError) return error;
  return new DbToolError(fallback, errorMessage(error), { ...options, cause: error });
}
