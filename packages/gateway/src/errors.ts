export type AIErrorKind =
  | "network"
  | "configuration"
  | "unsupported_provider"
  | "parse"
  | "database"
  | "not_found"
  | "validation";

/**
 * Base class for every failure the gateway reports. Subclasses carry a literal
 * `kind` so callers can switch on it without `instanceof` chains.
 */
export abstract class AIError extends Error {
  abstract readonly kind: AIErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure, HTTP failure, or an error reported by the vendor. */
export class NetworkError extends AIError {
  readonly kind = "network" as const;
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class ConfigurationError extends AIError {
  readonly kind = "configuration" as const;
}

export class UnsupportedProviderError extends AIError {
  readonly kind = "unsupported_provider" as const;
  readonly providerType: string;

  constructor(providerType: string) {
    super(`Provider ${providerType} not registered`);
    this.providerType = providerType;
  }
}

/** A success response whose body does not match the vendor schema. */
export class ParseError extends AIError {
  readonly kind = "parse" as const;
}

export class DatabaseError extends AIError {
  readonly kind = "database" as const;
}

export class NotFoundError extends AIError {
  readonly kind = "not_found" as const;
}

export class ValidationError extends AIError {
  readonly kind = "validation" as const;
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super(message);
    this.errors = errors;
  }
}

export function toAIError(error: unknown): AIError {
  if (error instanceof AIError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Unknown error: ${message}`, { cause: error });
}

export type Result<T, E = AIError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Unwraps a result, rethrowing its error. For use inside try blocks only. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export type ValidationResult = { valid: true } | { valid: false; errors: string[] };

export function validationResultOf(errors: string[]): ValidationResult {
  return errors.length === 0 ? { valid: true } : { valid: false, errors };
}
