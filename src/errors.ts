/**
 * Failure taxonomy of the retrieval core. Every variant is surfaced to the
 * caller as-is: nothing here is retried or recovered from.
 */
export type RetrievalErrorKind =
  | "NotFound"
  | "ConfigError"
  | "DimensionMismatch"
  | "BackendUnavailable"
  | "EmbeddingError";

/** Base class; narrow on {@link RetrievalError.kind}. */
export abstract class RetrievalError extends Error {
  public abstract readonly kind: RetrievalErrorKind;
}

/** Update / delete / get addressed an id that does not exist. */
export class NotFoundError extends RetrievalError {
  public readonly kind = "NotFound" as const;

  public constructor(public readonly id: string) {
    super(`Document not found: ${id}`);
    this.name = "NotFoundError";
  }
}

/** Required configuration is missing or malformed. */
export class ConfigError extends RetrievalError {
  public readonly kind = "ConfigError" as const;

  public constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An embedding does not have exactly the configured number of components. */
export class DimensionMismatchError extends RetrievalError {
  public readonly kind = "DimensionMismatch" as const;

  public constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Embedding dimension (${actual}) != EMBEDDING_DIM (${expected})`);
    this.name = "DimensionMismatchError";
  }
}

/** The backing store could not be reached. */
export class BackendUnavailableError extends RetrievalError {
  public readonly kind = "BackendUnavailable" as const;

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BackendUnavailableError";
  }
}

/** The embedding call itself failed (transport or provider error). */
export class EmbeddingError extends RetrievalError {
  public readonly kind = "EmbeddingError" as const;

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EmbeddingError";
  }
}

export function isRetrievalError(e: unknown): e is RetrievalError {
  return e instanceof RetrievalError;
}

/** Explicit per-operation result used at the tool boundary. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: RetrievalError };

/**
 * Run an operation and capture a {@link RetrievalError} as a failed outcome.
 * Any other error is not part of the taxonomy and is rethrown.
 */
export async function attempt<T>(op: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await op() };
  } catch (e) {
    if (isRetrievalError(e)) return { ok: false, error: e };
    throw e;
  }
}

/** Assert `vector` has exactly `dimension` components. */
export function assertDimension(vector: readonly number[], dimension: number): void {
  if (vector.length !== dimension) throw new DimensionMismatchError(dimension, vector.length);
}
