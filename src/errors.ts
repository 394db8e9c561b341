/**
 * Error taxonomy for the metadata pipeline.
 *
 * Every error the coordinator can act on carries a `kind` and whether it is
 * worth retrying. Validation problems are not errors: they are recorded in the
 * document's validity instead.
 */

export type FetchErrorKind =
  | "timeout"
  | "gateway_exhausted"
  | "too_large"
  | "unavailable"
  | "not_found"
  | "malformed_uri"
  | "unsupported_scheme"
  | "rejected"
  | "blocked";

export type SinkErrorKind = "transient" | "constraint_violation";

export type PipelineErrorKind = FetchErrorKind | SinkErrorKind | "internal";

const RETRYABLE_FETCH_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  "timeout",
  "gateway_exhausted",
  "too_large",
  "unavailable",
]);

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly retryable: boolean;
}

export class FetchError extends PipelineError {
  readonly retryable: boolean;
  /** HTTP status of the failed response, when there was one */
  readonly status: number | undefined;

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.retryable = RETRYABLE_FETCH_KINDS.has(kind);
    this.status = options?.status;
  }
}

export class SinkError extends PipelineError {
  readonly retryable: boolean;

  constructor(readonly kind: SinkErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SinkError";
    this.retryable = kind === "transient";
  }
}

/**
 * Map anything thrown inside the pipeline onto an error kind.
 * Unknown failures are assumed transient.
 */
export function classifyError(error: unknown): { kind: PipelineErrorKind; retryable: boolean; message: string } {
  if (error instanceof PipelineError) {
    return { kind: error.kind, retryable: error.retryable, message: error.message };
  }
  return {
    kind: "internal",
    retryable: true,
    message: error instanceof Error ? error.message : String(error),
  };
}
