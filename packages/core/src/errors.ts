/**
 * Error values and results.
 *
 * Every failure the translation pipeline can report is one of a closed set
 * of kinds. Fallible operations return a {@link Result}; only the stream
 * boundary turns an error into a thrown {@link GateStreamFault}.
 */

// ============================================================================
// Error Kinds
// ============================================================================

/**
 * Closed set of failure categories. None of them is transient.
 */
export type GateStreamErrorKind =
  | 'ConfigurationError'
  | 'GateTableError'
  | 'UnknownGateFormat'
  | 'MappingInconsistency'
  | 'CapacityExceeded';

/**
 * A failure, tagged with its kind
 */
export interface GateStreamError {
  readonly kind: GateStreamErrorKind;
  readonly message: string;
  /**
   * Gate table key the failure belongs to, for `GateTableError`
   */
  readonly entry?: string;
}

/**
 * Create an error value
 */
export function gateStreamError(
  kind: GateStreamErrorKind,
  message: string,
  entry?: string
): GateStreamError {
  return entry === undefined ? { kind, message } : { kind, message, entry };
}

// ============================================================================
// Results
// ============================================================================

export type Result<T, E = GateStreamError> =
  | { readonly kind: 'ok'; readonly value: T }
  | { readonly kind: 'error'; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { kind: 'ok', value };
}

export function err<E = GateStreamError>(error: E): Result<never, E> {
  return { kind: 'error', error };
}

export function isOk<T, E>(
  result: Result<T, E>
): result is { readonly kind: 'ok'; readonly value: T } {
  return result.kind === 'ok';
}

// ============================================================================
// Faults
// ============================================================================

/**
 * Thrown at the stream boundary so the hosting process can terminate.
 */
export class GateStreamFault extends Error {
  readonly error: GateStreamError;

  constructor(error: GateStreamError) {
    super(`${error.kind}: ${error.message}`);
    this.name = 'GateStreamFault';
    this.error = error;
  }

  get kind(): GateStreamErrorKind {
    return this.error.kind;
  }
}

/**
 * Return the value of a result or throw its error as a fault
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.kind === 'error') {
    throw new GateStreamFault(result.error);
  }
  return result.value;
}
