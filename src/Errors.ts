import { Data } from "effect"

/**
 * Error class for vector clock construction.
 * Raised eagerly when the roster or the initial counters violate the clock's preconditions.
 */
export class ClockConfigurationError extends Data.TaggedError("ClockConfigurationError")<{
  /** The error message */
  readonly message: string
  /** The process the clock was being built for */
  readonly processId: string
}> {}

/**
 * Error class for messages whose clock metadata cannot be decoded.
 * Raised before the receiving clock is touched.
 */
export class InvalidMessageError extends Data.TaggedError("InvalidMessageError")<{
  /** The error message */
  readonly message: string
  /** The process that claims to have sent the message */
  readonly from: string
  /** The underlying cause of the error, if any */
  readonly cause?: unknown
}> {}

/**
 * Error class for request/reply exchanges between processes.
 */
export class TransportError extends Data.TaggedError("TransportError")<{
  /** The error message */
  readonly message: string
  /** The server the exchange was addressed to, or "*" for the whole pool */
  readonly server: string
  /** A code identifying the specific failure */
  readonly code: "UNAVAILABLE" | "REJECTED" | "INVALID_REPLY" | "NO_SERVERS" | "ALL_FAILED"
  /** The underlying cause of the error, if any */
  readonly cause?: unknown
}> {}

/**
 * Error class for invalid calculator input.
 */
export class CalculationError extends Data.TaggedError("CalculationError")<{
  /** The error message */
  readonly message: string
  /** The operation that rejected the input */
  readonly operation: string
}> {}

/**
 * Union type representing all possible error types of the causal clocks package.
 */
export type CausalError =
  | ClockConfigurationError
  | InvalidMessageError
  | TransportError
  | CalculationError
